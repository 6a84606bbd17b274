export type EconomyErrorKind =
  | "AuthenticationFailure"
  | "NotFound"
  | "EmptyPool"
  | "InsufficientFunds"
  | "Conflict"
  | "StoreUnavailable";

export interface EconomyFailure {
  kind: EconomyErrorKind;
  message: string;
}

export type EconomyResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EconomyFailure };

export const ok = <T>(value: T): EconomyResult<T> => ({ ok: true, value });

export const fail = <T = never>(
  kind: EconomyErrorKind,
  message: string,
): EconomyResult<T> => ({ ok: false, error: { kind, message } });

/**
 * Thrown for broken preconditions (drawing from an empty pool) and
 * infrastructure faults. Business outcomes are returned as EconomyResult.
 */
export class EconomyError extends Error {
  constructor(
    public readonly kind: EconomyErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * The store could not complete the request. Callers may retry the whole
 * operation with backoff; the transaction was rolled back.
 */
export class StoreUnavailableError extends EconomyError {
  constructor(message: string, cause?: unknown) {
    super("StoreUnavailable", message, { cause });
  }
}

export const HTTP_STATUS: Record<EconomyErrorKind, number> = {
  AuthenticationFailure: 401,
  NotFound: 404,
  EmptyPool: 503,
  InsufficientFunds: 402,
  Conflict: 409,
  StoreUnavailable: 503,
};
