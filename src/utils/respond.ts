import { Response } from "express";
import { EconomyError, EconomyResult, HTTP_STATUS } from "./errors";

export const sendResult = <T>(res: Response, result: EconomyResult<T>, status = 200) => {
  if (result.ok) {
    return res.status(status).json(result.value);
  }
  return res
    .status(HTTP_STATUS[result.error.kind])
    .json({ error: result.error.message, kind: result.error.kind });
};

export const sendError = (res: Response, error: unknown, context: string) => {
  console.error(`${context}:`, error);
  if (error instanceof EconomyError) {
    return res
      .status(HTTP_STATUS[error.kind])
      .json({ error: "Service temporarily unavailable", kind: error.kind });
  }
  return res.status(500).json({ error: "Internal Server Error" });
};

/** Positive integer route parameter, or null. */
export const parseId = (raw: unknown): number | null => {
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
};
