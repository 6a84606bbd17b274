import crypto from "crypto";
import { Identity } from "../models/types";

type Pair = [key: string, value: string];

const HASH_KEY = "hash";

/**
 * Checks identity payloads ("init data") signed by the messaging platform.
 * The payload is a query string whose `hash` field is
 * HMAC-SHA256(SHA-256(botToken), check string) in lowercase hex.
 */
export class IdentityVerifier {
  private readonly secretKey: Buffer;

  constructor(botToken: string) {
    this.secretKey = crypto.createHash("sha256").update(botToken, "utf8").digest();
  }

  verify(payload: string): boolean {
    const parsed = splitPayload(payload);
    if (!parsed) return false;

    const hashes = parsed.filter(([key]) => key === HASH_KEY);
    if (hashes.length !== 1) return false;
    const provided = hashes[0][1];

    const fields = parsed.filter(([key]) => key !== HASH_KEY);
    const expected = this.computeHash(fields);

    const a = Buffer.from(expected, "utf8");
    const b = Buffer.from(provided, "utf8");
    if (a.length !== b.length) return false;
    return crypto.timingSafeEqual(a, b);
  }

  /**
   * Builds a payload signed with this verifier's secret. Values are taken
   * as-is, so callers pass them already URL-encoded.
   */
  sign(fields: Record<string, string>): string {
    const pairs = Object.entries(fields);
    const hash = this.computeHash(pairs);
    return [...pairs, [HASH_KEY, hash]].map(([k, v]) => `${k}=${v}`).join("&");
  }

  private computeHash(fields: Pair[]): string {
    const checkString = [...fields]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${key}=${value}`)
      .join("\n");

    return crypto
      .createHmac("sha256", this.secretKey)
      .update(checkString, "utf8")
      .digest("hex");
  }
}

const splitPayload = (payload: string): Pair[] | null => {
  if (!payload) return null;
  const pairs: Pair[] = [];
  for (const segment of payload.split("&")) {
    const eq = segment.indexOf("=");
    if (eq === -1) return null;
    pairs.push([segment.slice(0, eq), segment.slice(eq + 1)]);
  }
  return pairs;
};

const optionalString = (value: unknown): string | null =>
  typeof value === "string" && value.length > 0 ? value : null;

/**
 * Reads the `user` field (URL-encoded JSON) of a payload. Only meaningful
 * after `verify` succeeded. Returns null when the field is missing or not
 * a platform user object.
 */
export const parseIdentity = (payload: string): Identity | null => {
  const pairs = splitPayload(payload);
  const raw = pairs?.find(([key]) => key === "user")?.[1];
  if (!raw) return null;

  let user: unknown;
  try {
    user = JSON.parse(decodeURIComponent(raw));
  } catch (error) {
    console.warn("Identity payload carries an unreadable user field:", error);
    return null;
  }

  if (typeof user !== "object" || user === null || !("id" in user)) return null;
  const { id } = user;
  if (typeof id !== "number" || !Number.isSafeInteger(id) || id <= 0) return null;

  const record: Record<string, unknown> = { ...user };
  return {
    telegram_id: id,
    username: optionalString(record.username),
    first_name: optionalString(record.first_name),
    last_name: optionalString(record.last_name),
  };
};
