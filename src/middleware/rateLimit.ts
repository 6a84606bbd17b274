import { Request, Response, NextFunction } from "express";
import redisClient from "../config/redis";
import { IdentityVerifier, parseIdentity } from "../services/IdentityVerifier";

/** Who a request is counted against. */
export type CallerKey = (req: Request) => string;

export const clientAddress: CallerKey = (req) => {
  const ip = req.ip || req.socket.remoteAddress || "unknown";
  return `ip_${ip.replace(/:/g, "_")}`;
};

/**
 * Counts a request against the platform user when its identity payload
 * verifies, otherwise against the client address. A forged payload can
 * not spend someone else's budget.
 */
export const identityKey = (verifier: IdentityVerifier): CallerKey => (req) => {
  const payload = req.initData;
  if (payload && verifier.verify(payload)) {
    const identity = parseIdentity(payload);
    if (identity) return `user_${identity.telegram_id}`;
  }
  return clientAddress(req);
};

/**
 * Fixed window limiter shared by every route registered under `name`,
 * whatever ids appear in the path.
 */
export const rateLimit = (
  name: string,
  windowSeconds: number,
  maxRequests: number,
  keyOf: CallerKey = clientAddress,
) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!redisClient.isOpen || !redisClient.isReady) {
        return next();
      }

      const key = `ratelimit:${name}:${keyOf(req)}`;

      const requests = await redisClient.incr(key);
      if (requests === 1) {
        await redisClient.expire(key, windowSeconds);
      }

      if (requests > maxRequests) {
        const ttl = await redisClient.ttl(key);
        res.status(429).json({
          error: "Too many requests, slow down.",
          retryAfter: ttl,
        });
        return;
      }

      next();
    } catch (error) {
      console.error("Rate Limit Error:", error);
      // Fail open when redis errors
      next();
    }
  };
};
