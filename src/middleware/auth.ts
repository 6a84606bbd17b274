import { Request, Response, NextFunction } from "express";

declare global {
  namespace Express {
    interface Request {
      /** Raw identity payload, checked by EconomyGateway. */
      initData?: string;
    }
  }
}

const SCHEME = "tma ";

/**
 * Picks the signed identity payload from `Authorization: tma <payload>`
 * or from `init_data` in the JSON body. Signature checks happen later.
 */
export const requireInitData = (req: Request, res: Response, next: NextFunction) => {
  const authHeader = req.headers["authorization"];
  const fromHeader =
    authHeader && authHeader.startsWith(SCHEME) ? authHeader.slice(SCHEME.length).trim() : "";

  const body: unknown = req.body;
  const fromBody =
    typeof body === "object" && body !== null && "init_data" in body && typeof body.init_data === "string"
      ? body.init_data
      : "";

  const payload = fromHeader || fromBody;
  if (!payload) {
    return res.status(401).json({ error: "Identity payload required" });
  }

  req.initData = payload;
  next();
};
