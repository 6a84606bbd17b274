import { Request, Response, NextFunction } from "express";

/**
 * One line per request once the response is finished: method, path,
 * status and duration. The identity payload is never printed.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const auth = req.headers.authorization ? "payload present" : "anonymous";

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const icon = res.statusCode >= 500 ? "❌" : res.statusCode >= 400 ? "⚠️ " : "📤";
    console.log(
      `${icon} [${new Date().toISOString()}] ${req.method} ${req.path} -> ${res.statusCode} (${duration}ms, ${auth}, ip ${req.ip || req.socket.remoteAddress})`,
    );
  });

  next();
};
