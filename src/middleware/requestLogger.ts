import { type NextFunction, type Request, type Response } from "express";
import { logInfo } from "../observability/logger";

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = res.locals.requestId ?? "unknown";

  logInfo("request_started", {
    requestId,
    method: req.method,
    route: req.originalUrl,
    origin: req.get("origin"),
    userAgent: req.get("user-agent"),
    ip: req.ip ?? "unknown",
  });

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    logInfo("request_completed", {
      requestId,
      route: req.originalUrl,
      method: req.method,
      status: res.statusCode,
      durationMs,
      outcome: res.statusCode >= 400 ? "failure" : "success",
      routePath: req.route?.path ?? null,
    });
  });

  next();
}
