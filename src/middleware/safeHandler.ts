import { type NextFunction, type Request, type Response } from "express";
import { AppError } from "../errors/AppError";
import { describeError, logError } from "../observability/logger";

export type SafeRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => void | Promise<void>;

export function safeHandler(handler: SafeRequestHandler): SafeRequestHandler {
  return async (req, res, next) => {
    try {
      await handler(req, res, next);
    } catch (err) {
      // Response already started: let Express close it.
      if (res.headersSent) {
        next(err);
        return;
      }

      if (err instanceof AppError) {
        next(err);
        return;
      }

      logError("safe_handler_error", {
        requestId: res.locals.requestId ?? "unknown",
        route: req.originalUrl,
        error: describeError(err),
      });
      next(new AppError("internal_error", "Unexpected server error.", 500));
    }
  };
}
