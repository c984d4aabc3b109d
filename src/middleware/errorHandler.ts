import { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { AppError, ValidationError } from "../errors/AppError";
import { logError, logWarn } from "../observability/logger";

type ErrorBody = {
  ok: false;
  error: string;
  message: string;
  issues?: ValidationError["issues"];
};

function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return new AppError("upload_rejected", err.message, status);
  }
  if (err instanceof SyntaxError && "body" in err) {
    return new AppError("invalid_json", "Request body is not valid JSON.", 400);
  }
  return new AppError("internal_error", "Unexpected server error.", 500);
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const appError = toAppError(err);
  const requestId = res.locals.requestId ?? "unknown";

  const fields = {
    requestId,
    route: req.originalUrl,
    code: appError.code,
    status: appError.status,
    errorMessage: err instanceof Error ? err.message : String(err),
  };
  if (appError.status >= 500) {
    logError("request_error", {
      ...fields,
      errorStack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logWarn("request_rejected", fields);
  }

  const body: ErrorBody = {
    ok: false,
    error: appError.code,
    message: appError.message,
    ...(appError instanceof ValidationError && appError.issues.length > 0
      ? { issues: appError.issues }
      : {}),
  };
  res.status(appError.status).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ ok: false, error: "not_found", message: `Route ${req.method} ${req.path} not found.` });
}
