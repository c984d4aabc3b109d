import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import { type Request, type Response, type NextFunction } from "express";

type Store = {
  requestId: string;
  route?: string;
  applicationId?: string;
  start: number;
};

export type RequestContext = {
  requestId: string;
  route?: string;
  applicationId?: string;
  start?: number;
};

const storage = new AsyncLocalStorage<Store>();

function readRequestIdHeader(req: Request): string | undefined {
  const header = req.headers["x-request-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function requestContext(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = readRequestIdHeader(req) ?? randomUUID();

  const store: Store = {
    requestId,
    route: req.originalUrl,
    start: Date.now(),
  };

  storage.run(store, () => {
    res.locals.requestId = requestId;
    res.setHeader("X-Request-Id", requestId);
    next();
  });
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getRequestRoute(): string | undefined {
  return storage.getStore()?.route;
}

export function getContextApplicationId(): string | undefined {
  return storage.getStore()?.applicationId;
}

export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  const store: Store = {
    requestId: ctx.requestId,
    route: ctx.route,
    applicationId: ctx.applicationId,
    start: ctx.start ?? Date.now(),
  };
  return storage.run(store, fn);
}
