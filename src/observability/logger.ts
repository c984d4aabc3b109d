import {
  getContextApplicationId,
  getRequestId,
  getRequestRoute,
} from "../middleware/requestContext";

type LogLevel = "info" | "warn" | "error";

type LogFields = {
  requestId?: string;
  route?: string;
  applicationId?: string;
  durationMs?: number | null;
  [key: string]: unknown;
};

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  const requestId = fields.requestId ?? getRequestId() ?? "unknown";
  const route = fields.route ?? getRequestRoute();
  const applicationId = fields.applicationId ?? getContextApplicationId();
  const { requestId: _req, route: _route, applicationId: _app, ...rest } = fields;

  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    requestId,
    ...(route ? { route } : {}),
    ...(applicationId ? { applicationId } : {}),
    ...rest,
  };
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (process.env.NODE_ENV === "test" && process.env.TEST_LOGGING !== "true") {
    return;
  }
  let output: string;
  try {
    output = JSON.stringify(buildPayload(level, event, fields));
  } catch {
    output = JSON.stringify({ timestamp: new Date().toISOString(), level, event, serializationFailed: true });
  }
  if (level === "error") {
    process.stderr.write(`${output}\n`);
    return;
  }
  process.stdout.write(`${output}\n`);
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}

export function describeError(err: unknown): { name: string; message: string } {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: "unknown_error", message: String(err) };
}
