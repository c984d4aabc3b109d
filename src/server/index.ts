import type { Server } from "http";
import { getPort } from "../config";
import { describeError, logError, logInfo } from "../observability/logger";
import { createServer, type CreateServerOptions, type ServerContext } from "./createServer";

let processHandlersInstalled = false;

function installProcessHandlers(): void {
  if (processHandlersInstalled) return;
  processHandlersInstalled = true;

  process.on("unhandledRejection", (err) => {
    logError("unhandled_rejection", { error: describeError(err) });
  });

  process.on("uncaughtException", (err) => {
    logError("uncaught_exception", { error: describeError(err) });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Stops accepting requests, then waits for scheduled applications to finish. */
async function shutdown(server: Server, context: ServerContext, signal: string): Promise<void> {
  logInfo("server_shutdown_started", { signal });
  await closeServer(server);
  await context.orchestrator.whenIdle();
  logInfo("server_shutdown_complete", { signal });
}

export async function startServer(options: CreateServerOptions = {}): Promise<Server> {
  installProcessHandlers();
  const context = await createServer(options);
  const port = getPort();

  const server = await new Promise<Server>((resolve) => {
    const listener = context.app.listen(port, "0.0.0.0", () => {
      logInfo("server_listening", { port, ruleIndex: context.rules.status() });
      resolve(listener);
    });
  });

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    shutdown(server, context, signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError("server_shutdown_failed", { signal, error: describeError(err) });
        process.exit(1);
      });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  return server;
}
