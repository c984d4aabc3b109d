import { describeError, logError } from "./observability/logger";
import { startServer } from "./server/index";

startServer().catch((err: unknown) => {
  logError("server_start_failed", { error: describeError(err) });
  process.exit(1);
});
