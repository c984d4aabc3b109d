import { isTerminalStage, type WorkflowStage } from "../applications/applicationStage";
import { TimeoutError } from "../../utils/withTimeout";

export type PollOptions = {
  initialIntervalMs?: number;
  maxIntervalMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Polls until the application reaches DECISION_MADE or ERROR, doubling the
 * interval after each check up to `maxIntervalMs`.
 */
export async function waitForTerminalStage<T extends { currentStage: WorkflowStage }>(
  getStatus: (applicationId: string) => Promise<T>,
  applicationId: string,
  options: PollOptions = {}
): Promise<T> {
  const initialIntervalMs = options.initialIntervalMs ?? 2000;
  const maxIntervalMs = options.maxIntervalMs ?? 30_000;
  const timeoutMs = options.timeoutMs ?? 10 * 60_000;
  const sleep = options.sleep ?? defaultSleep;

  let interval = initialIntervalMs;
  let waited = 0;
  for (;;) {
    const status = await getStatus(applicationId);
    if (isTerminalStage(status.currentStage)) {
      return status;
    }
    if (waited >= timeoutMs) {
      throw new TimeoutError(`polling ${applicationId}`, timeoutMs);
    }
    const delay = Math.min(interval, timeoutMs - waited);
    await sleep(delay);
    waited += delay;
    interval = Math.min(interval * 2, maxIntervalMs);
  }
}
