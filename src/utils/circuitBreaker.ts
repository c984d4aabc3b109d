import { StageExecutionError } from "../errors/StageExecutionError";
import { logInfo, logWarn } from "../observability/logger";

type BreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type CircuitBreakerOptions = {
  failureThreshold: number;
  cooldownMs: number;
  now?: () => number;
};

const breakers = new Map<string, CircuitBreaker>();

/**
 * Fails calls fast once an upstream keeps failing. After the cool-down a
 * single trial call is let through; its outcome closes or reopens the breaker.
 */
export class CircuitBreaker {
  private state: BreakerState = "CLOSED";
  private failures = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const trial = this.admit();
    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (err) {
      this.recordFailure();
      throw err;
    } finally {
      if (trial) {
        this.trialInFlight = false;
      }
    }
  }

  /** Resolves whether the call may run; true when it is the half-open trial. */
  private admit(): boolean {
    if (this.state === "OPEN" && this.now() - this.openedAt >= this.options.cooldownMs) {
      this.state = "HALF_OPEN";
    }
    if (this.state === "CLOSED") {
      return false;
    }
    if (this.state === "HALF_OPEN" && !this.trialInFlight) {
      this.trialInFlight = true;
      return true;
    }
    throw new StageExecutionError({
      stage: this.name,
      reason: "circuit_open",
      message: `${this.name} temporarily disabled due to repeated failures.`,
    });
  }

  private recordSuccess(): void {
    if (this.state !== "CLOSED") {
      logInfo("circuit_breaker_closed", { breaker: this.name });
    }
    this.state = "CLOSED";
    this.failures = 0;
  }

  private recordFailure(): void {
    this.failures += 1;
    if (this.state === "HALF_OPEN" || this.failures >= this.options.failureThreshold) {
      if (this.state !== "OPEN") {
        logWarn("circuit_breaker_opened", { breaker: this.name, failures: this.failures });
      }
      this.state = "OPEN";
      this.openedAt = this.now();
    }
  }
}

export function getCircuitBreaker(name: string, options: CircuitBreakerOptions): CircuitBreaker {
  const existing = breakers.get(name);
  if (existing) {
    return existing;
  }
  const breaker = new CircuitBreaker(name, options);
  breakers.set(name, breaker);
  return breaker;
}

export function resetCircuitBreakers(): void {
  breakers.clear();
}
