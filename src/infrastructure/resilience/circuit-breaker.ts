import type { BreakerConfig } from "../../core/domain/entities/config.entity.js";
import type { ILogger } from "../../core/domain/services/logger.service.js";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  /** Consecutive failures that open a closed breaker. */
  failureThreshold: number;
  recoveryTimeoutMs: number;
  /** Successes in half-open needed to close again. */
  recoveryThreshold: number;
}

export interface CircuitBreakerState {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime?: number;
  thresholds: CircuitBreakerOptions;
}

export function breakerOptionsFromConfig(
  config: BreakerConfig,
): CircuitBreakerOptions {
  return {
    failureThreshold: config.failureThreshold,
    recoveryTimeoutMs: config.recoveryTimeoutSeconds * 1000,
    recoveryThreshold: config.recoveryThreshold,
  };
}

/**
 * Per-resource breaker. Half-open lets every caller through; probes are
 * not serialised.
 */
export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | undefined;

  constructor(
    readonly name: string,
    private readonly options: CircuitBreakerOptions,
    private readonly logger: ILogger,
    private readonly now: () => number = Date.now,
  ) {}

  canAttempt(): boolean {
    switch (this.state) {
      case "closed":
        return true;
      case "open":
        if (this.recoveryTimeoutElapsed()) {
          this.transition("half_open");
          return true;
        }
        return false;
      case "half_open":
        return true;
    }
  }

  recordSuccess(): void {
    if (this.state === "half_open") {
      this.successCount++;
      if (this.successCount >= this.options.recoveryThreshold) {
        this.transition("closed");
      }
    } else if (this.state === "closed") {
      this.failureCount = 0;
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === "half_open") {
      this.transition("open");
    } else if (
      this.state === "closed" &&
      this.failureCount >= this.options.failureThreshold
    ) {
      this.transition("open");
    }
  }

  snapshot(): CircuitBreakerState {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      thresholds: { ...this.options },
    };
  }

  private recoveryTimeoutElapsed(): boolean {
    if (this.lastFailureTime === undefined) return true;
    return this.now() - this.lastFailureTime >= this.options.recoveryTimeoutMs;
  }

  private transition(next: CircuitState): void {
    this.state = next;
    this.successCount = 0;
    if (next === "closed") this.failureCount = 0;

    const message =
      next === "open"
        ? "OPENED - rejecting requests"
        : next === "half_open"
          ? "HALF-OPEN - testing recovery"
          : "CLOSED - normal operation resumed";
    this.logger.log({
      level: next === "open" ? "warn" : "info",
      component: `breaker:${this.name}`,
      message,
      kind: next === "open" ? "breaker_open" : undefined,
      data: { failureCount: this.failureCount },
    });
  }
}
