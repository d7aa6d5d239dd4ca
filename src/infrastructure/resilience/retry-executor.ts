import type { RetryConfig } from "../../core/domain/entities/config.entity.js";
import type { ILogger } from "../../core/domain/services/logger.service.js";
import { BreakerOpenError, errorMessage } from "../../core/domain/errors.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import { classifyFailure } from "./failure-classifier.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface ExecuteOptions {
  operationName: string;
  breaker?: CircuitBreaker;
  /** Overrides the policy's retry budget for this call. */
  maxRetries?: number;
}

/**
 * Breaker-gated retry with exponential backoff and jitter. Attempts are
 * strictly sequential; the only wait between them is the backoff sleep.
 */
export class RetryExecutor {
  constructor(
    private readonly policy: RetryConfig,
    private readonly logger: ILogger,
    private readonly sleepFn: Sleep = sleep,
    private readonly random: () => number = Math.random,
  ) {}

  /** Seconds to wait after the given zero-based attempt: base^attempt plus [0, jitterMax). */
  backoffSeconds(attempt: number): number {
    const exponential = this.policy.backoffBase ** attempt;
    return exponential + this.random() * this.policy.jitterMaxSeconds;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: ExecuteOptions,
  ): Promise<T> {
    const { breaker, operationName } = options;
    const maxRetries = Math.max(0, options.maxRetries ?? this.policy.maxRetries);
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (breaker && !breaker.canAttempt()) {
        throw new BreakerOpenError(breaker.name);
      }

      try {
        const result = await operation(attempt);
        breaker?.recordSuccess();
        return result;
      } catch (e) {
        lastError = e;
        breaker?.recordFailure();

        if (classifyFailure(e) === "terminal") {
          this.logger.log({
            level: "warn",
            component: "retry",
            message: `${operationName} - terminal error, not retrying: ${errorMessage(e)}`,
            kind: "terminal_request",
          });
          throw e;
        }

        if (attempt >= maxRetries) {
          this.logger.log({
            level: "warn",
            component: "retry",
            message: `${operationName} - max retries exhausted: ${errorMessage(e)}`,
            kind: "transient_network",
            data: { attempts: attempt + 1 },
          });
          throw e;
        }

        const backoff = this.backoffSeconds(attempt);
        this.logger.log({
          level: "info",
          component: "retry",
          message: `${operationName} - attempt ${attempt + 1}/${maxRetries + 1} failed, retrying in ${backoff.toFixed(2)}s: ${errorMessage(e)}`,
          kind: "transient_network",
        });
        await this.sleepFn(backoff * 1000);
      }
    }

    throw lastError;
  }
}
