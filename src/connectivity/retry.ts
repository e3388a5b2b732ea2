import type { Logger } from "../config/logger";

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function normalizeRetryOptions(input: RetryOptions | undefined): RetryPolicy {
  return {
    attempts: Math.max(1, Math.min(input?.attempts ?? 3, 10)),
    baseDelayMs: Math.max(0, input?.baseDelayMs ?? 100),
    maxDelayMs: Math.max(0, input?.maxDelayMs ?? 1_000),
    jitterMs: Math.max(0, input?.jitterMs ?? 50),
  };
}

export function backoffDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return exponential + Math.floor(random() * (policy.jitterMs + 1));
}

export async function withRetry<T>(
  operationName: string,
  operation: () => Promise<T>,
  logger: Logger,
  options: RetryOptions = {}
): Promise<T> {
  const policy = normalizeRetryOptions(options);
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      if (attempt > 1) {
        logger.debug("store_retry_attempt", { operation: operationName, attempt });
      }
      return await operation();
    } catch (error) {
      if (attempt >= policy.attempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelayMs(policy, attempt);
      logger.warn("store_retry_delay", {
        operation: operationName,
        attempt,
        delayMs,
        message: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs);
    }
  }
}
