import type { LogMeta, Logger } from "../config/logger";
import { withRetry, type RetryOptions } from "../connectivity/retry";

export type StoreErrorKind = "unavailable" | "timeout" | "constraint" | "empty_batch" | "invalid_input" | "unknown";

export class StationStoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly operation: string;
  readonly retryable: boolean;
  readonly userMessage: string;
  readonly debugMessage: string;
  readonly code?: string;

  constructor(input: {
    kind: StoreErrorKind;
    operation: string;
    retryable: boolean;
    userMessage: string;
    debugMessage: string;
    code?: string;
    cause?: unknown;
  }) {
    super(input.debugMessage, { cause: input.cause });
    this.name = "StationStoreError";
    this.kind = input.kind;
    this.operation = input.operation;
    this.retryable = input.retryable;
    this.userMessage = input.userMessage;
    this.debugMessage = input.debugMessage;
    this.code = input.code;
  }
}

export type StoreFailure = { ok: false; error: StationStoreError };

export type StoreOutcome<T> = { ok: true; value: T } | StoreFailure;

export function succeeded<T>(value: T): StoreOutcome<T> {
  return { ok: true, value };
}

export function failed(error: StationStoreError): StoreFailure {
  return { ok: false, error };
}

type ErrorLike = {
  message?: unknown;
  code?: unknown;
};

// Connection exceptions (08xxx), admin shutdown, too many connections, serialization failure.
const RETRYABLE_PG_CODES = new Set(["57P01", "53300", "40001", "40P01"]);
const CONSTRAINT_PG_CLASS = "23";

function asErrorLike(value: unknown): ErrorLike {
  if (!value || typeof value !== "object") return {};
  const output: ErrorLike = {};
  if ("message" in value) output.message = value.message;
  if ("code" in value) output.code = value.code;
  return output;
}

function isConnectivityMessage(lower: string): boolean {
  return (
    lower.includes("econnrefused") ||
    lower.includes("econnreset") ||
    lower.includes("connection terminated") ||
    lower.includes("connection refused") ||
    lower.includes("getaddrinfo")
  );
}

export function invalidInput(operation: string, debugMessage: string): StationStoreError {
  return new StationStoreError({
    kind: "invalid_input",
    operation,
    retryable: false,
    userMessage: debugMessage,
    debugMessage,
  });
}

export function toStationStoreError(error: unknown, operation: string): StationStoreError {
  if (error instanceof StationStoreError) return error;

  const like = asErrorLike(error);
  const debugMessage =
    (typeof like.message === "string" ? like.message : String(error)).trim() || "storage operation failed";
  const code = typeof like.code === "string" && like.code.trim() ? like.code.trim() : undefined;
  const lower = debugMessage.toLowerCase();

  if (lower.includes("timed out") || lower.includes("timeout")) {
    return new StationStoreError({
      kind: "timeout",
      operation,
      retryable: true,
      userMessage: "The station table is slow to respond. Try again.",
      debugMessage,
      code,
      cause: error,
    });
  }

  if (
    (code && (code.startsWith("08") || RETRYABLE_PG_CODES.has(code))) ||
    isConnectivityMessage(lower)
  ) {
    return new StationStoreError({
      kind: "unavailable",
      operation,
      retryable: true,
      userMessage: "The station table is unavailable. Try again.",
      debugMessage,
      code,
      cause: error,
    });
  }

  if (code?.startsWith(CONSTRAINT_PG_CLASS)) {
    return new StationStoreError({
      kind: "constraint",
      operation,
      retryable: false,
      userMessage: "That change conflicts with a stored station.",
      debugMessage,
      code,
      cause: error,
    });
  }

  return new StationStoreError({
    kind: "unknown",
    operation,
    retryable: false,
    userMessage: "Something went wrong reading the station table.",
    debugMessage,
    code,
    cause: error,
  });
}

export type StoreCallRetry = Omit<RetryOptions, "shouldRetry">;

/**
 * Runs one storage call with retries for retryable failures and folds the
 * result into a StoreOutcome. Failures are logged before they are returned.
 */
export async function attemptStoreCall<T>(
  operation: string,
  meta: LogMeta,
  task: () => Promise<T>,
  logger: Logger,
  retry: StoreCallRetry = {}
): Promise<StoreOutcome<T>> {
  try {
    const value = await withRetry(operation, task, logger, {
      ...retry,
      shouldRetry: (error) => toStationStoreError(error, operation).retryable,
    });
    return succeeded(value);
  } catch (error) {
    const storeError = toStationStoreError(error, operation);
    logger.error("station_store_failed", {
      operation,
      ...meta,
      kind: storeError.kind,
      retryable: storeError.retryable,
      message: storeError.debugMessage,
    });
    return failed(storeError);
  }
}
