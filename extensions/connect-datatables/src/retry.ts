/**
 * Retry Utilities
 *
 * Backoff computation shared by the conflict retry manager, error
 * classification for Amazon Connect responses, and a throttling-aware
 * runner for idempotent read calls.
 */

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Defaults for throttled read calls
 */
export const READ_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const code = err.code;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Exponential delay before the retry that follows `attempt` (1-based)
 */
export function computeBackoffDelay(attempt: number, config: Required<RetryConfig>): number {
  const base = config.minDelayMs * 2 ** (attempt - 1);
  const delay = applyJitter(Math.min(base, config.maxDelayMs), config.jitter);
  return Math.min(Math.max(delay, config.minDelayMs), config.maxDelayMs);
}

async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const resolved = resolveRetryConfig(READ_RETRY_DEFAULTS, options);
  const shouldRetry = options.shouldRetry ?? (() => true);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= resolved.attempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= resolved.attempts || !shouldRetry(err, attempt)) break;

      const delay = computeBackoffDelay(attempt, resolved);
      options.onRetry?.({
        attempt,
        maxAttempts: resolved.attempts,
        delayMs: delay,
        err,
        label: options.label,
      });
      await sleep(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

// =============================================================================
// Error Classification
// =============================================================================

const THROTTLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "LimitExceededException",
]);

const TRANSPORT_CODES = new Set([
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalServiceException",
  "InternalServerError",
  "RequestTimeout",
  "TimeoutError",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EPIPE",
]);

const TRANSPORT_PATTERN = /timeout|timed out|socket hang up|ECONNRESET|ETIMEDOUT|ECONNREFUSED|network/i;

const CONFLICT_PATTERN = /concurrency conflict|lock version/i;

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

function httpStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

export function isThrottlingError(err: unknown): boolean {
  const code = extractErrorCode(err) ?? errorName(err);
  if (code && THROTTLE_CODES.has(code)) return true;
  return httpStatus(err) === 429;
}

/**
 * Timeouts, dropped connections and 5xx responses
 */
export function isTransportError(err: unknown): boolean {
  if (!err) return false;
  const code = extractErrorCode(err);
  if (code && TRANSPORT_CODES.has(code)) return true;
  const name = errorName(err);
  if (name && TRANSPORT_CODES.has(name)) return true;
  const status = httpStatus(err);
  if (status !== undefined && status >= 500) return true;
  return TRANSPORT_PATTERN.test(formatErrorMessage(err));
}

/**
 * A thrown error rejecting the whole call over an outdated lock version
 */
export function isConflictError(err: unknown): boolean {
  if (!err) return false;
  if (errorName(err) === "ConflictException" || extractErrorCode(err) === "ConflictException") return true;
  return CONFLICT_PATTERN.test(formatErrorMessage(err));
}

/**
 * Item-level message reporting an outdated lock version
 */
export function isConflictMessage(message: string): boolean {
  return CONFLICT_PATTERN.test(message);
}

// =============================================================================
// Read Call Runner
// =============================================================================

export type ConnectRetryOptions = {
  retry?: RetryConfig;
  label?: string;
  onRetry?: (info: RetryInfo) => void;
};

/**
 * Run an idempotent Connect read call, retrying throttling and transport errors
 *
 * @example
 * ```typescript
 * const response = await withConnectRetry(
 *   () => client.send(new ListDataTablesCommand({ InstanceId: instanceArn })),
 *   { label: "ListDataTables" }
 * );
 * ```
 */
export async function withConnectRetry<T>(fn: () => Promise<T>, options: ConnectRetryOptions = {}): Promise<T> {
  return retryAsync(fn, {
    ...options.retry,
    label: options.label,
    shouldRetry: (err) => isThrottlingError(err) || isTransportError(err),
    onRetry: options.onRetry,
  });
}
