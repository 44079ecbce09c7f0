import * as functions from 'firebase-functions';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffFactor?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Tag used in the retry log line, e.g. "[stt]". */
  label?: string;
}

// External calls sit on a user's request path, so keep retries short.
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 2,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  backoffFactor: 2,
  shouldRetry: () => true,
  label: '[retry]',
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Executes a function with exponential backoff retry logic
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  let currentDelay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= config.maxAttempts || !config.shouldRetry(error)) {
        throw error;
      }

      functions.logger.warn(
        `${config.label} Attempt ${attempt}/${config.maxAttempts} failed, retrying in ${currentDelay}ms`,
      );
      await delay(currentDelay);
      currentDelay = Math.min(currentDelay * config.backoffFactor, config.maxDelayMs);
    }
  }
}
