// src/util/retry.ts
// What: The single retry layer for calls to the hosted model APIs (the OpenAI SDK's own retries are switched off).
// How: withBackoff() runs `action` up to maxAttempts times. A failure the classifier calls permanent (by default
//      any 4xx except 429) is rethrown at once; otherwise it is logged as `<label> request failed; retrying` and
//      the next attempt waits initialDelayMs * 2^(attempt-1), capped at maxDelayMs and jittered into [d/2, d].

import defaultLogger, { type Logger } from '../logging.js';

export interface BackoffOptions {
  label: string;
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  isRetryable?: (error: unknown) => boolean;
  logger?: Logger;
}

export function getStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function isTransientApiError(error: unknown): boolean {
  const status = getStatus(error);
  return status === undefined || status === 429 || status < 400 || status >= 500;
}

export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number, jitter: boolean): number {
  const ceiling = Math.min(initialDelayMs * 2 ** (attempt - 1), maxDelayMs);
  return Math.round(jitter ? ceiling / 2 + Math.random() * (ceiling / 2) : ceiling);
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export async function withBackoff<T>(action: (attempt: number) => Promise<T>, options: BackoffOptions): Promise<T> {
  const {
    label,
    maxAttempts = 3,
    initialDelayMs = 500,
    maxDelayMs = 10_000,
    jitter = true,
    isRetryable = isTransientApiError,
    logger = defaultLogger,
  } = options;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await action(attempt);
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) throw err;
      const delayMs = backoffDelay(attempt, initialDelayMs, maxDelayMs, jitter);
      logger.warn({ err, attempt, maxAttempts: attempts, delayMs, status: getStatus(err) }, `${label} request failed; retrying`);
      await sleep(delayMs);
    }
  }
}
