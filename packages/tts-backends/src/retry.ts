import { isAxiosError } from 'axios';

import { SynthesisError, errorMessage } from '@voicescript/contracts';

const RETRYABLE_STATUS = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: SynthesisError }) => void;
}

export function isRetryableStatus(status: number | undefined): boolean {
  return status !== undefined && RETRYABLE_STATUS.has(status);
}

/** HTTP status carried by an axios error or an SDK error, if any. */
export function statusOf(error: unknown): number | undefined {
  if (error instanceof SynthesisError) return error.status;
  if (isAxiosError(error)) return error.response?.status;
  if (typeof error === 'object' && error !== null) {
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    if ('status' in error && typeof error.status === 'number') return error.status;
  }
  return undefined;
}

export function toSynthesisError(
  error: unknown,
  context: { voice: string; service: string },
): SynthesisError {
  if (error instanceof SynthesisError) return error;
  const status = statusOf(error);
  const detail = status === undefined ? errorMessage(error) : `HTTP ${status}: ${errorMessage(error)}`;
  return new SynthesisError(
    `${context.service} failed to synthesize with voice "${context.voice}": ${detail}`,
    { ...context, status, retryable: isRetryableStatus(status) },
    { cause: error },
  );
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `task` until it succeeds, giving up on the first non-retryable
 * `SynthesisError` or after `attempts` tries. Delays double from `baseDelayMs`.
 */
export async function withRetry<T>(task: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts = 3, baseDelayMs = 400, sleep = wait, onRetry } = options;
  let attempt = 0;
  for (;;) {
    try {
      return await task();
    } catch (err: unknown) {
      if (!(err instanceof SynthesisError) || !err.retryable || attempt >= attempts - 1) throw err;
      const delayMs = baseDelayMs * 2 ** attempt;
      onRetry?.({ attempt: attempt + 1, delayMs, error: err });
      await sleep(delayMs);
      attempt++;
    }
  }
}
