import { setTimeout as delay } from 'timers/promises';
import { GenerationCancelledError, TransportError } from './errors';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  factor?: number;
  maxDelayMs?: number;
  sleep?: SleepFn;
  isRetryable?: (error: unknown) => boolean;
}

export interface RetryAttempt {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: RetryAttempt) => void;
}

async function sleepWithSignal(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new GenerationCancelledError();
    }
    throw error;
  }
}

function isRetryableTransportError(error: unknown): boolean {
  return error instanceof TransportError;
}

/**
 * Bounded retry around a blocking model call. Every attempt reuses whatever the operation closes
 * over, so the prompt payload stays identical between attempts.
 */
export default class RetryPolicy {
  readonly maxAttempts: number;

  readonly baseDelayMs: number;

  readonly factor: number;

  readonly maxDelayMs: number;

  private sleep: SleepFn;

  private isRetryable: (error: unknown) => boolean;

  constructor({
    maxAttempts = 3,
    baseDelayMs = 1000,
    factor = 2,
    maxDelayMs = 30_000,
    sleep = sleepWithSignal,
    isRetryable = isRetryableTransportError,
  }: RetryPolicyOptions = {}) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }
    this.maxAttempts = maxAttempts;
    this.baseDelayMs = Math.max(0, baseDelayMs);
    this.factor = Math.max(1, factor);
    this.maxDelayMs = Math.max(this.baseDelayMs, maxDelayMs);
    this.sleep = sleep;
    this.isRetryable = isRetryable;
  }

  delayFor(failedAttempt: number): number {
    const raw = this.baseDelayMs * this.factor ** Math.max(0, failedAttempt - 1);
    return Math.min(Math.round(raw), this.maxDelayMs);
  }

  schedule(): number[] {
    return Array.from({ length: this.maxAttempts - 1 }, (_value, index) => this.delayFor(index + 1));
  }

  async run<T>(operation: (attempt: number) => Promise<T>, { signal, onRetry }: RetryRunOptions = {}): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) {
        throw new GenerationCancelledError();
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (!this.isRetryable(error)) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw error instanceof TransportError ? error.withAttempts(attempt) : error;
        }
        const delayMs = this.delayFor(attempt);
        onRetry?.({ attempt, delayMs, error });
        await this.sleep(delayMs, signal);
      }
    }
  }
}
