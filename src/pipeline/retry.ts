import { CallTimeoutError, PipelineError } from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  callTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  callTimeoutMs: 180_000
};

export type AttemptOutcome<T> =
  | { kind: 'succeed'; value: T }
  | { kind: 'retry'; error: Error }
  | { kind: 'fail'; error: Error };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number; exhausted: boolean };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Bounds a single external call. The underlying request keeps running after a
 * timeout since the collaborators are not guaranteed to be cancelable.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CallTimeoutError(timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function classify<T>(error: unknown): AttemptOutcome<T> {
  const normalized = error instanceof Error ? error : new Error(String(error));
  if (error instanceof PipelineError && error.retryable) {
    return { kind: 'retry', error: normalized };
  }
  return { kind: 'fail', error: normalized };
}

export async function attempt<T>(call: () => Promise<T>, timeoutMs: number): Promise<AttemptOutcome<T>> {
  try {
    const value = await withTimeout(call(), timeoutMs);
    return { kind: 'succeed', value };
  } catch (error) {
    return classify<T>(error);
  }
}

export function backoffDelay(policy: RetryPolicy, attemptNumber: number): number {
  return policy.initialDelayMs * 2 ** (attemptNumber - 1);
}

export async function retryWithBackoff<T>(
  call: () => Promise<T>,
  policy: RetryPolicy,
  options: {
    sleep?: Sleep;
    onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
  } = {}
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attemptNumber = 1; ; attemptNumber++) {
    const outcome = await attempt(call, policy.callTimeoutMs);

    switch (outcome.kind) {
      case 'succeed':
        return { ok: true, value: outcome.value, attempts: attemptNumber };
      case 'fail':
        return { ok: false, error: outcome.error, attempts: attemptNumber, exhausted: false };
      case 'retry': {
        if (attemptNumber >= maxAttempts) {
          return { ok: false, error: outcome.error, attempts: attemptNumber, exhausted: true };
        }
        const delayMs = backoffDelay(policy, attemptNumber);
        options.onRetry?.(outcome.error, attemptNumber, delayMs);
        await wait(delayMs);
      }
    }
  }
}
