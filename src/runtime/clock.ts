/**
 * Time source for every wait in the pipeline.
 *
 * Readiness polls, rollout polls and stage timeouts all go through a Clock
 * so a run's waits can be driven deterministically.
 */

export interface Clock {
  now(): number;
  /** Resolve after `ms`, or reject with the signal's reason once it aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Error used when a wait is interrupted by an abort signal. */
export class AbortedError extends Error {
  constructor(public readonly reason: string = 'aborted') {
    super(reason);
    this.name = 'AbortedError';
  }
}

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return 'aborted';
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedError(abortReason(signal)));
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new AbortedError(signal ? abortReason(signal) : 'aborted'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};
