/**
 * Bounded polling.
 *
 * Both waits in the pipeline are polls under a hard wall-clock budget:
 * the builder daemon's readiness probe (exponential backoff) and the
 * deployment rollout status (fixed interval). The first poll happens
 * immediately; the last one happens at or just before the budget ends.
 *
 * A poll that throws is treated as "still pending" and reported through
 * onPollError; only an explicit `stop` decision ends polling early.
 */

import { AbortedError, Clock, abortReason } from '../runtime/clock';

/** Progress info emitted after each poll. */
export interface PollingProgress {
  pollCount: number;
  elapsedMs: number;
  remainingBudgetMs: number;
  statusMessage?: string;
}

export interface PollingConfig {
  /** Delay before the second poll. */
  intervalMs: number;
  /** Total wall-clock budget. */
  budgetMs: number;
  backoff: 'fixed' | 'exponential';
  /** Upper bound on the delay when backing off exponentially. */
  maxIntervalMs?: number;
  onProgress?: (progress: PollingProgress) => void;
  onPollError?: (error: unknown, pollCount: number) => void;
}

export const DEFAULT_POLLING_CONFIG: Readonly<PollingConfig> = {
  intervalMs: 5_000,
  budgetMs: 120_000,
  backoff: 'fixed',
};

/** Presets for the two waits the pipeline performs. */
export const POLLING_PRESETS = {
  rollout: {
    intervalMs: 5_000,
    budgetMs: 120_000,
    backoff: 'fixed',
  } satisfies PollingConfig,

  builderReadiness: {
    intervalMs: 250,
    budgetMs: 30_000,
    backoff: 'exponential',
    maxIntervalMs: 4_000,
  } satisfies PollingConfig,
} as const;

/** Merge a partial polling config over the defaults. */
export function mergePollingConfig(override?: Partial<PollingConfig>): PollingConfig {
  if (!override) return { ...DEFAULT_POLLING_CONFIG };
  return { ...DEFAULT_POLLING_CONFIG, ...override };
}

export type PollDecision<T> =
  | { kind: 'done'; value: T }
  | { kind: 'pending'; statusMessage?: string }
  | { kind: 'stop'; reason: string };

export interface PollResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  pollCount: number;
  totalElapsedMs: number;
  timedOut: boolean;
  /** The poll function asked to stop (terminal condition). */
  stopped: boolean;
}

/** Delay before poll number `pollCount + 1`. */
export function nextDelay(config: PollingConfig, pollCount: number): number {
  if (config.backoff === 'fixed') return config.intervalMs;
  const delay = config.intervalMs * Math.pow(2, pollCount - 1);
  return config.maxIntervalMs !== undefined ? Math.min(delay, config.maxIntervalMs) : delay;
}

/**
 * Poll until the poll function reports done or stop, or the budget is
 * spent. Rejects with AbortedError if the signal fires.
 */
export async function executeWithPollingBudget<T>(
  poll: (pollCount: number) => Promise<PollDecision<T>>,
  config: PollingConfig,
  clock: Clock,
  signal?: AbortSignal,
): Promise<PollResult<T>> {
  const startTime = clock.now();
  let pollCount = 0;

  for (;;) {
    if (signal?.aborted) throw new AbortedError(abortReason(signal));
    pollCount++;

    let decision: PollDecision<T>;
    try {
      decision = await poll(pollCount);
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      config.onPollError?.(err, pollCount);
      decision = { kind: 'pending', statusMessage: err instanceof Error ? err.message : String(err) };
    }

    const elapsed = clock.now() - startTime;
    config.onProgress?.({
      pollCount,
      elapsedMs: elapsed,
      remainingBudgetMs: Math.max(0, config.budgetMs - elapsed),
      statusMessage: decision.kind === 'pending' ? decision.statusMessage : undefined,
    });

    if (decision.kind === 'done') {
      return { success: true, data: decision.value, pollCount, totalElapsedMs: elapsed, timedOut: false, stopped: false };
    }
    if (decision.kind === 'stop') {
      return { success: false, error: decision.reason, pollCount, totalElapsedMs: elapsed, timedOut: false, stopped: true };
    }
    if (elapsed >= config.budgetMs) {
      return {
        success: false,
        error: `Poll budget exhausted after ${pollCount} attempts (${config.budgetMs}ms)`,
        pollCount,
        totalElapsedMs: elapsed,
        timedOut: true,
        stopped: false,
      };
    }

    await clock.sleep(Math.min(nextDelay(config, pollCount), config.budgetMs - elapsed), signal);
  }
}
