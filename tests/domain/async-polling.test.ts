import {
  DEFAULT_POLLING_CONFIG,
  POLLING_PRESETS,
  PollDecision,
  executeWithPollingBudget,
  mergePollingConfig,
  nextDelay,
} from '../../src/domain/async-polling';
import { AbortedError } from '../../src/runtime/clock';
import { VirtualClock } from '../helpers/fakes';

describe('mergePollingConfig', () => {
  it('returns a copy of the defaults when no override is given', () => {
    const config = mergePollingConfig();
    expect(config).toEqual(DEFAULT_POLLING_CONFIG);
    expect(config).not.toBe(DEFAULT_POLLING_CONFIG);
  });

  it('merges partial overrides', () => {
    expect(mergePollingConfig({ budgetMs: 1_000 })).toEqual({ intervalMs: 5_000, budgetMs: 1_000, backoff: 'fixed' });
  });
});

describe('nextDelay', () => {
  it('is constant for fixed backoff', () => {
    expect(nextDelay(POLLING_PRESETS.rollout, 1)).toBe(5_000);
    expect(nextDelay(POLLING_PRESETS.rollout, 7)).toBe(5_000);
  });

  it('doubles up to the cap for exponential backoff', () => {
    const delays = [1, 2, 3, 4, 5, 6].map((n) => nextDelay(POLLING_PRESETS.builderReadiness, n));
    expect(delays).toEqual([250, 500, 1_000, 2_000, 4_000, 4_000]);
  });
});

describe('executeWithPollingBudget', () => {
  it('returns the value once the poll reports done', async () => {
    const clock = new VirtualClock();
    const decisions: PollDecision<string>[] = [
      { kind: 'pending' },
      { kind: 'pending' },
      { kind: 'done', value: 'ready' },
    ];
    const result = await executeWithPollingBudget(
      async (n) => decisions[n - 1],
      { intervalMs: 5_000, budgetMs: 60_000, backoff: 'fixed' },
      clock,
    );
    expect(result).toEqual({ success: true, data: 'ready', pollCount: 3, totalElapsedMs: 10_000, timedOut: false, stopped: false });
    expect(clock.sleeps).toEqual([5_000, 5_000]);
  });

  it('never sleeps past the budget', async () => {
    const clock = new VirtualClock();
    const result = await executeWithPollingBudget<never>(
      async () => ({ kind: 'pending' }),
      { intervalMs: 5_000, budgetMs: 12_000, backoff: 'fixed' },
      clock,
    );
    expect(result.timedOut).toBe(true);
    expect(result.success).toBe(false);
    expect(result.pollCount).toBe(4);
    expect(result.totalElapsedMs).toBe(12_000);
    expect(clock.sleeps).toEqual([5_000, 5_000, 2_000]);
  });

  it('stops on a terminal decision', async () => {
    const result = await executeWithPollingBudget<never>(
      async () => ({ kind: 'stop', reason: 'CrashLoopBackOff' }),
      POLLING_PRESETS.rollout,
      new VirtualClock(),
    );
    expect(result).toMatchObject({ success: false, stopped: true, timedOut: false, error: 'CrashLoopBackOff', pollCount: 1 });
  });

  it('reports poll errors and keeps polling', async () => {
    const errors: number[] = [];
    let calls = 0;
    const result = await executeWithPollingBudget(
      async () => {
        calls++;
        if (calls === 1) throw new Error('connection refused');
        return { kind: 'done', value: calls };
      },
      { intervalMs: 100, budgetMs: 1_000, backoff: 'fixed', onPollError: (_err, n) => errors.push(n) },
      new VirtualClock(),
    );
    expect(result.data).toBe(2);
    expect(errors).toEqual([1]);
  });

  it('emits progress after every poll', async () => {
    const remaining: number[] = [];
    await executeWithPollingBudget<never>(
      async () => ({ kind: 'pending', statusMessage: 'waiting' }),
      { intervalMs: 400, budgetMs: 1_000, backoff: 'fixed', onProgress: (p) => remaining.push(p.remainingBudgetMs) },
      new VirtualClock(),
    );
    expect(remaining).toEqual([1_000, 600, 200, 0]);
  });

  it('rejects with AbortedError when the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort('stop requested');
    await expect(
      executeWithPollingBudget(async () => ({ kind: 'done', value: 1 }), POLLING_PRESETS.rollout, new VirtualClock(), controller.signal),
    ).rejects.toThrow(AbortedError);
  });
});
