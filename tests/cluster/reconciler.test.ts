import { ClusterReconciler } from '../../src/cluster/reconciler';
import { buildDescriptor } from '../../src/domain/descriptor';
import { PipelineError } from '../../src/domain/errors';
import { RolloutObservation } from '../../src/domain/rollout';
import { defaultConfig } from '../../src/config';
import { FakeClusterClient, VirtualClock, observation } from '../helpers/fakes';

const progressing = observation({ updatedReplicas: 1, readyReplicas: 0 });
const ready = observation({ updatedReplicas: 3, readyReplicas: 3, availableReplicas: 3 });

function document() {
  return buildDescriptor({ ...defaultConfig('/tmp/project').deployment, namespace: 'default', image: 'registry.example.com/web:1' });
}

describe('ClusterReconciler.apply', () => {
  it('refuses to apply without cluster credentials', async () => {
    const client = new FakeClusterClient();
    client.credentials = false;
    const reconciler = new ClusterReconciler(client, {}, new VirtualClock());

    await expect(reconciler.apply(document(), undefined, 'Deploy')).rejects.toMatchObject({
      typedError: { code: 'CLUSTER.CREDENTIALS_MISSING', stage: 'Deploy' },
    });
    expect(client.applied).toHaveLength(0);
  });

  it('reports no change when the same document is applied twice', async () => {
    const client = new FakeClusterClient();
    const reconciler = new ClusterReconciler(client, {}, new VirtualClock());

    const first = await reconciler.apply(document());
    const second = await reconciler.apply(document());

    expect(first.changed).toBe(true);
    expect(second.changed).toBe(false);
    expect(client.applied[0]).toBe(client.applied[1]);
  });
});

describe('ClusterReconciler.waitForRollout', () => {
  it('converges at 45 seconds when polled every 5 seconds', async () => {
    const client = new FakeClusterClient();
    client.observations = [...Array<RolloutObservation>(9).fill(progressing), ready];
    const reconciler = new ClusterReconciler(client, { pollIntervalMs: 5_000 }, new VirtualClock());

    const outcome = await reconciler.waitForRollout('web', 'default', 60_000);

    expect(outcome.state).toBe('converged');
    expect(outcome.elapsedMs).toBe(45_000);
    expect(outcome.polls).toBe(10);
  });

  it('times out after the rollout timeout', async () => {
    const client = new FakeClusterClient();
    client.observations = [progressing];
    const clock = new VirtualClock();
    const reconciler = new ClusterReconciler(client, { pollIntervalMs: 5_000 }, clock);

    const outcome = await reconciler.waitForRollout('web', 'default', 120_000);

    expect(outcome).toEqual({ state: 'timed-out', elapsedMs: 120_000, polls: 25, last: progressing });
    expect(clock.now()).toBe(120_000);
  });

  it('fails as soon as a pod reports a terminal waiting reason', async () => {
    const client = new FakeClusterClient();
    client.observations = [progressing, progressing, observation({ waitingReasons: ['CrashLoopBackOff'] })];
    const reconciler = new ClusterReconciler(client, { pollIntervalMs: 5_000 }, new VirtualClock());

    const outcome = await reconciler.waitForRollout('web', 'default', 120_000);

    expect(outcome.state).toBe('failed');
    expect(outcome.polls).toBe(3);
    expect(outcome.elapsedMs).toBe(10_000);
    if (outcome.state === 'failed') expect(outcome.reason).toBe('CrashLoopBackOff');
  });

  it('keeps polling through a transient status error', async () => {
    class FlakyClient extends FakeClusterClient {
      private failed = false;
      override async getRolloutStatus(): Promise<RolloutObservation> {
        if (!this.failed) {
          this.failed = true;
          throw new PipelineError({ code: 'CLUSTER.COMMAND_FAILED', message: 'connection refused', retryable: true, suggestedFixes: [] });
        }
        return super.getRolloutStatus();
      }
    }
    const client = new FlakyClient();
    client.observations = [ready];
    const reconciler = new ClusterReconciler(client, { pollIntervalMs: 5_000 }, new VirtualClock());

    const outcome = await reconciler.waitForRollout('web', 'default', 60_000);

    expect(outcome.state).toBe('converged');
    expect(outcome.polls).toBe(2);
    expect(outcome.elapsedMs).toBe(5_000);
  });
});
