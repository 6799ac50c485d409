/**
 * Cluster Reconciler.
 *
 * Submits the deployment descriptor and waits, under a hard timeout, for
 * the cluster to report the rollout converged. The cluster reconciles; the
 * pipeline only asserts desired state and observes.
 */

import { executeWithPollingBudget } from '../domain/async-polling';
import { DescriptorDocument, renderDescriptor } from '../domain/descriptor';
import { PipelineError, clusterCredentialsMissingError } from '../domain/errors';
import { RolloutObservation, RolloutOutcome, classifyObservation } from '../domain/rollout';
import { Logger, logger as rootLogger } from '../logger';
import { Clock, systemClock } from '../runtime/clock';
import { ApplyResult, ClusterClient } from './cluster-client';

export interface ReconcilerOptions {
  /** Fixed delay between rollout polls. */
  pollIntervalMs: number;
}

export const DEFAULT_RECONCILER_OPTIONS: ReconcilerOptions = {
  pollIntervalMs: 5_000,
};

export class ClusterReconciler {
  private options: ReconcilerOptions;

  constructor(
    private client: ClusterClient,
    options?: Partial<ReconcilerOptions>,
    private clock: Clock = systemClock,
    private log: Logger = rootLogger.child({ module: 'reconciler' }),
  ) {
    this.options = { ...DEFAULT_RECONCILER_OPTIONS, ...options };
  }

  /** Submit the whole document. Applying an unchanged document reports `changed: false`. */
  async apply(doc: DescriptorDocument, signal?: AbortSignal, stage?: string): Promise<ApplyResult> {
    if (!this.client.hasCredentials()) {
      throw new PipelineError(clusterCredentialsMissingError(stage));
    }
    const result = await this.client.apply(renderDescriptor(doc), signal);
    this.log.info('Descriptor applied', {
      changed: result.changed,
      objects: result.objects.map((o) => `${o.kind}/${o.name} ${o.action}`),
    });
    return result;
  }

  async waitForRollout(name: string, namespace: string, timeoutMs: number, signal?: AbortSignal): Promise<RolloutOutcome> {
    let last: RolloutObservation | undefined;

    const result = await executeWithPollingBudget<RolloutObservation>(
      async () => {
        const observation = await this.client.getRolloutStatus(name, namespace, signal);
        last = observation;
        const verdict = classifyObservation(observation);
        if (verdict.kind === 'converged') return { kind: 'done', value: observation };
        if (verdict.kind === 'failed') return { kind: 'stop', reason: verdict.reason };
        return {
          kind: 'pending',
          statusMessage: `${observation.readyReplicas}/${observation.desiredReplicas} ready, ${observation.updatedReplicas} updated`,
        };
      },
      {
        intervalMs: this.options.pollIntervalMs,
        budgetMs: timeoutMs,
        backoff: 'fixed',
        onProgress: (progress) => {
          this.log.debug('Rollout progress', { name, namespace, ...progress });
        },
        onPollError: (err, pollCount) => {
          this.log.warn('Rollout status poll failed', {
            name,
            namespace,
            pollCount,
            error: err instanceof Error ? err.message : String(err),
          });
        },
      },
      this.clock,
      signal,
    );

    const base = { elapsedMs: result.totalElapsedMs, polls: result.pollCount };
    if (result.success && result.data) {
      this.log.info('Rollout converged', { name, namespace, ...base });
      return { state: 'converged', ...base, last: result.data };
    }
    if (result.stopped) {
      const reason = result.error ?? 'terminal condition';
      this.log.error('Rollout failed', { name, namespace, reason, ...base });
      return { state: 'failed', ...base, reason, last };
    }
    this.log.error('Rollout timed out', { name, namespace, timeoutMs, ...base });
    return { state: 'timed-out', ...base, last };
  }
}
