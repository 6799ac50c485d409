/**
 * Rollout observation model.
 *
 * An observation is a point-in-time read of a deployment's status. The
 * reconciler polls observations and classifies each one; observations are
 * not stored beyond the poll loop.
 */

/** A deployment condition as reported by the cluster. */
export interface RolloutCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

export interface RolloutObservation {
  desiredReplicas: number;
  /** Total pods owned by the deployment, old and new. */
  replicas: number;
  updatedReplicas: number;
  readyReplicas: number;
  availableReplicas: number;
  /** False while the controller has not yet seen the latest spec. */
  generationObserved: boolean;
  conditions: RolloutCondition[];
  /** Container waiting reasons of the current revision's pods (e.g. CrashLoopBackOff). */
  waitingReasons: string[];
  observedAt: number;
}

export type RolloutOutcome =
  | { state: 'converged'; elapsedMs: number; polls: number; last: RolloutObservation }
  | { state: 'timed-out'; elapsedMs: number; polls: number; last?: RolloutObservation }
  | { state: 'failed'; elapsedMs: number; polls: number; reason: string; last?: RolloutObservation };

/**
 * Pod waiting reasons that will not resolve without a new rollout.
 * ErrImagePull is retried by the kubelet; a persistent one becomes
 * ImagePullBackOff.
 */
export const TERMINAL_WAITING_REASONS: ReadonlySet<string> = new Set([
  'CrashLoopBackOff',
  'ImagePullBackOff',
  'InvalidImageName',
  'CreateContainerConfigError',
]);

export type ObservationVerdict =
  | { kind: 'converged' }
  | { kind: 'progressing' }
  | { kind: 'failed'; reason: string };

/** Classify a single observation. */
export function classifyObservation(obs: RolloutObservation): ObservationVerdict {
  const deadline = obs.conditions.find(
    (c) => c.type === 'Progressing' && c.status === 'False' && c.reason === 'ProgressDeadlineExceeded',
  );
  if (deadline) {
    return { kind: 'failed', reason: deadline.message ?? 'ProgressDeadlineExceeded' };
  }

  const terminal = obs.waitingReasons.find((r) => TERMINAL_WAITING_REASONS.has(r));
  if (terminal) {
    return { kind: 'failed', reason: terminal };
  }

  if (
    obs.generationObserved &&
    obs.updatedReplicas >= obs.desiredReplicas &&
    obs.readyReplicas >= obs.desiredReplicas &&
    obs.availableReplicas >= obs.desiredReplicas &&
    obs.replicas <= obs.updatedReplicas
  ) {
    return { kind: 'converged' };
  }
  return { kind: 'progressing' };
}
