/**
 * Run and stage state machines.
 *
 * Enforces valid state transitions, producing typed errors on invalid ones.
 */

import {
  RunStatus,
  StageRunStatus,
  VALID_RUN_TRANSITIONS,
  VALID_STAGE_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(
  current: RunStatus,
  target: RunStatus,
): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a stage state transition. */
export function transitionStageStatus(
  current: StageRunStatus,
  target: StageRunStatus,
): TransitionResult<StageRunStatus> {
  const validTargets = VALID_STAGE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'STAGE.INVALID_TRANSITION',
        message: `Invalid stage state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a stage status is terminal. */
export function isTerminalStageStatus(status: StageRunStatus): boolean {
  return (
    status === StageRunStatus.Succeeded ||
    status === StageRunStatus.Failed ||
    status === StageRunStatus.Aborted ||
    status === StageRunStatus.Skipped
  );
}
