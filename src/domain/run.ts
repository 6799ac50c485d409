/**
 * Pipeline run domain model.
 *
 * A single execution of a pipeline definition: ordered stage results,
 * post-hook results, the pushed artifact and, on failure, the report
 * emitted to the operator.
 */

import { BuildArtifact } from './artifact';
import { DiagnosticBlock } from './diagnostics';
import { TypedError } from './errors';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Aborted = 'aborted',
}

/** Stage-level run states. */
export enum StageRunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Aborted = 'aborted',
  Skipped = 'skipped',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Running, RunStatus.Aborted],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Aborted],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Aborted]: [],
};

/** Valid state transitions for stage runs. */
export const VALID_STAGE_TRANSITIONS: Record<StageRunStatus, StageRunStatus[]> = {
  [StageRunStatus.Pending]: [StageRunStatus.Running, StageRunStatus.Skipped, StageRunStatus.Aborted],
  [StageRunStatus.Running]: [StageRunStatus.Succeeded, StageRunStatus.Failed, StageRunStatus.Aborted],
  [StageRunStatus.Succeeded]: [],
  [StageRunStatus.Failed]: [],
  [StageRunStatus.Aborted]: [],
  [StageRunStatus.Skipped]: [],
};

/** A command failure that policy chose to ignore. */
export interface AbsorbedFailure {
  command: string;
  error: TypedError;
}

/** Result of a single stage. */
export interface StageResult {
  name: string;
  context: string;
  status: StageRunStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** Names of the commands that ran to completion (including absorbed ones). */
  commandsRun: string[];
  absorbed: AbsorbedFailure[];
  /** Masked raw output of the command that failed the stage. */
  errorOutput?: string;
  error?: TypedError;
}

export type HookKind = 'always' | 'success' | 'failure';

/** Outcome of one post-run hook. */
export interface HookResult {
  hook: HookKind;
  name: string;
  ok: boolean;
  error?: string;
  durationMs: number;
}

/** Emitted on failure: the failing stage's output, then cluster diagnostics. */
export interface FailureReport {
  stage?: string;
  errorOutput: string;
  diagnostics: DiagnosticBlock[];
}

/** A single execution of a pipeline. */
export interface PipelineRun {
  id: string;
  pipelineId: string;
  /** Monotonic per pipeline; also the image tag. */
  buildNumber: number;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Ordered stage results, one per declared stage. */
  stageResults: StageResult[];
  hookResults: HookResult[];
  /** Parameters the run was started with (branch override etc.). */
  parameters: Record<string, string>;
  /** Commit resolved by the checkout stage. */
  commit?: string;
  artifact?: BuildArtifact;
  error?: TypedError;
  failureReport?: FailureReport;
  abortedBy?: string;
  abortReason?: string;
}

/** Input for starting a run. */
export interface StartRunInput {
  pipelineId: string;
  parameters?: Record<string, string>;
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return (
    status === RunStatus.Succeeded ||
    status === RunStatus.Failed ||
    status === RunStatus.Aborted
  );
}
