/**
 * Pipeline event model.
 *
 * Events are emitted for every run and stage transition and kept as the
 * queryable history of a run. Payloads are versioned through
 * `schemaVersion` for downstream consumers.
 */

/** Event types emitted by the executor. */
export type PipelineEventType =
  | 'run.created'
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'run.aborted'
  | 'stage.started'
  | 'stage.succeeded'
  | 'stage.failed'
  | 'stage.aborted'
  | 'stage.skipped'
  | 'command.absorbed'
  | 'hook.completed'
  | 'artifact.pushed';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  schemaVersion: string;
  timestamp: string;
  runId: string;
  pipelineId: string;
  buildNumber: number;
  stage?: string;
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only events of this run; all runs when omitted. */
  runId?: string;
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}
