/**
 * Storage layer interfaces.
 *
 * Runs, pushed artifacts and events, with pluggable backends: an in-memory
 * store for tests and the API server, and a JSON file store for runs that
 * must survive a restart (build numbers stay monotonic).
 */

import { BuildArtifact } from '../domain/artifact';
import { PipelineEvent } from '../domain/events';
import { PipelineRun, RunStatus } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface RunListOptions extends ListOptions {
  pipelineId?: string;
  status?: RunStatus;
}

/**
 * Store interface for runs. A run that has reached a terminal status is
 * frozen: update() rejects with RUN.IMMUTABLE.
 */
export interface RunStore {
  create(run: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, run: PipelineRun): Promise<PipelineRun | null>;
  /** Newest first. */
  list(options?: RunListOptions): Promise<ListResult<PipelineRun>>;
  /** Reserve the next build number of a pipeline (1, 2, 3, ...). */
  nextBuildNumber(pipelineId: string): Promise<number>;
}

/** Pushed images, keyed by full image reference. */
export interface ArtifactStore {
  /** Record a push; replaces any earlier record of the same reference. */
  record(artifact: BuildArtifact): Promise<BuildArtifact>;
  getByRef(ref: string): Promise<BuildArtifact | null>;
  listByRun(runId: string): Promise<BuildArtifact[]>;
}

export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions): Promise<PipelineEvent[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  runs: RunStore;
  artifacts: ArtifactStore;
  events: EventStore;
}
