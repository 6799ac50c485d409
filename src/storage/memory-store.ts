/**
 * In-memory storage implementation.
 *
 * Every value crossing the store boundary is deep-copied, so callers can
 * never alias the store's internal state. An optional change listener is
 * invoked after each mutation; the file store uses it to persist snapshots.
 */

import { BuildArtifact } from '../domain/artifact';
import { PipelineError, createTypedError } from '../domain/errors';
import { PipelineEvent } from '../domain/events';
import { PipelineRun, isTerminalRunStatus } from '../domain/run';
import {
  ArtifactStore,
  EventStore,
  ListOptions,
  ListResult,
  RunListOptions,
  RunStore,
  Store,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Called after every mutation. */
export type ChangeListener = () => Promise<void>;

/** Full store contents, as persisted by the file store. */
export interface StoreSnapshot {
  runs: PipelineRun[];
  artifacts: BuildArtifact[];
  events: PipelineEvent[];
  /** Last build number handed out, per pipeline. */
  buildNumbers: Record<string, number>;
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, PipelineRun>();
  private buildNumbers = new Map<string, number>();

  constructor(private onChange: ChangeListener) {}

  async create(run: PipelineRun): Promise<PipelineRun> {
    this.data.set(run.id, deepCopy(run));
    await this.onChange();
    return deepCopy(run);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, run: PipelineRun): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    if (isTerminalRunStatus(existing.status)) {
      throw new PipelineError(createTypedError({
        code: 'RUN.IMMUTABLE',
        message: `Run "${id}" is ${existing.status} and can no longer change`,
        runId: id,
        details: { status: existing.status },
      }));
    }
    const updated = { ...deepCopy(run), id, updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    await this.onChange();
    return deepCopy(updated);
  }

  async list(options?: RunListOptions): Promise<ListResult<PipelineRun>> {
    const items = [...this.data.values()]
      .filter((r) => !options?.pipelineId || r.pipelineId === options.pipelineId)
      .filter((r) => !options?.status || r.status === options.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.buildNumber - a.buildNumber);
    return toListResult(applyListOptions(items, options).map(deepCopy), items.length, options);
  }

  async nextBuildNumber(pipelineId: string): Promise<number> {
    const next = (this.buildNumbers.get(pipelineId) ?? 0) + 1;
    this.buildNumbers.set(pipelineId, next);
    await this.onChange();
    return next;
  }

  /** @internal */
  dump(): Pick<StoreSnapshot, 'runs' | 'buildNumbers'> {
    return {
      runs: [...this.data.values()].map(deepCopy),
      buildNumbers: Object.fromEntries(this.buildNumbers),
    };
  }

  /** @internal */
  load(snapshot: Pick<StoreSnapshot, 'runs' | 'buildNumbers'>): void {
    this.data = new Map(snapshot.runs.map((r) => [r.id, deepCopy(r)]));
    this.buildNumbers = new Map(Object.entries(snapshot.buildNumbers));
    // A build number is never reused, even if the counter was lost.
    for (const run of snapshot.runs) {
      if (run.buildNumber > (this.buildNumbers.get(run.pipelineId) ?? 0)) {
        this.buildNumbers.set(run.pipelineId, run.buildNumber);
      }
    }
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, BuildArtifact>();

  constructor(private onChange: ChangeListener) {}

  async record(artifact: BuildArtifact): Promise<BuildArtifact> {
    this.data.set(artifact.ref, deepCopy(artifact));
    await this.onChange();
    return deepCopy(artifact);
  }

  async getByRef(ref: string): Promise<BuildArtifact | null> {
    const artifact = this.data.get(ref);
    return artifact ? deepCopy(artifact) : null;
  }

  async listByRun(runId: string): Promise<BuildArtifact[]> {
    return [...this.data.values()].filter((a) => a.provenance.runId === runId).map(deepCopy);
  }

  /** @internal */
  dump(): BuildArtifact[] {
    return [...this.data.values()].map(deepCopy);
  }

  /** @internal */
  load(artifacts: BuildArtifact[]): void {
    this.data = new Map(artifacts.map((a) => [a.ref, deepCopy(a)]));
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];
  private runIdIndex = new Map<string, number[]>();

  constructor(private onChange: ChangeListener) {}

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    this.index(deepCopy(event));
    await this.onChange();
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions): Promise<PipelineEvent[]> {
    const indices = this.runIdIndex.get(runId);
    if (!indices) return [];
    return applyListOptions(indices.map((i) => this.data[i]), options).map(deepCopy);
  }

  /** @internal */
  dump(): PipelineEvent[] {
    return this.data.map(deepCopy);
  }

  /** @internal */
  load(events: PipelineEvent[]): void {
    this.data = [];
    this.runIdIndex.clear();
    for (const event of events) this.index(deepCopy(event));
  }

  private index(event: PipelineEvent): void {
    const idx = this.data.length;
    this.data.push(event);
    const indices = this.runIdIndex.get(event.runId) ?? [];
    indices.push(idx);
    this.runIdIndex.set(event.runId, indices);
  }
}

export class MemoryStore implements Store {
  readonly runs: MemoryRunStore;
  readonly artifacts: MemoryArtifactStore;
  readonly events: MemoryEventStore;

  constructor(onChange: ChangeListener = async () => undefined) {
    this.runs = new MemoryRunStore(onChange);
    this.artifacts = new MemoryArtifactStore(onChange);
    this.events = new MemoryEventStore(onChange);
  }

  snapshot(): StoreSnapshot {
    return { ...this.runs.dump(), artifacts: this.artifacts.dump(), events: this.events.dump() };
  }

  restore(snapshot: StoreSnapshot): void {
    this.runs.load(snapshot);
    this.artifacts.load(snapshot.artifacts);
    this.events.load(snapshot.events);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return new MemoryStore();
}
