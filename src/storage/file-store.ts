/**
 * JSON file store.
 *
 * An in-memory store whose contents are written to one JSON file after
 * every mutation (write to a temp file, then rename). Used by the CLI and
 * the server so build numbers stay monotonic across restarts.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { PipelineError, createTypedError } from '../domain/errors';
import { MemoryStore, StoreSnapshot } from './memory-store';
import { ArtifactStore, EventStore, RunStore, Store } from './store';

function isStoreSnapshot(value: unknown): value is StoreSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  const record = Object.fromEntries(Object.entries(value));
  return (
    Array.isArray(record.runs) &&
    Array.isArray(record.artifacts) &&
    Array.isArray(record.events) &&
    typeof record.buildNumbers === 'object' &&
    record.buildNumbers !== null
  );
}

export class FileStore implements Store {
  readonly runs: RunStore;
  readonly artifacts: ArtifactStore;
  readonly events: EventStore;
  private memory: MemoryStore;
  private writing: Promise<void> = Promise.resolve();

  private constructor(readonly file: string) {
    this.memory = new MemoryStore(() => this.persist());
    this.runs = this.memory.runs;
    this.artifacts = this.memory.artifacts;
    this.events = this.memory.events;
  }

  /** Open (or create) the store file. */
  static async open(file: string): Promise<FileStore> {
    const store = new FileStore(file);
    let text: string | undefined;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    }
    if (text !== undefined) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (err) {
        throw corruptStore(file, err instanceof Error ? err.message : String(err));
      }
      if (!isStoreSnapshot(parsed)) throw corruptStore(file, 'unexpected structure');
      store.memory.restore(parsed);
    }
    return store;
  }

  /** Resolves once every pending write has reached the disk. */
  flush(): Promise<void> {
    return this.writing;
  }

  private persist(): Promise<void> {
    // Writes are serialized; each one captures the state at the time it runs.
    // A failed write was already reported to its own caller.
    const write = () => this.writeSnapshot();
    this.writing = this.writing.then(write, write);
    return this.writing;
  }

  private async writeSnapshot(): Promise<void> {
    await mkdir(path.dirname(this.file), { recursive: true });
    const temp = `${this.file}.${process.pid}.tmp`;
    await writeFile(temp, `${JSON.stringify(this.memory.snapshot(), null, 2)}\n`, 'utf8');
    await rename(temp, this.file);
  }
}

function corruptStore(file: string, reason: string): PipelineError {
  return new PipelineError(createTypedError({
    code: 'SYSTEM.STORE_CORRUPT',
    message: `Cannot read run store ${file}: ${reason}`,
    details: { file },
  }));
}
