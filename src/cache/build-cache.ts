/**
 * Build Cache Store.
 *
 * A local directory in the builder's "local" cache layout: content-addressed
 * blobs under `blobs/<algorithm>/<digest>` plus an `index.json`. The
 * builder imports from the directory and exports into a fresh staging
 * directory; finalize() then merges staging into the cache:
 *
 *   - blobs are renamed into place only when absent (additive; an existing
 *     blob with the same digest already has the same content)
 *   - index.json is replaced by write-to-temp-then-rename
 *
 * A failed build discards its staging directory, so existing entries are
 * never touched by a partial export.
 */

import { mkdir, mkdtemp, readdir, rename, rm, stat } from 'fs/promises';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { Logger, logger as rootLogger } from '../logger';

export const CACHE_INDEX_FILE = 'index.json';
const STAGING_PREFIX = '.staging-';

/** References handed to the builder. */
export interface CacheRefs {
  /** Present only when the cache holds an index to import from. */
  importRef?: string;
  exportRef: string;
  stagingDir: string;
}

export interface FinalizeResult {
  added: number;
  skipped: number;
  indexReplaced: boolean;
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(root: string, relative = ''): Promise<string[]> {
  const entries = await readdir(path.join(root, relative), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const rel = path.join(relative, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, rel)));
    } else {
      files.push(rel);
    }
  }
  return files;
}

export class BuildCacheStore {
  constructor(
    readonly dir: string,
    private log: Logger = rootLogger.child({ module: 'build-cache' }),
  ) {}

  /**
   * Ensure the cache directory exists and open a staging directory for
   * this build's export.
   */
  async prepare(): Promise<CacheRefs> {
    const stagingDir = await this.createStaging();
    const hasIndex = await exists(path.join(this.dir, CACHE_INDEX_FILE));
    return {
      importRef: hasIndex ? `type=local,src=${this.dir}` : undefined,
      exportRef: `type=local,dest=${stagingDir},mode=max`,
      stagingDir,
    };
  }

  /** Fresh staging directory inside the cache directory (same filesystem, so finalize can rename). */
  async createStaging(): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    return mkdtemp(path.join(this.dir, STAGING_PREFIX));
  }

  /** Merge a successful build's export into the cache, then drop the staging directory. */
  async finalize(stagingDir: string): Promise<FinalizeResult> {
    const result: FinalizeResult = { added: 0, skipped: 0, indexReplaced: false };
    const files = await listFiles(stagingDir);

    for (const rel of files) {
      if (rel === CACHE_INDEX_FILE) continue;
      const target = path.join(this.dir, rel);
      if (await exists(target)) {
        result.skipped++;
        continue;
      }
      await mkdir(path.dirname(target), { recursive: true });
      await rename(path.join(stagingDir, rel), target);
      result.added++;
    }

    // The index goes last so it never references a blob that is not yet in place.
    if (files.includes(CACHE_INDEX_FILE)) {
      const temp = path.join(this.dir, `${CACHE_INDEX_FILE}.${uuid()}.tmp`);
      await rename(path.join(stagingDir, CACHE_INDEX_FILE), temp);
      await rename(temp, path.join(this.dir, CACHE_INDEX_FILE));
      result.indexReplaced = true;
    }

    await this.discard(stagingDir);
    this.log.info('Build cache finalized', { ...result });
    return result;
  }

  /** Drop a staging directory without touching the cache. */
  async discard(stagingDir: string): Promise<void> {
    await rm(stagingDir, { recursive: true, force: true });
  }

  /** Delete everything in the cache directory. The directory itself stays. */
  async purge(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }
    for (const entry of entries) {
      await rm(path.join(this.dir, entry), { recursive: true, force: true });
    }
    this.log.info('Build cache purged', { dir: this.dir, entries: entries.length });
    return entries.length;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
