import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { BuildCacheStore, CACHE_INDEX_FILE } from '../../src/cache/build-cache';

async function put(file: string, content: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content);
}

describe('BuildCacheStore', () => {
  let root: string;
  let cacheDir: string;
  let cache: BuildCacheStore;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'shipline-cache-'));
    cacheDir = path.join(root, 'build-cache');
    cache = new BuildCacheStore(cacheDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates the cache and skips import while it has no index', async () => {
    const refs = await cache.prepare();
    expect(refs.importRef).toBeUndefined();
    expect(refs.exportRef).toBe(`type=local,dest=${refs.stagingDir},mode=max`);
    expect(path.dirname(refs.stagingDir)).toBe(cacheDir);
    expect((await stat(refs.stagingDir)).isDirectory()).toBe(true);
  });

  it('imports from the cache once an index exists', async () => {
    await put(path.join(cacheDir, CACHE_INDEX_FILE), '{}');
    const refs = await cache.prepare();
    expect(refs.importRef).toBe(`type=local,src=${cacheDir}`);
  });

  it('merges new blobs additively and replaces the index', async () => {
    await put(path.join(cacheDir, 'blobs/sha256/aaa'), 'existing layer');
    await put(path.join(cacheDir, CACHE_INDEX_FILE), '{"version":1}');

    const { stagingDir } = await cache.prepare();
    await put(path.join(stagingDir, 'blobs/sha256/aaa'), 'exported copy');
    await put(path.join(stagingDir, 'blobs/sha256/bbb'), 'new layer');
    await put(path.join(stagingDir, CACHE_INDEX_FILE), '{"version":2}');

    const result = await cache.finalize(stagingDir);

    expect(result).toEqual({ added: 1, skipped: 1, indexReplaced: true });
    expect(await readFile(path.join(cacheDir, 'blobs/sha256/aaa'), 'utf8')).toBe('existing layer');
    expect(await readFile(path.join(cacheDir, 'blobs/sha256/bbb'), 'utf8')).toBe('new layer');
    expect(await readFile(path.join(cacheDir, CACHE_INDEX_FILE), 'utf8')).toBe('{"version":2}');
    expect((await readdir(cacheDir)).sort()).toEqual(['blobs', CACHE_INDEX_FILE]);
  });

  it('leaves existing entries untouched when a build is discarded', async () => {
    await put(path.join(cacheDir, CACHE_INDEX_FILE), '{"version":1}');
    const { stagingDir } = await cache.prepare();
    await put(path.join(stagingDir, CACHE_INDEX_FILE), 'partial');

    await cache.discard(stagingDir);

    expect(await readFile(path.join(cacheDir, CACHE_INDEX_FILE), 'utf8')).toBe('{"version":1}');
    expect(await readdir(cacheDir)).toEqual([CACHE_INDEX_FILE]);
  });

  it('purges the contents but keeps the directory', async () => {
    await put(path.join(cacheDir, 'blobs/sha256/aaa'), 'layer');
    await put(path.join(cacheDir, CACHE_INDEX_FILE), '{}');

    expect(await cache.purge()).toBe(2);
    expect(await readdir(cacheDir)).toEqual([]);
  });

  it('purges a cache that was never created', async () => {
    expect(await cache.purge()).toBe(0);
  });
});
