import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PipelineRun, RunStatus } from '../../src/domain/run';
import { FileStore } from '../../src/storage/file-store';

function makeRun(id: string, buildNumber: number): PipelineRun {
  return {
    id,
    pipelineId: 'web',
    buildNumber,
    status: RunStatus.Created,
    createdAt: `2026-01-0${buildNumber}T00:00:00.000Z`,
    updatedAt: `2026-01-0${buildNumber}T00:00:00.000Z`,
    stageResults: [],
    hookResults: [],
    parameters: {},
  };
}

describe('FileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'shipline-file-store-'));
    file = path.join(dir, 'state', 'runs.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = await FileStore.open(file);
    expect((await store.runs.list()).total).toBe(0);
  });

  it('persists runs and build numbers across reopen', async () => {
    const first = await FileStore.open(file);
    const buildNumber = await first.runs.nextBuildNumber('web');
    await first.runs.create(makeRun('run_1', buildNumber));
    await first.flush();

    const persisted: unknown = JSON.parse(await readFile(file, 'utf8'));
    expect(persisted).toMatchObject({ buildNumbers: { web: 1 }, artifacts: [], events: [] });

    const reopened = await FileStore.open(file);
    expect((await reopened.runs.getById('run_1'))?.buildNumber).toBe(1);
    expect(await reopened.runs.nextBuildNumber('web')).toBe(2);
  });

  it('never reuses a build number of a stored run when the counter is missing', async () => {
    await writeFile(path.join(dir, 'runs.json'), JSON.stringify({
      runs: [makeRun('run_7', 7)],
      artifacts: [],
      events: [],
      buildNumbers: {},
    }));

    const store = await FileStore.open(path.join(dir, 'runs.json'));
    expect(await store.runs.nextBuildNumber('web')).toBe(8);
  });

  it('rejects a file that is not a store snapshot', async () => {
    const corrupt = path.join(dir, 'corrupt.json');
    await writeFile(corrupt, JSON.stringify({ runs: 'nope' }));

    await expect(FileStore.open(corrupt)).rejects.toMatchObject({
      typedError: { code: 'SYSTEM.STORE_CORRUPT', message: `Cannot read run store ${corrupt}: unexpected structure` },
    });
  });

  it('rejects a file that is not JSON', async () => {
    const corrupt = path.join(dir, 'broken.json');
    await writeFile(corrupt, '{ runs: ');

    await expect(FileStore.open(corrupt)).rejects.toMatchObject({ typedError: { code: 'SYSTEM.STORE_CORRUPT' } });
  });
});
