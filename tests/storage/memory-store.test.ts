import { BuildArtifact } from '../../src/domain/artifact';
import { PipelineEvent } from '../../src/domain/events';
import { PipelineRun, RunStatus, StageRunStatus } from '../../src/domain/run';
import { createMemoryStore } from '../../src/storage/memory-store';

function makeRun(overrides: Partial<PipelineRun> = {}): PipelineRun {
  return {
    id: 'run_1',
    pipelineId: 'web',
    buildNumber: 1,
    status: RunStatus.Created,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    stageResults: [],
    hookResults: [],
    parameters: { branch: 'main' },
    ...overrides,
  };
}

function makeArtifact(tag: string, runId: string): BuildArtifact {
  return {
    repository: 'registry.example.com/web',
    tag,
    ref: `registry.example.com/web:${tag}`,
    provenance: { runId, pipelineId: 'web', buildNumber: Number(tag), commit: 'abc1234' },
    pushedAt: '2026-01-01T00:05:00.000Z',
  };
}

function makeEvent(id: string, runId: string): PipelineEvent {
  return {
    id,
    type: 'run.started',
    schemaVersion: '1.0.0',
    timestamp: '2026-01-01T00:00:00.000Z',
    runId,
    pipelineId: 'web',
    buildNumber: 1,
    payload: {},
  };
}

describe('MemoryStore', () => {
  describe('runs', () => {
    it('returns copies that cannot alias the stored run', async () => {
      const store = createMemoryStore();
      const created = await store.runs.create(makeRun());
      created.parameters.branch = 'mutated';

      const fetched = await store.runs.getById('run_1');
      expect(fetched?.parameters.branch).toBe('main');

      fetched?.stageResults.push({
        name: 'Checkout',
        context: 'source',
        status: StageRunStatus.Pending,
        commandsRun: [],
        absorbed: [],
      });
      expect((await store.runs.getById('run_1'))?.stageResults).toEqual([]);
    });

    it('returns null when updating an unknown run', async () => {
      const store = createMemoryStore();
      expect(await store.runs.update('run_missing', makeRun({ id: 'run_missing' }))).toBeNull();
    });

    it('freezes a run once it reaches a terminal status', async () => {
      const store = createMemoryStore();
      await store.runs.create(makeRun());
      await store.runs.update('run_1', makeRun({ status: RunStatus.Running }));
      await store.runs.update('run_1', makeRun({ status: RunStatus.Failed }));

      await expect(store.runs.update('run_1', makeRun({ status: RunStatus.Succeeded }))).rejects.toMatchObject({
        typedError: { code: 'RUN.IMMUTABLE', message: 'Run "run_1" is failed and can no longer change' },
      });
      expect((await store.runs.getById('run_1'))?.status).toBe(RunStatus.Failed);
    });

    it('lists newest first with filters and pagination', async () => {
      const store = createMemoryStore();
      await store.runs.create(makeRun({ id: 'run_1', buildNumber: 1, createdAt: '2026-01-01T00:00:00.000Z', status: RunStatus.Succeeded }));
      await store.runs.create(makeRun({ id: 'run_2', buildNumber: 2, createdAt: '2026-01-02T00:00:00.000Z', status: RunStatus.Failed }));
      await store.runs.create(makeRun({ id: 'run_3', buildNumber: 3, createdAt: '2026-01-03T00:00:00.000Z', status: RunStatus.Succeeded }));
      await store.runs.create(makeRun({ id: 'run_4', pipelineId: 'api', createdAt: '2026-01-04T00:00:00.000Z' }));

      const web = await store.runs.list({ pipelineId: 'web' });
      expect(web.items.map((r) => r.id)).toEqual(['run_3', 'run_2', 'run_1']);

      const succeeded = await store.runs.list({ status: RunStatus.Succeeded });
      expect(succeeded.items.map((r) => r.id)).toEqual(['run_3', 'run_1']);

      const page = await store.runs.list({ limit: 2, offset: 1 });
      expect(page.items.map((r) => r.id)).toEqual(['run_3', 'run_2']);
      expect(page).toMatchObject({ total: 4, limit: 2, offset: 1, hasMore: true });
    });

    it('hands out build numbers per pipeline', async () => {
      const store = createMemoryStore();
      expect(await store.runs.nextBuildNumber('web')).toBe(1);
      expect(await store.runs.nextBuildNumber('web')).toBe(2);
      expect(await store.runs.nextBuildNumber('api')).toBe(1);
      expect(await store.runs.nextBuildNumber('web')).toBe(3);
    });
  });

  describe('artifacts', () => {
    it('records pushes by reference and lists them by run', async () => {
      const store = createMemoryStore();
      await store.artifacts.record(makeArtifact('1', 'run_1'));
      await store.artifacts.record(makeArtifact('2', 'run_2'));

      expect((await store.artifacts.getByRef('registry.example.com/web:2'))?.provenance.runId).toBe('run_2');
      expect(await store.artifacts.getByRef('registry.example.com/web:3')).toBeNull();
      expect((await store.artifacts.listByRun('run_1')).map((a) => a.ref)).toEqual(['registry.example.com/web:1']);
    });

    it('replaces an earlier record of the same reference', async () => {
      const store = createMemoryStore();
      await store.artifacts.record(makeArtifact('1', 'run_1'));
      await store.artifacts.record(makeArtifact('1', 'run_9'));

      expect((await store.artifacts.getByRef('registry.example.com/web:1'))?.provenance.runId).toBe('run_9');
      expect(await store.artifacts.listByRun('run_1')).toEqual([]);
    });
  });

  describe('events', () => {
    it('lists a run\'s events in publication order', async () => {
      const store = createMemoryStore();
      await store.events.create(makeEvent('evt_1', 'run_1'));
      await store.events.create(makeEvent('evt_2', 'run_2'));
      await store.events.create(makeEvent('evt_3', 'run_1'));

      expect((await store.events.listByRun('run_1')).map((e) => e.id)).toEqual(['evt_1', 'evt_3']);
      expect((await store.events.listByRun('run_1', { offset: 1 })).map((e) => e.id)).toEqual(['evt_3']);
      expect(await store.events.listByRun('run_missing')).toEqual([]);
    });
  });
});
