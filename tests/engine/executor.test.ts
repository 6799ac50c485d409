import { existsSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CredentialScopeManager } from '../../src/credentials/credential-scope';
import { MemorySecretSource } from '../../src/credentials/secret-source';
import { EventPublisher } from '../../src/data-plane/publisher';
import { RunStatus, StageRunStatus } from '../../src/domain/run';
import { ExecutorError, PipelineExecutor, buildCacheDir } from '../../src/engine/executor';
import { Hook, PipelineDefinition, actionCommand, shellCommand } from '../../src/engine/stage-runner';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { ExecutionContextPool } from '../../src/runtime/execution-context';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';
import { ScriptedRunner, untilAborted } from '../helpers/fakes';

describe('PipelineExecutor', () => {
  let workRoot: string;
  let store: Store;
  let publisher: EventPublisher;
  let runner: ScriptedRunner;
  let executor: PipelineExecutor;
  let trace: string[];

  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  beforeEach(async () => {
    workRoot = await mkdtemp(path.join(os.tmpdir(), 'shipline-executor-'));
    store = createMemoryStore();
    publisher = new EventPublisher(store);
    runner = new ScriptedRunner();
    const pool = new ExecutionContextPool([{ identity: 'main', image: 'node:20-alpine', mounts: ['workspace'] }], runner);
    const scopes = new CredentialScopeManager(new MemorySecretSource(), { scopeRoot: path.join(workRoot, 'credentials') });
    executor = new PipelineExecutor(store, publisher, { pool, scopes }, { workRoot, hookTimeoutMs: 1_000 });
    trace = [];
  });

  afterEach(async () => {
    await rm(workRoot, { recursive: true, force: true });
  });

  function note(name: string): Hook {
    return {
      name,
      run: async (ctx) => {
        trace.push(`${ctx.hook}:${name}`);
      },
    };
  }

  function pipeline(overrides: Partial<PipelineDefinition['hooks']> = {}): PipelineDefinition {
    return {
      id: 'web',
      stages: ['one', 'two', 'three'].map((name) => ({
        name,
        context: 'main',
        commands: [shellCommand(`step ${name}`, ['step', name])],
      })),
      hooks: {
        always: [note('always-note')],
        success: [note('success-note')],
        failure: [note('failure-note')],
        ...overrides,
      },
    };
  }

  it('runs every stage in order, then the always and success hooks', async () => {
    executor.register(pipeline());

    const run = await executor.run({ pipelineId: 'web' });

    expect(run.status).toBe(RunStatus.Succeeded);
    expect(run.buildNumber).toBe(1);
    expect(runner.argvs()).toEqual([['step', 'one'], ['step', 'two'], ['step', 'three']]);
    expect(run.stageResults.map((s) => s.status)).toEqual([
      StageRunStatus.Succeeded, StageRunStatus.Succeeded, StageRunStatus.Succeeded,
    ]);
    expect(trace).toEqual(['always:always-note', 'success:success-note']);
    expect(run.hookResults.map((h) => [h.hook, h.name, h.ok])).toEqual([
      ['always', 'always-note', true],
      ['success', 'success-note', true],
      ['always', 'remove run volumes', true],
    ]);
    expect(run.failureReport).toBeUndefined();
    expect(existsSync(path.join(workRoot, 'web-1'))).toBe(false);
    expect(existsSync(buildCacheDir(workRoot, 'web'))).toBe(true);
  });

  it('publishes run, stage and hook events in order', async () => {
    executor.register(pipeline());

    const run = await executor.run({ pipelineId: 'web' });
    const events = await publisher.getEventsByRun(run.id);

    expect(events.map((e) => (e.stage ? `${e.type}:${e.stage}` : e.type))).toEqual([
      'run.created',
      'run.started',
      'stage.started:one',
      'stage.succeeded:one',
      'stage.started:two',
      'stage.succeeded:two',
      'stage.started:three',
      'stage.succeeded:three',
      'hook.completed',
      'hook.completed',
      'hook.completed',
      'run.succeeded',
    ]);
  });

  it('stops at the first failed stage, skips the rest and runs the failure hooks', async () => {
    runner.on(['step', 'two'], { exitCode: 1, stderr: 'boom\n' });
    executor.register(pipeline({
      failure: [{
        name: 'diagnose',
        run: async (ctx) => {
          trace.push('failure:diagnose');
          ctx.attachDiagnostics([{ label: 'pod logs', available: true, content: 'crash loop' }]);
        },
      }],
    }));

    const run = await executor.run({ pipelineId: 'web' });

    expect(run.status).toBe(RunStatus.Failed);
    expect(runner.argvs()).toEqual([['step', 'one'], ['step', 'two']]);
    expect(run.stageResults.map((s) => s.status)).toEqual([
      StageRunStatus.Succeeded, StageRunStatus.Failed, StageRunStatus.Skipped,
    ]);
    expect(trace).toEqual(['always:always-note', 'failure:diagnose']);
    expect(run.error?.code).toBe('COMMAND.NON_ZERO_EXIT');
    expect(run.failureReport).toEqual({
      stage: 'two',
      errorOutput: 'boom',
      diagnostics: [{ label: 'pod logs', available: true, content: 'crash loop' }],
    });
  });

  it('keeps the outcome when a hook fails or tries to change the run', async () => {
    executor.register(pipeline({
      always: [{
        name: 'explode',
        run: async () => {
          throw new Error('hook broke');
        },
      }],
      success: [{
        name: 'tamper',
        run: async (ctx) => {
          trace.push('success:tamper');
          Object.assign(ctx.run, { status: RunStatus.Failed });
        },
      }],
    }));

    const run = await executor.run({ pipelineId: 'web' });

    expect(run.status).toBe(RunStatus.Succeeded);
    expect(trace).toEqual(['success:tamper']);
    expect(run.hookResults[0]).toMatchObject({ hook: 'always', name: 'explode', ok: false, error: 'hook broke' });
    expect(run.hookResults[1]).toMatchObject({ hook: 'success', name: 'tamper', ok: false });
    expect((await store.runs.getById(run.id))?.status).toBe(RunStatus.Succeeded);
  });

  it('records facts established by stages on the run', async () => {
    executor.register({
      ...pipeline(),
      stages: [{
        name: 'checkout',
        context: 'main',
        commands: [actionCommand('resolve commit', async (ctx) => {
          ctx.facts.commit = 'abc1234';
        })],
      }],
    });

    const run = await executor.run({ pipelineId: 'web', parameters: { branch: 'release' } });

    expect(run.commit).toBe('abc1234');
    expect(run.parameters).toEqual({ branch: 'release' });
  });

  it('aborts the running stage, skips the rest and still runs the hooks once', async () => {
    executor.register(pipeline());
    const created = await executor.createRun({ pipelineId: 'web' });
    runner.on(['step', 'two'], async (spec) => {
      await executor.abort(created.id, 'tester', 'stop');
      return untilAborted(spec);
    });

    const run = await executor.executeRun(created.id);

    expect(run.status).toBe(RunStatus.Aborted);
    expect(run.abortedBy).toBe('tester');
    expect(run.abortReason).toBe('stop');
    expect(run.error).toMatchObject({ code: 'RUN.ABORTED', message: 'Run aborted: stop' });
    expect(run.stageResults.map((s) => s.status)).toEqual([
      StageRunStatus.Succeeded, StageRunStatus.Aborted, StageRunStatus.Skipped,
    ]);
    expect(trace).toEqual(['always:always-note', 'failure:failure-note']);
    expect(run.failureReport?.stage).toBe('two');
    expect(run.failureReport?.errorOutput).toBe('Stage "two" was aborted: stop');
  });

  it('lets a timed-out command finish its cleanup before the always hook runs', async () => {
    executor.register({
      ...pipeline(),
      stages: [{
        name: 'build',
        context: 'main',
        timeoutMs: 20,
        commands: [actionCommand('build and push', async (ctx) => {
          await new Promise<void>((resolve) => ctx.signal.addEventListener('abort', () => resolve(), { once: true }));
          await new Promise((resolve) => setTimeout(resolve, 50));
          trace.push('build:cleanup');
        })],
      }],
    });

    const run = await executor.run({ pipelineId: 'web' });

    expect(run.status).toBe(RunStatus.Failed);
    expect(run.error?.code).toBe('STAGE.TIMEOUT');
    expect(trace).toEqual(['build:cleanup', 'always:always-note', 'failure:failure-note']);
  });

  it('finishes a created run immediately when it is aborted before starting', async () => {
    executor.register(pipeline());
    const created = await executor.createRun({ pipelineId: 'web' });

    const aborted = await executor.abort(created.id, 'tester');

    expect(aborted.status).toBe(RunStatus.Aborted);
    expect(aborted.abortReason).toBe('aborted by tester');
    expect(aborted.stageResults.every((s) => s.status === StageRunStatus.Skipped)).toBe(true);
    expect(aborted.hookResults).toEqual([]);
    expect(trace).toEqual([]);
    await expect(executor.executeRun(created.id)).rejects.toMatchObject({
      typedError: { code: 'RUN.INVALID_STATE' },
    });
    expect(executor.activeRunOf('web')).toBeUndefined();
  });

  it('rejects a second run of a pipeline while one is unfinished', async () => {
    executor.register(pipeline());
    const first = await executor.createRun({ pipelineId: 'web' });

    await expect(executor.createRun({ pipelineId: 'web' })).rejects.toMatchObject({
      typedError: { code: 'PIPELINE.ALREADY_RUNNING', details: { runId: first.id } },
    });
    expect(executor.activeRunOf('web')).toBe(first.id);

    await executor.executeRun(first.id);
    const second = await executor.createRun({ pipelineId: 'web' });
    expect(second.buildNumber).toBe(2);
  });

  it('rejects executing the same run twice at once', async () => {
    executor.register(pipeline());
    const created = await executor.createRun({ pipelineId: 'web' });

    const first = executor.executeRun(created.id);
    await expect(executor.executeRun(created.id)).rejects.toMatchObject({
      typedError: { code: 'RUN.ALREADY_RUNNING' },
    });
    expect((await first).status).toBe(RunStatus.Succeeded);
  });

  it('refuses to abort a finished run', async () => {
    executor.register(pipeline());
    const run = await executor.run({ pipelineId: 'web' });

    await expect(executor.abort(run.id, 'tester')).rejects.toMatchObject({
      typedError: { code: 'RUN.NOT_ABORTABLE', message: `Run "${run.id}" has already succeeded` },
    });
  });

  it('rejects unknown pipelines and undeclared contexts', async () => {
    await expect(executor.createRun({ pipelineId: 'api' })).rejects.toBeInstanceOf(ExecutorError);
    expect(() => executor.register({
      ...pipeline(),
      stages: [{ name: 'deploy', context: 'deployer', commands: [] }],
    })).toThrow('Pipeline "web" uses undeclared execution context "deployer"');
  });
});
