/**
 * Pipeline Executor — the orchestration engine.
 *
 * Runs a pipeline's stages strictly in order, each in its declared
 * execution context with its credential scope, then the post hooks:
 * `always` unconditionally, followed by exactly one of `success` or
 * `failure`. Hooks see a frozen snapshot of the run and cannot change its
 * status. Run and stage transitions are published as events.
 */

import path from 'path';
import { v4 as uuid } from 'uuid';
import { CredentialScopeManager } from '../credentials/credential-scope';
import { DiagnosticBlock, renderDiagnostics } from '../domain/diagnostics';
import { PipelineError, TypedError, createTypedError, notFoundError, runAbortedError, runNotFoundError } from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import {
  FailureReport,
  HookKind,
  HookResult,
  PipelineRun,
  RunStatus,
  StageResult,
  StageRunStatus,
  StartRunInput,
  isTerminalRunStatus,
} from '../domain/run';
import { EventPublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { Clock, systemClock } from '../runtime/clock';
import {
  ExecutionContextPool,
  RunVolumes,
  ensureRunVolumes,
  planRunVolumes,
  removeRunVolumes,
} from '../runtime/execution-context';
import { Store } from '../storage/store';
import { transitionRunStatus } from './state-machine';
import { DEFAULT_CANCEL_GRACE_MS, PipelineDefinition, RunFacts, executeHook, executeStage } from './stage-runner';

/** Executor configuration. */
export interface ExecutorConfig {
  /** Parent directory of per-run volumes and per-pipeline build caches. */
  workRoot: string;
  /** Upper bound on a single hook. */
  hookTimeoutMs: number;
  /** How long a cancelled command or hook may take to wind down. */
  cancelGraceMs: number;
}

const DEFAULT_CONFIG: ExecutorConfig = {
  workRoot: path.join(process.cwd(), '.shipline', 'work'),
  hookTimeoutMs: 5 * 60_000,
  cancelGraceMs: DEFAULT_CANCEL_GRACE_MS,
};

export interface ExecutorDeps {
  pool: ExecutionContextPool;
  scopes: CredentialScopeManager;
  clock?: Clock;
}

const STAGE_EVENT: Partial<Record<StageRunStatus, PipelineEventType>> = {
  [StageRunStatus.Succeeded]: 'stage.succeeded',
  [StageRunStatus.Failed]: 'stage.failed',
  [StageRunStatus.Aborted]: 'stage.aborted',
  [StageRunStatus.Skipped]: 'stage.skipped',
};

const RUN_EVENT: Record<RunStatus, PipelineEventType> = {
  [RunStatus.Created]: 'run.created',
  [RunStatus.Running]: 'run.started',
  [RunStatus.Succeeded]: 'run.succeeded',
  [RunStatus.Failed]: 'run.failed',
  [RunStatus.Aborted]: 'run.aborted',
};

/** Directory of a pipeline's build cache, shared between its runs. */
export function buildCacheDir(workRoot: string, pipelineId: string): string {
  return path.join(workRoot, pipelineId, 'build-cache');
}

/** The pipeline executor. */
export class PipelineExecutor {
  private config: ExecutorConfig;
  private clock: Clock;
  private pipelines = new Map<string, PipelineDefinition>();
  private controllers = new Map<string, AbortController>();
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Set<string>();
  /** pipelineId -> id of its run that has not finished yet. */
  private activeRuns = new Map<string, string>();
  private abortRequests = new Map<string, { abortedBy: string; reason: string }>();

  constructor(
    private store: Store,
    private publisher: EventPublisher,
    private deps: ExecutorDeps,
    config?: Partial<ExecutorConfig>,
    private log: Logger = rootLogger.child({ module: 'executor' }),
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = deps.clock ?? systemClock;
  }

  /** Register a pipeline definition. Every stage's context must be declared in the pool. */
  register(pipeline: PipelineDefinition): void {
    const hooks = [...pipeline.hooks.always, ...pipeline.hooks.success, ...pipeline.hooks.failure];
    const identities = [
      ...pipeline.stages.map((s) => s.context),
      ...hooks.flatMap((h) => (h.context ? [h.context] : [])),
    ];
    for (const identity of identities) {
      if (!this.deps.pool.has(identity)) {
        throw new ExecutorError(createTypedError({
          code: 'PIPELINE.UNKNOWN_CONTEXT',
          message: `Pipeline "${pipeline.id}" uses undeclared execution context "${identity}"`,
          details: { pipelineId: pipeline.id, identity, declared: this.deps.pool.identities() },
        }));
      }
    }
    this.pipelines.set(pipeline.id, pipeline);
  }

  pipelineIds(): string[] {
    return [...this.pipelines.keys()];
  }

  /** Id of the pipeline's unfinished run, if any. */
  activeRunOf(pipelineId: string): string | undefined {
    return this.activeRuns.get(pipelineId);
  }

  /** Create a run with the pipeline's next build number. */
  async createRun(input: StartRunInput): Promise<PipelineRun> {
    const pipeline = this.pipelines.get(input.pipelineId);
    if (!pipeline) {
      throw new ExecutorError(notFoundError('Pipeline', input.pipelineId));
    }
    const active = this.activeRuns.get(pipeline.id);
    if (active) {
      throw new ExecutorError(createTypedError({
        code: 'PIPELINE.ALREADY_RUNNING',
        message: `Pipeline "${pipeline.id}" already has an unfinished run (${active})`,
        retryable: true,
        details: { pipelineId: pipeline.id, runId: active },
      }));
    }

    const buildNumber = await this.store.runs.nextBuildNumber(pipeline.id);
    const now = new Date(this.clock.now()).toISOString();
    const run: PipelineRun = {
      id: `run_${uuid()}`,
      pipelineId: pipeline.id,
      buildNumber,
      status: RunStatus.Created,
      createdAt: now,
      updatedAt: now,
      stageResults: pipeline.stages.map((stage) => ({
        name: stage.name,
        context: stage.context,
        status: StageRunStatus.Pending,
        commandsRun: [],
        absorbed: [],
      })),
      hookResults: [],
      parameters: { ...input.parameters },
    };

    await this.store.runs.create(run);
    this.activeRuns.set(pipeline.id, run.id);
    this.controllers.set(run.id, new AbortController());
    await this.safePublishRunEvent(run, 'run.created');
    this.log.info('Run created', { runId: run.id, pipelineId: run.pipelineId, buildNumber });
    return run;
  }

  /** Create and execute a run. */
  async run(input: StartRunInput): Promise<PipelineRun> {
    const run = await this.createRun(input);
    return this.executeRun(run.id);
  }

  /** Execute a created run to a terminal status. */
  async executeRun(runId: string): Promise<PipelineRun> {
    if (this.runningRuns.has(runId)) {
      throw new ExecutorError(createTypedError({
        code: 'RUN.ALREADY_RUNNING',
        message: `Run "${runId}" is already being executed`,
      }));
    }
    this.runningRuns.add(runId);
    try {
      return await this.executeRunInternal(runId);
    } finally {
      this.runningRuns.delete(runId);
    }
  }

  /**
   * Abort a run. A running run stops its current stage (processes are
   * killed), then runs its hooks and ends `aborted`. A run that was created
   * but never started ends `aborted` immediately.
   */
  async abort(runId: string, abortedBy: string, reason?: string): Promise<PipelineRun> {
    const run = await this.store.runs.getById(runId);
    if (!run) {
      throw new ExecutorError(runNotFoundError(runId));
    }
    if (isTerminalRunStatus(run.status)) {
      throw new ExecutorError(createTypedError({
        code: 'RUN.NOT_ABORTABLE',
        message: `Run "${runId}" has already ${run.status}`,
        runId,
        details: { status: run.status },
      }));
    }

    const message = reason ?? `aborted by ${abortedBy}`;
    this.abortRequests.set(runId, { abortedBy, reason: message });
    this.controllers.get(runId)?.abort(message);
    this.log.warn('Abort requested', { runId, abortedBy, reason: message });

    if (this.runningRuns.has(runId)) {
      return { ...run, abortedBy, abortReason: message };
    }

    // Never started: nothing to stop and nothing to clean up.
    const now = new Date(this.clock.now()).toISOString();
    const aborted = await this.finishRun({
      ...run,
      abortedBy,
      abortReason: message,
      error: runAbortedError(runId, message),
      stageResults: run.stageResults.map((s) => ({ ...s, status: StageRunStatus.Skipped })),
      completedAt: now,
    }, RunStatus.Aborted);
    this.release(aborted);
    return aborted;
  }

  private async executeRunInternal(runId: string): Promise<PipelineRun> {
    let run = await this.store.runs.getById(runId);
    if (!run) {
      throw new ExecutorError(runNotFoundError(runId));
    }
    if (run.status !== RunStatus.Created) {
      throw new ExecutorError(createTypedError({
        code: 'RUN.INVALID_STATE',
        message: `Run "${runId}" is ${run.status}; only created runs can be executed`,
        runId,
      }));
    }
    const pipeline = this.pipelines.get(run.pipelineId);
    if (!pipeline) {
      throw new ExecutorError(notFoundError('Pipeline', run.pipelineId));
    }

    const controller = this.controllers.get(runId) ?? new AbortController();
    this.controllers.set(runId, controller);
    const log = this.log.child({ runId, pipelineId: run.pipelineId, buildNumber: run.buildNumber });

    try {
      run = await this.transitionRun(run, RunStatus.Running);
      run.startedAt = new Date(this.clock.now()).toISOString();
      run = await this.saveRun(run);
      await this.safePublishRunEvent(run, 'run.started');
      log.info('Run started', { stages: pipeline.stages.map((s) => s.name) });

      const volumes = planRunVolumes(
        this.config.workRoot,
        `${run.pipelineId}-${run.buildNumber}`,
        buildCacheDir(this.config.workRoot, run.pipelineId),
      );
      const facts: RunFacts = {};
      let outcome: RunStatus = RunStatus.Succeeded;
      let failedStage: StageResult | undefined;

      try {
        await ensureRunVolumes(volumes);
        const outcomeOfStages = await this.runStages(run, pipeline, volumes, facts, controller.signal, log);
        outcome = outcomeOfStages.status;
        failedStage = outcomeOfStages.failedStage;
      } catch (err) {
        // Engine-level failure (store, volumes): still run the hooks.
        outcome = controller.signal.aborted ? RunStatus.Aborted : RunStatus.Failed;
        run.error = err instanceof PipelineError || err instanceof ExecutorError
          ? err.typedError
          : createTypedError({ code: 'SYSTEM.INTERNAL', message: err instanceof Error ? err.message : String(err) });
        log.error('Run failed outside of a stage', { code: run.error.code, error: run.error.message });
      }

      run.commit = facts.commit ?? run.commit;
      run.artifact = facts.artifact ?? run.artifact;

      if (outcome === RunStatus.Failed && failedStage?.error) {
        run.error = failedStage.error;
      } else if (outcome === RunStatus.Aborted) {
        const request = this.abortRequests.get(run.id);
        run.abortedBy = request?.abortedBy;
        run.abortReason = request?.reason;
        run.error = runAbortedError(run.id, request?.reason);
      }

      const diagnostics = await this.runHooks(run, pipeline, outcome, volumes, log);

      if (outcome !== RunStatus.Succeeded) {
        run.failureReport = buildFailureReport(run, failedStage, diagnostics);
        log.error('Failure report', {
          stage: run.failureReport.stage,
          report: `${run.failureReport.errorOutput}\n${renderDiagnostics(run.failureReport.diagnostics)}`,
        });
      }

      run.completedAt = new Date(this.clock.now()).toISOString();
      run = await this.finishRun(run, outcome);
      log.info('Run finished', { status: run.status });
      return run;
    } finally {
      this.release(run);
    }
  }

  private async runStages(
    run: PipelineRun,
    pipeline: PipelineDefinition,
    volumes: RunVolumes,
    facts: RunFacts,
    signal: AbortSignal,
    log: Logger,
  ): Promise<{ status: RunStatus; failedStage?: StageResult }> {
    let status: RunStatus = RunStatus.Succeeded;
    let failedStage: StageResult | undefined;
    const runInfo = { id: run.id, pipelineId: run.pipelineId, buildNumber: run.buildNumber, parameters: run.parameters };

    for (const [index, stage] of pipeline.stages.entries()) {
      if (status === RunStatus.Succeeded && signal.aborted) status = RunStatus.Aborted;
      if (status !== RunStatus.Succeeded) {
        run.stageResults[index] = { ...run.stageResults[index], status: StageRunStatus.Skipped };
        await this.saveRun(run);
        await this.safePublishStageEvent(run, stage.name, 'stage.skipped');
        continue;
      }

      run.stageResults[index] = { ...run.stageResults[index], status: StageRunStatus.Running };
      await this.saveRun(run);
      await this.safePublishStageEvent(run, stage.name, 'stage.started');

      const artifactBefore = facts.artifact;
      const result = await executeStage(stage, {
        run: runInfo,
        volumes,
        facts,
        pool: this.deps.pool,
        scopes: this.deps.scopes,
        artifacts: this.store.artifacts,
        clock: this.clock,
        log,
        signal,
        cancelGraceMs: this.config.cancelGraceMs,
        onAbsorbed: (command, error) => {
          void this.safePublish(run, 'command.absorbed', stage.name, { command, error });
        },
      });

      run.stageResults[index] = result;
      run.commit = facts.commit ?? run.commit;
      run.artifact = facts.artifact ?? run.artifact;
      await this.saveRun(run);
      const eventType = STAGE_EVENT[result.status];
      if (eventType) await this.safePublishStageEvent(run, stage.name, eventType);
      if (facts.artifact && facts.artifact !== artifactBefore) {
        await this.safePublish(run, 'artifact.pushed', stage.name, { ref: facts.artifact.ref });
      }

      if (result.status === StageRunStatus.Failed) {
        status = RunStatus.Failed;
        failedStage = result;
      } else if (result.status === StageRunStatus.Aborted) {
        status = RunStatus.Aborted;
        failedStage = result;
      }
    }
    return { status, failedStage };
  }

  /**
   * `always` hooks, then `success` or `failure` hooks, then removal of the
   * run's volumes. Returns diagnostics attached by the hooks.
   */
  private async runHooks(
    run: PipelineRun,
    pipeline: PipelineDefinition,
    outcome: RunStatus,
    volumes: RunVolumes,
    log: Logger,
  ): Promise<DiagnosticBlock[]> {
    const diagnostics: DiagnosticBlock[] = [];
    const snapshot = deepFreeze(structuredClone({ ...run, status: outcome }));
    const phases: Array<[HookKind, PipelineDefinition['hooks']['always']]> = [
      ['always', pipeline.hooks.always],
      outcome === RunStatus.Succeeded ? ['success', pipeline.hooks.success] : ['failure', pipeline.hooks.failure],
    ];

    for (const [kind, hooks] of phases) {
      for (const hook of hooks) {
        const startedAt = this.clock.now();
        const error = await executeHook(kind, hook, {
          snapshot,
          volumes,
          pool: this.deps.pool,
          scopes: this.deps.scopes,
          clock: this.clock,
          log,
          timeoutMs: this.config.hookTimeoutMs,
          cancelGraceMs: this.config.cancelGraceMs,
          attachDiagnostics: (blocks) => diagnostics.push(...blocks),
        });
        await this.recordHook(run, { hook: kind, name: hook.name, ok: error === undefined, error, durationMs: this.clock.now() - startedAt });
      }
    }

    const startedAt = this.clock.now();
    let cleanupError: string | undefined;
    try {
      await removeRunVolumes(volumes);
    } catch (err) {
      cleanupError = err instanceof Error ? err.message : String(err);
      log.error('Run volume cleanup failed', { root: volumes.root, error: cleanupError });
    }
    await this.recordHook(run, {
      hook: 'always',
      name: 'remove run volumes',
      ok: cleanupError === undefined,
      error: cleanupError,
      durationMs: this.clock.now() - startedAt,
    });
    return diagnostics;
  }

  private async recordHook(run: PipelineRun, result: HookResult): Promise<void> {
    run.hookResults.push(result);
    await this.saveRun(run);
    await this.safePublish(run, 'hook.completed', undefined, { ...result });
  }

  private async finishRun(run: PipelineRun, status: RunStatus): Promise<PipelineRun> {
    const finished = await this.transitionRun(run, status);
    await this.safePublishRunEvent(finished, RUN_EVENT[status]);
    return finished;
  }

  private release(run: PipelineRun): void {
    this.controllers.delete(run.id);
    this.abortRequests.delete(run.id);
    if (this.activeRuns.get(run.pipelineId) === run.id) this.activeRuns.delete(run.pipelineId);
  }

  private async transitionRun(run: PipelineRun, target: RunStatus): Promise<PipelineRun> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new ExecutorError({ ...result.error, runId: run.id });
    }
    return this.saveRun({ ...run, status: result.newStatus });
  }

  private async saveRun(run: PipelineRun): Promise<PipelineRun> {
    const saved = await this.store.runs.update(run.id, run);
    if (!saved) {
      throw new ExecutorError(runNotFoundError(run.id));
    }
    run.updatedAt = saved.updatedAt;
    return run;
  }

  // Publishing is observational: a failure is logged and never affects the run.

  private async safePublishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishRunEvent(run, eventType);
    } catch (err) {
      this.logPublishFailure(eventType, err);
    }
  }

  private async safePublishStageEvent(run: PipelineRun, stage: string, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishStageEvent(run, stage, eventType);
    } catch (err) {
      this.logPublishFailure(eventType, err);
    }
  }

  private async safePublish(
    run: PipelineRun,
    eventType: PipelineEventType,
    stage: string | undefined,
    payload: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.publisher.publish(run, eventType, stage, payload);
    } catch (err) {
      this.logPublishFailure(eventType, err);
    }
  }

  private logPublishFailure(eventType: PipelineEventType, err: unknown): void {
    this.log.warn('Event publication failed', { eventType, error: err instanceof Error ? err.message : String(err) });
  }
}

/** The failing stage's own output first, then the cluster diagnostics. */
function buildFailureReport(
  run: PipelineRun,
  failedStage: StageResult | undefined,
  diagnostics: DiagnosticBlock[],
): FailureReport {
  return {
    stage: failedStage?.name,
    errorOutput: failedStage?.errorOutput ?? failedStage?.error?.message ?? run.error?.message ?? '',
    diagnostics,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Executor-specific error wrapper. */
export class ExecutorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}
