/**
 * Stage runner.
 *
 * A stage runs its commands in order inside one execution context, with
 * its credential bindings materialized for exactly as long as the stage
 * body runs. Command failures are either fatal (the stage fails with the
 * command's output) or absorbed (recorded on the stage result and logged).
 * Stage and hook deadlines are enforced through an AbortSignal: running
 * processes are killed and the command is awaited before the stage's
 * credentials are removed.
 */

import { CredentialScope, CredentialScopeManager } from '../credentials/credential-scope';
import { BuildArtifact } from '../domain/artifact';
import { CredentialBinding } from '../domain/credentials';
import { DiagnosticBlock } from '../domain/diagnostics';
import {
  PipelineError,
  TypedError,
  commandFailedError,
  createTypedError,
  stageTimeoutError,
  toTypedError,
} from '../domain/errors';
import { HookKind, PipelineRun, StageResult, StageRunStatus } from '../domain/run';
import { Logger } from '../logger';
import { AbortedError, Clock, abortReason } from '../runtime/clock';
import { CommandResult, combinedOutput } from '../runtime/command-runner';
import { ExecutionContext, ExecutionContextPool, RunVolumes } from '../runtime/execution-context';
import { ArtifactStore } from '../storage/store';

// ---------------------------------------------------------------------------
// Pipeline definition
// ---------------------------------------------------------------------------

export type FailurePolicy = 'fatal' | 'absorb';

export interface RunInfo {
  id: string;
  pipelineId: string;
  buildNumber: number;
  parameters: Record<string, string>;
}

/** Facts a stage establishes for later stages (and the run record). */
export interface RunFacts {
  commit?: string;
  artifact?: BuildArtifact;
}

export interface StageContext {
  run: RunInfo;
  stage: string;
  context: ExecutionContext;
  credentials: CredentialScope;
  volumes: RunVolumes;
  facts: RunFacts;
  artifacts: ArtifactStore;
  signal: AbortSignal;
  log: Logger;
}

export interface Command {
  name: string;
  onFailure: FailurePolicy;
  execute(ctx: StageContext): Promise<void>;
}

export interface Stage {
  name: string;
  /** Execution context identity. */
  context: string;
  credentials?: CredentialBinding[];
  commands: Command[];
  timeoutMs?: number;
}

export interface HookContext {
  hook: HookKind;
  /** Frozen snapshot of the run as of the end of its stages. */
  run: Readonly<PipelineRun>;
  volumes: RunVolumes;
  /** Present when the hook declares a context. */
  context?: ExecutionContext;
  credentials: CredentialScope;
  signal: AbortSignal;
  log: Logger;
  /** Add diagnostics to the run's failure report. */
  attachDiagnostics(blocks: DiagnosticBlock[]): void;
}

export interface Hook {
  name: string;
  context?: string;
  credentials?: CredentialBinding[];
  run(ctx: HookContext): Promise<void>;
}

export interface PipelineDefinition {
  id: string;
  stages: Stage[];
  hooks: {
    always: Hook[];
    success: Hook[];
    failure: Hook[];
  };
}

// ---------------------------------------------------------------------------
// Command factories
// ---------------------------------------------------------------------------

export interface ShellCommandOptions {
  onFailure?: FailurePolicy;
  /** Relative to the workspace volume. */
  cwd?: string | ((ctx: StageContext) => string);
  env?: Record<string, string> | ((ctx: StageContext) => Record<string, string>);
  timeoutMs?: number;
}

/**
 * Run one process in the stage's context with the stage's credential
 * environment. A non-zero exit rejects with COMMAND.NON_ZERO_EXIT carrying
 * the masked output; an abort rejects with AbortedError.
 */
export async function execChecked(
  ctx: StageContext,
  name: string,
  argv: string[],
  options: { cwd?: string; env?: Record<string, string>; input?: string; timeoutMs?: number } = {},
): Promise<CommandResult> {
  const result = await ctx.context.exec(argv, {
    cwd: options.cwd,
    env: { ...ctx.credentials.env, ...options.env },
    input: options.input,
    timeoutMs: options.timeoutMs,
    signal: ctx.signal,
  });
  if (result.aborted) throw new AbortedError(abortReason(ctx.signal));
  if (result.exitCode !== 0) {
    throw new PipelineError(commandFailedError(ctx.stage, name, result.exitCode, ctx.credentials.mask(combinedOutput(result))));
  }
  ctx.log.debug('Command completed', { command: name, durationMs: result.durationMs });
  return result;
}

/** A command that runs one process through execChecked. */
export function shellCommand(
  name: string,
  argv: string[] | ((ctx: StageContext) => string[]),
  options: ShellCommandOptions = {},
): Command {
  return {
    name,
    onFailure: options.onFailure ?? 'fatal',
    async execute(ctx) {
      const { cwd, env } = options;
      await execChecked(ctx, name, typeof argv === 'function' ? argv(ctx) : argv, {
        cwd: typeof cwd === 'function' ? cwd(ctx) : cwd,
        env: typeof env === 'function' ? env(ctx) : env,
        timeoutMs: options.timeoutMs,
      });
    },
  };
}

/** A structured step (build-and-push, deploy) implemented in code. */
export function actionCommand(
  name: string,
  execute: (ctx: StageContext) => Promise<void>,
  onFailure: FailurePolicy = 'fatal',
): Command {
  return { name, onFailure, execute };
}

// ---------------------------------------------------------------------------
// Deadlines
// ---------------------------------------------------------------------------

/** Thrown into a stage's signal when its own deadline passes. */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export interface Deadline {
  signal: AbortSignal;
  readonly expired: boolean;
  /** Stop the timer and detach from the parent signal. */
  clear(): void;
}

/**
 * A signal that aborts when `parent` aborts or, if `timeoutMs` is given,
 * when the deadline passes on `clock`.
 */
export function createDeadline(clock: Clock, timeoutMs: number | undefined, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timer = new AbortController();
  let expired = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  if (timeoutMs !== undefined) {
    void clock.sleep(timeoutMs, timer.signal).then(
      () => {
        expired = true;
        controller.abort(new DeadlineExceededError(timeoutMs));
      },
      // Rejects only when the timer is cleared.
      () => undefined,
    );
  }

  return {
    signal: controller.signal,
    get expired() {
      return expired;
    },
    clear() {
      timer.abort();
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export const DEFAULT_CANCEL_GRACE_MS = 10_000;

/**
 * Settle with `work`. Once `signal` aborts, wait for `work` to settle (its
 * processes are killed through the same signal) and reject with
 * AbortedError. If `work` is still running `graceMs` after the abort it is
 * abandoned: `onAbandoned` is called and the promise rejects anyway.
 */
export function settleAfterAbort<T>(
  work: Promise<T>,
  signal: AbortSignal,
  clock: Clock,
  graceMs: number,
  onAbandoned?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let aborted = false;
    const grace = new AbortController();
    const onAbort = () => {
      aborted = true;
      void clock.sleep(graceMs, grace.signal).then(
        () => {
          onAbandoned?.();
          reject(new AbortedError(abortReason(signal)));
        },
        // Rejects only when `work` settles within the grace period.
        () => undefined,
      );
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    const settle = (): boolean => {
      signal.removeEventListener('abort', onAbort);
      grace.abort();
      if (aborted) reject(new AbortedError(abortReason(signal)));
      return aborted;
    };
    work.then(
      (value) => {
        if (!settle()) resolve(value);
      },
      (err: unknown) => {
        if (!settle()) reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// Stage execution
// ---------------------------------------------------------------------------

export interface StageDeps {
  run: RunInfo;
  volumes: RunVolumes;
  facts: RunFacts;
  pool: ExecutionContextPool;
  scopes: CredentialScopeManager;
  artifacts: ArtifactStore;
  clock: Clock;
  log: Logger;
  /** The run's abort signal. */
  signal: AbortSignal;
  /** Wait for a cancelled command to wind down; defaults to DEFAULT_CANCEL_GRACE_MS. */
  cancelGraceMs?: number;
  onAbsorbed?: (command: string, error: TypedError) => void;
}

function outputOf(error: TypedError): string | undefined {
  const output = error.details?.output;
  return typeof output === 'string' && output.length > 0 ? output : undefined;
}

/** Run one stage to a terminal StageResult. Never throws. */
export async function executeStage(stage: Stage, deps: StageDeps): Promise<StageResult> {
  const startedAt = deps.clock.now();
  const result: StageResult = {
    name: stage.name,
    context: stage.context,
    status: StageRunStatus.Running,
    startedAt: new Date(startedAt).toISOString(),
    commandsRun: [],
    absorbed: [],
  };
  const log = deps.log.child({ stage: stage.name });
  const deadline = createDeadline(deps.clock, stage.timeoutMs, deps.signal);
  const graceMs = deps.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;

  const finish = (status: StageRunStatus, error?: TypedError): StageResult => {
    const completedAt = deps.clock.now();
    result.status = status;
    result.completedAt = new Date(completedAt).toISOString();
    result.durationMs = completedAt - startedAt;
    if (error) {
      result.error = error;
      result.errorOutput = outputOf(error);
    }
    return result;
  };

  try {
    const context = deps.pool.acquire(stage.context, deps.volumes, stage.name);
    await deps.scopes.withScope(stage.name, stage.credentials ?? [], async (credentials) => {
      const ctx: StageContext = {
        run: deps.run,
        stage: stage.name,
        context,
        credentials,
        volumes: deps.volumes,
        facts: deps.facts,
        artifacts: deps.artifacts,
        signal: deadline.signal,
        log,
      };
      for (const command of stage.commands) {
        if (deadline.signal.aborted) throw new AbortedError(abortReason(deadline.signal));
        log.info('Running command', { command: command.name });
        try {
          await settleAfterAbort(command.execute(ctx), deadline.signal, deps.clock, graceMs, () =>
            log.warn('Command still running after cancellation; abandoned', { command: command.name, graceMs }));
        } catch (err) {
          if (err instanceof AbortedError || deadline.signal.aborted || command.onFailure === 'fatal') throw err;
          const error = toTypedError(err, 'COMMAND.FAILED', stage.name);
          result.absorbed.push({ command: command.name, error });
          log.warn('Command failure absorbed', { command: command.name, code: error.code, error: error.message });
          deps.onAbsorbed?.(command.name, error);
        }
        result.commandsRun.push(command.name);
      }
    });
    log.info('Stage succeeded', { commands: result.commandsRun.length, absorbed: result.absorbed.length });
    return finish(StageRunStatus.Succeeded);
  } catch (err) {
    if (deadline.expired && stage.timeoutMs !== undefined) {
      log.error('Stage timed out', { timeoutMs: stage.timeoutMs });
      return finish(StageRunStatus.Failed, stageTimeoutError(stage.name, stage.timeoutMs));
    }
    if (deps.signal.aborted) {
      const reason = abortReason(deps.signal);
      log.warn('Stage aborted', { reason });
      return finish(StageRunStatus.Aborted, createTypedError({
        code: 'STAGE.ABORTED',
        message: `Stage "${stage.name}" was aborted: ${reason}`,
        stage: stage.name,
      }));
    }
    const error = toTypedError(err, 'STAGE.FAILED', stage.name);
    log.error('Stage failed', { code: error.code, error: error.message });
    return finish(StageRunStatus.Failed, error);
  } finally {
    deadline.clear();
  }
}

// ---------------------------------------------------------------------------
// Hook execution
// ---------------------------------------------------------------------------

export interface HookDeps {
  snapshot: Readonly<PipelineRun>;
  volumes: RunVolumes;
  pool: ExecutionContextPool;
  scopes: CredentialScopeManager;
  clock: Clock;
  log: Logger;
  timeoutMs: number;
  cancelGraceMs?: number;
  attachDiagnostics(blocks: DiagnosticBlock[]): void;
}

/** Run one hook. Resolves with the error message on failure; never throws. */
export async function executeHook(kind: HookKind, hook: Hook, deps: HookDeps): Promise<string | undefined> {
  const log = deps.log.child({ hook: kind, hookName: hook.name });
  // Hooks run after an abort too, so they get their own deadline, not the run's signal.
  const deadline = createDeadline(deps.clock, deps.timeoutMs);
  const graceMs = deps.cancelGraceMs ?? DEFAULT_CANCEL_GRACE_MS;
  try {
    const context = hook.context ? deps.pool.acquire(hook.context, deps.volumes) : undefined;
    await deps.scopes.withScope(`${kind}:${hook.name}`, hook.credentials ?? [], (credentials) =>
      settleAfterAbort(hook.run({
        hook: kind,
        run: deps.snapshot,
        volumes: deps.volumes,
        context,
        credentials,
        signal: deadline.signal,
        log,
        attachDiagnostics: deps.attachDiagnostics,
      }), deadline.signal, deps.clock, graceMs, () =>
        log.warn('Hook still running after its timeout; abandoned', { graceMs })),
    );
    return undefined;
  } catch (err) {
    const message = deadline.expired
      ? `hook exceeded its timeout of ${deps.timeoutMs}ms`
      : toTypedError(err, 'HOOK.FAILED').message;
    log.error('Hook failed', { error: message });
    return message;
  } finally {
    deadline.clear();
  }
}
