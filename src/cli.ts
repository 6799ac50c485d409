#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   shipline run [--config <file>] [--branch <name>] [--param key=value]...
 *   shipline validate [--config <file>]
 *   shipline history [--config <file>] [--limit <n>]
 *
 * `run` exits 0 when every stage succeeded, 1 on failure and 130 when
 * interrupted.
 */

import { v4 as uuid } from 'uuid';
import { loadConfig } from './config';
import { renderDiagnostics } from './domain/diagnostics';
import { PipelineError } from './domain/errors';
import { PipelineEvent } from './domain/events';
import { PipelineRun, RunStatus } from './domain/run';
import { ExecutorError } from './engine/executor';
import { LogLevel, parseLogLevel, setLogLevel } from './logger';
import { createAppContext } from './server';
import { FileStore } from './storage/file-store';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

export interface CliArgs {
  command: string;
  config?: string;
  parameters: Record<string, string>;
  limit?: number;
}

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
  /** Register an interrupt handler; returns its removal. */
  onInterrupt: (handler: () => void) => () => void;
}

export const USAGE = [
  'Usage:',
  '  shipline run [--config <file>] [--branch <name>] [--param key=value]...',
  '  shipline validate [--config <file>]',
  '  shipline history [--config <file>] [--limit <n>]',
].join('\n');

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!command || command === '--help' || command === '-h') throw new UsageError('No command given');
  const args: CliArgs = { command, parameters: {} };

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    const value = rest[i + 1];
    const needValue = (): string => {
      if (value === undefined || value.startsWith('--')) throw new UsageError(`${flag} needs a value`);
      i++;
      return value;
    };
    switch (flag) {
      case '--config':
        args.config = needValue();
        break;
      case '--branch':
        args.parameters.branch = needValue();
        break;
      case '--param': {
        const pair = needValue();
        const eq = pair.indexOf('=');
        if (eq <= 0) throw new UsageError(`--param expects key=value, got "${pair}"`);
        args.parameters[pair.slice(0, eq)] = pair.slice(eq + 1);
        break;
      }
      case '--limit': {
        const limit = Number(needValue());
        if (!Number.isInteger(limit) || limit < 1) throw new UsageError('--limit must be a positive integer');
        args.limit = limit;
        break;
      }
      default:
        throw new UsageError(`Unknown option "${flag}"`);
    }
  }
  return args;
}

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case RunStatus.Succeeded:
      return EXIT_SUCCESS;
    case RunStatus.Aborted:
      return EXIT_INTERRUPTED;
    default:
      return EXIT_FAILURE;
  }
}

/** One progress line per stage event; other events print nothing. */
export function formatEvent(event: PipelineEvent): string | undefined {
  if (!event.stage || !event.type.startsWith('stage.')) return undefined;
  const state = event.type.slice('stage.'.length);
  const duration = typeof event.payload.durationMs === 'number' ? ` (${event.payload.durationMs}ms)` : '';
  return `[${event.stage}] ${state}${duration}`;
}

/** Summary printed when a run ends. */
export function formatSummary(run: PipelineRun): string[] {
  const lines = [`Build #${run.buildNumber} ${run.status}`];
  if (run.commit) lines.push(`commit: ${run.commit}`);
  if (run.artifact) lines.push(`image: ${run.artifact.ref}`);
  for (const stage of run.stageResults) {
    for (const absorbed of stage.absorbed) {
      lines.push(`warning: [${stage.name}] ${absorbed.command} failed and was absorbed: ${absorbed.error.message}`);
    }
  }
  for (const hook of run.hookResults) {
    if (!hook.ok) lines.push(`warning: ${hook.hook} hook "${hook.name}" failed: ${hook.error ?? 'unknown error'}`);
  }
  if (run.failureReport) {
    lines.push(`failed stage: ${run.failureReport.stage ?? '(none)'}`);
    if (run.failureReport.errorOutput) lines.push(run.failureReport.errorOutput);
    if (run.failureReport.diagnostics.length > 0) lines.push(renderDiagnostics(run.failureReport.diagnostics));
  }
  return lines;
}

function errorMessage(err: unknown): string {
  if (err instanceof PipelineError || err instanceof ExecutorError) return `${err.typedError.code}: ${err.typedError.message}`;
  return err instanceof Error ? err.message : String(err);
}

export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(err.message);
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  try {
    const { config, warnings } = await loadConfig({ env: io.env, file: args.config });
    setLogLevel(parseLogLevel(config.logLevel) ?? LogLevel.Info);
    for (const warning of warnings) io.stderr(`warning: ${warning}`);

    switch (args.command) {
      case 'validate':
        io.stdout(`Configuration for pipeline "${config.pipelineId}" is valid`);
        return EXIT_SUCCESS;

      case 'history': {
        const store = await FileStore.open(config.storeFile);
        const { items } = await store.runs.list({ pipelineId: config.pipelineId, limit: args.limit ?? 20 });
        for (const run of items) {
          io.stdout(`#${run.buildNumber}\t${run.status}\t${run.createdAt}\t${run.artifact?.ref ?? '-'}`);
        }
        return EXIT_SUCCESS;
      }

      case 'run': {
        const store = await FileStore.open(config.storeFile);
        const ctx = createAppContext(config, { store, env: io.env });
        const run = await ctx.executor.createRun({ pipelineId: config.pipelineId, parameters: args.parameters });
        io.stdout(`Build #${run.buildNumber} started (${run.id})`);

        const unsubscribe = ctx.publisher.subscribe({
          id: `cli_${uuid()}`,
          runId: run.id,
          callback: (event) => {
            const line = formatEvent(event);
            if (line) io.stdout(line);
          },
        });
        const removeInterrupt = io.onInterrupt(() => {
          io.stderr('Interrupted; aborting run');
          ctx.executor.abort(run.id, 'cli', 'interrupted').catch((err: unknown) => {
            io.stderr(`abort failed: ${errorMessage(err)}`);
          });
        });

        try {
          const finished = await ctx.executor.executeRun(run.id);
          for (const line of formatSummary(finished)) io.stdout(line);
          return exitCodeFor(finished.status);
        } finally {
          removeInterrupt();
          unsubscribe();
          await store.flush();
        }
      }

      default:
        io.stderr(`Unknown command "${args.command}"`);
        io.stderr(USAGE);
        return EXIT_USAGE;
    }
  } catch (err) {
    io.stderr(`error: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
    onInterrupt: (handler) => {
      process.on('SIGINT', handler);
      return () => process.off('SIGINT', handler);
    },
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`fatal: ${errorMessage(err)}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
