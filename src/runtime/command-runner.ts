/**
 * Process execution.
 *
 * Every external collaborator (git, npm, the builder daemon, kubectl) is
 * reached by running a command. Commands are spawned without a shell;
 * argv is passed through as-is.
 */

import { spawn } from 'child_process';

export interface CommandSpec {
  argv: string[];
  cwd?: string;
  /** Full environment for the child; nothing is inherited implicitly. */
  env?: Record<string, string>;
  /** Written to stdin, then stdin is closed. */
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  /** null when the process was killed by a signal or never started. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  aborted: boolean;
}

/** A process left running in the background (e.g. a daemon). */
export interface BackgroundProcess {
  readonly argv: string[];
  /** Settles when the process exits, for whatever reason. */
  readonly exited: Promise<CommandResult>;
  hasExited(): boolean;
  /** Terminate the process and wait for it to exit. Safe to call twice. */
  stop(): Promise<void>;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
  start(spec: CommandSpec): BackgroundProcess;
}

/** stdout followed by stderr, trimmed, for error reports. */
export function combinedOutput(result: Pick<CommandResult, 'stdout' | 'stderr'>): string {
  return [result.stdout.trimEnd(), result.stderr.trimEnd()].filter((s) => s.length > 0).join('\n');
}

/** Keep the last `maxBytes` characters of an output stream. */
function appendCapped(current: string, chunk: string, maxBytes: number): string {
  const next = current + chunk;
  return next.length > maxBytes ? next.slice(next.length - maxBytes) : next;
}

export interface ProcessRunnerOptions {
  /** Per-stream output cap; the tail is kept. */
  maxOutputBytes: number;
  /** Grace period between SIGTERM and SIGKILL. */
  killGraceMs: number;
}

const DEFAULT_RUNNER_OPTIONS: ProcessRunnerOptions = {
  maxOutputBytes: 1024 * 1024,
  killGraceMs: 5_000,
};

/** Runs commands as child processes of this one. */
export class ProcessCommandRunner implements CommandRunner {
  private options: ProcessRunnerOptions;

  constructor(options?: Partial<ProcessRunnerOptions>) {
    this.options = { ...DEFAULT_RUNNER_OPTIONS, ...options };
  }

  run(spec: CommandSpec): Promise<CommandResult> {
    return this.spawnProcess(spec).exited;
  }

  start(spec: CommandSpec): BackgroundProcess {
    return this.spawnProcess(spec);
  }

  private spawnProcess(spec: CommandSpec): BackgroundProcess {
    const [file, ...args] = spec.argv;
    const startedAt = Date.now();
    const { maxOutputBytes, killGraceMs } = this.options;
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;
    let done = false;

    const child = spawn(file, args, {
      cwd: spec.cwd,
      env: spec.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let killTimer: NodeJS.Timeout | undefined;
    const terminate = () => {
      if (done) return;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (!done) child.kill('SIGKILL');
      }, killGraceMs);
    };

    const timeoutTimer = spec.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          terminate();
        }, spec.timeoutMs)
      : undefined;

    const onAbort = () => {
      aborted = true;
      terminate();
    };
    if (spec.signal?.aborted) onAbort();
    spec.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout = appendCapped(stdout, chunk, maxOutputBytes);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = appendCapped(stderr, chunk, maxOutputBytes);
    });

    // A closed stdin (EPIPE) is reported through the exit code, not here.
    child.stdin.on('error', () => undefined);
    if (spec.input !== undefined) child.stdin.write(spec.input);
    child.stdin.end();

    const exited = new Promise<CommandResult>((resolve) => {
      const finish = (exitCode: number | null, extraStderr?: string) => {
        if (done) return;
        done = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        spec.signal?.removeEventListener('abort', onAbort);
        resolve({
          exitCode,
          stdout,
          stderr: extraStderr ? appendCapped(stderr, extraStderr, maxOutputBytes) : stderr,
          durationMs: Date.now() - startedAt,
          timedOut,
          aborted,
        });
      };
      child.on('error', (err) => finish(null, `${err.message}\n`));
      child.on('close', (code) => finish(code));
    });

    return {
      argv: spec.argv,
      exited,
      hasExited: () => done,
      stop: async () => {
        terminate();
        await exited;
      },
    };
  }
}
