/**
 * Execution contexts and run volumes.
 *
 * A context is an isolated environment a stage's commands run in: it has
 * an identity, the image it is declared from, its own base environment and
 * the subset of run volumes it mounts. Volumes belong to the run and are
 * shared by every context that mounts them.
 */

import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { PipelineError, unknownContextError, volumeNotMountedError } from '../domain/errors';
import { BackgroundProcess, CommandResult, CommandRunner } from './command-runner';

export type VolumeName = 'workspace' | 'build-cache' | 'cache-config';

export const VOLUME_NAMES: readonly VolumeName[] = ['workspace', 'build-cache', 'cache-config'];

/** Host paths of the run-owned volumes. */
export interface RunVolumes {
  /** Per-run root holding workspace and cache-config. */
  root: string;
  paths: Record<VolumeName, string>;
}

/** Declared shape of a context, from configuration. */
export interface ContextTemplate {
  identity: string;
  image: string;
  mounts: VolumeName[];
  /** Base environment every command in this context sees. */
  env?: Record<string, string>;
}

export interface ExecOptions {
  env?: Record<string, string>;
  /** Relative paths resolve against the workspace volume. */
  cwd?: string;
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class ExecutionContext {
  readonly identity: string;
  readonly image: string;
  readonly volumes: Partial<Record<VolumeName, string>>;
  private baseEnv: Record<string, string>;

  constructor(
    template: ContextTemplate,
    runVolumes: RunVolumes,
    private runner: CommandRunner,
    hostEnv: Record<string, string>,
  ) {
    this.identity = template.identity;
    this.image = template.image;
    const mounted: Partial<Record<VolumeName, string>> = {};
    for (const name of template.mounts) mounted[name] = runVolumes.paths[name];
    this.volumes = mounted;
    this.baseEnv = { ...hostEnv, ...template.env };
  }

  /** Path of a mounted volume; throws if this context does not mount it. */
  volume(name: VolumeName): string {
    const mounted = this.volumes[name];
    if (!mounted) {
      throw new PipelineError(volumeNotMountedError(this.identity, name));
    }
    return mounted;
  }

  get workdir(): string | undefined {
    return this.volumes.workspace;
  }

  exec(argv: string[], options: ExecOptions = {}): Promise<CommandResult> {
    return this.runner.run({
      argv,
      cwd: this.resolveCwd(options.cwd),
      env: { ...this.baseEnv, ...options.env },
      input: options.input,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
  }

  start(argv: string[], options: ExecOptions = {}): BackgroundProcess {
    return this.runner.start({
      argv,
      cwd: this.resolveCwd(options.cwd),
      env: { ...this.baseEnv, ...options.env },
      signal: options.signal,
    });
  }

  private resolveCwd(cwd: string | undefined): string | undefined {
    if (cwd === undefined) return this.workdir;
    if (path.isAbsolute(cwd) || !this.workdir) return cwd;
    return path.join(this.workdir, cwd);
  }
}

/** Environment variables passed through from the host to every context. */
export const HOST_ENV_PASSTHROUGH = ['PATH', 'HOME', 'LANG', 'TMPDIR'] as const;

export function hostEnvironment(env: Record<string, string | undefined>): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of HOST_ENV_PASSTHROUGH) {
    const value = env[key];
    if (value !== undefined) picked[key] = value;
  }
  return picked;
}

/** Set of declared contexts; a stage acquires exactly one of them. */
export class ExecutionContextPool {
  private templates = new Map<string, ContextTemplate>();

  constructor(
    templates: readonly ContextTemplate[],
    private runner: CommandRunner,
    private hostEnv: Record<string, string> = {},
  ) {
    for (const template of templates) this.templates.set(template.identity, template);
  }

  identities(): string[] {
    return [...this.templates.keys()];
  }

  has(identity: string): boolean {
    return this.templates.has(identity);
  }

  acquire(identity: string, volumes: RunVolumes, stage?: string): ExecutionContext {
    const template = this.templates.get(identity);
    if (!template) {
      throw new PipelineError(unknownContextError(identity, stage));
    }
    return new ExecutionContext(template, volumes, this.runner, this.hostEnv);
  }
}

/**
 * Host paths of a run's volumes. Workspace and cache-config live under a
 * per-run root; the build cache directory is shared between runs of the
 * same pipeline and is passed in.
 */
export function planRunVolumes(workRoot: string, runKey: string, buildCacheDir: string): RunVolumes {
  const root = path.join(workRoot, runKey);
  return {
    root,
    paths: {
      workspace: path.join(root, 'workspace'),
      'cache-config': path.join(root, 'cache-config'),
      'build-cache': buildCacheDir,
    },
  };
}

/** Create every volume directory of a run. */
export async function ensureRunVolumes(volumes: RunVolumes): Promise<RunVolumes> {
  for (const dir of Object.values(volumes.paths)) {
    await mkdir(dir, { recursive: true });
  }
  return volumes;
}

/** Remove the per-run root. The shared build cache is left to the cache store. */
export async function removeRunVolumes(volumes: RunVolumes): Promise<void> {
  await rm(volumes.root, { recursive: true, force: true });
}
