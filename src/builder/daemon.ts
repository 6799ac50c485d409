/**
 * Builder daemon adapter.
 *
 * The coordinator talks to the daemon through this interface: start it in
 * the background, probe its control endpoint, submit one build. The
 * BuildKit implementation drives `buildkitd` and `buildctl`.
 */

import { BackgroundProcess, CommandResult } from '../runtime/command-runner';
import { ExecutionContext } from '../runtime/execution-context';

export interface BuildRequest {
  /** Directory holding the source tree (build context). */
  contextDir: string;
  /** Dockerfile path relative to contextDir. */
  dockerfile: string;
  imageRef: string;
  push: boolean;
  cacheImport?: string;
  cacheExport?: string;
  /** Directory holding the registry auth config.json. */
  registryAuthDir?: string;
}

export interface BuilderDaemon {
  start(context: ExecutionContext, signal?: AbortSignal): BackgroundProcess;
  /** Resolves true once the control endpoint answers. */
  probe(context: ExecutionContext, signal?: AbortSignal): Promise<boolean>;
  build(context: ExecutionContext, request: BuildRequest, signal?: AbortSignal): Promise<CommandResult>;
}

export interface BuildkitOptions {
  /** Control socket, e.g. `unix:///run/buildkit/buildkitd.sock`. */
  address: string;
  /** argv that starts the daemon; the address flag is appended. */
  daemonCommand: string[];
  buildctlBinary: string;
  probeTimeoutMs: number;
}

export const DEFAULT_BUILDKIT_OPTIONS: BuildkitOptions = {
  address: 'unix:///run/buildkit/buildkitd.sock',
  daemonCommand: ['buildkitd'],
  buildctlBinary: 'buildctl',
  probeTimeoutMs: 5_000,
};

export class BuildkitDaemon implements BuilderDaemon {
  private options: BuildkitOptions;

  constructor(options?: Partial<BuildkitOptions>) {
    this.options = { ...DEFAULT_BUILDKIT_OPTIONS, ...options };
  }

  start(context: ExecutionContext, signal?: AbortSignal): BackgroundProcess {
    return context.start([...this.options.daemonCommand, '--addr', this.options.address], { signal });
  }

  async probe(context: ExecutionContext, signal?: AbortSignal): Promise<boolean> {
    const result = await context.exec(
      [this.options.buildctlBinary, '--addr', this.options.address, 'debug', 'workers'],
      { timeoutMs: this.options.probeTimeoutMs, signal },
    );
    return result.exitCode === 0;
  }

  build(context: ExecutionContext, request: BuildRequest, signal?: AbortSignal): Promise<CommandResult> {
    return context.exec(buildctlArgs(this.options, request), {
      env: request.registryAuthDir ? { DOCKER_CONFIG: request.registryAuthDir } : undefined,
      signal,
    });
  }
}

/** argv for one `buildctl build` invocation. */
export function buildctlArgs(options: Pick<BuildkitOptions, 'address' | 'buildctlBinary'>, request: BuildRequest): string[] {
  const argv = [
    options.buildctlBinary,
    '--addr', options.address,
    'build',
    '--frontend', 'dockerfile.v0',
    '--local', `context=${request.contextDir}`,
    '--local', `dockerfile=${request.contextDir}`,
    '--opt', `filename=${request.dockerfile}`,
    '--output', `type=image,name=${request.imageRef},push=${request.push}`,
  ];
  if (request.cacheImport) argv.push('--import-cache', request.cacheImport);
  if (request.cacheExport) argv.push('--export-cache', request.cacheExport);
  return argv;
}
