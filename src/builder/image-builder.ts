/**
 * Image Builder Coordinator.
 *
 * Starts the builder daemon in the background, waits for its control
 * endpoint under a bounded readiness poll, submits one build-and-push, and
 * stops the daemon on every exit path. Failures carry the builder's own
 * (masked) output and are never retried here.
 */

import path from 'path';
import { BuildCacheStore, FinalizeResult } from '../cache/build-cache';
import { CredentialScope } from '../credentials/credential-scope';
import { POLLING_PRESETS, PollingConfig, executeWithPollingBudget } from '../domain/async-polling';
import {
  PipelineError,
  TypedError,
  builderUnavailableError,
  createTypedError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { Clock, systemClock } from '../runtime/clock';
import { combinedOutput } from '../runtime/command-runner';
import { ExecutionContext } from '../runtime/execution-context';
import { BuilderDaemon } from './daemon';
import { RegistryCredentials, registryAuthToken, renderRegistryAuthConfig } from './registry';

export interface BuildAndPushRequest {
  context: ExecutionContext;
  /** Build context directory. */
  sourceDir: string;
  imageRef: string;
  credentials: RegistryCredentials;
  cache: BuildCacheStore;
  /** Scope of the calling stage; the registry auth file is written into it. */
  scope: CredentialScope;
  signal?: AbortSignal;
}

export interface BuildResult {
  imageRef: string;
  durationMs: number;
  /** Masked builder output. */
  output: string;
  readinessPolls: number;
  cache: FinalizeResult;
}

export interface ImageBuilderOptions {
  dockerfile: string;
  /** Bounded readiness wait for the daemon. */
  readiness: PollingConfig;
}

export const DEFAULT_IMAGE_BUILDER_OPTIONS: ImageBuilderOptions = {
  dockerfile: 'Dockerfile',
  readiness: { ...POLLING_PRESETS.builderReadiness },
};

const AUTH_FAILURE = /unauthori[sz]ed|authentication required|denied: requested access|401 Unauthorized|403 Forbidden|insufficient_scope/i;
const PUSH_FAILURE = /failed to push|error pushing|push access denied|failed commit on ref .*layer|unexpected status.*(PUT|POST)/i;

/** Classify a failed build by the builder's own output. */
export function classifyBuildFailure(output: string, exitCode: number | null): TypedError {
  const details = { exitCode, output };
  if (AUTH_FAILURE.test(output)) {
    return createTypedError({
      code: 'BUILDER.REGISTRY_AUTH',
      message: 'Registry rejected the credentials',
      details,
      suggestedFixes: [
        { type: 'CHECK_REGISTRY_CREDENTIALS', params: {}, description: 'Verify the registry credential binding has push access' },
      ],
    });
  }
  if (PUSH_FAILURE.test(output)) {
    return createTypedError({ code: 'BUILDER.PUSH_FAILED', message: 'Image push failed', details });
  }
  return createTypedError({
    code: 'BUILDER.BUILD_FAILED',
    message: exitCode === null ? 'Image build was terminated' : `Image build exited with code ${exitCode}`,
    details,
  });
}

export class ImageBuilderCoordinator {
  private options: ImageBuilderOptions;

  constructor(
    private daemon: BuilderDaemon,
    options?: Partial<ImageBuilderOptions>,
    private clock: Clock = systemClock,
    private log: Logger = rootLogger.child({ module: 'image-builder' }),
  ) {
    this.options = { ...DEFAULT_IMAGE_BUILDER_OPTIONS, ...options };
  }

  async buildAndPush(request: BuildAndPushRequest): Promise<BuildResult> {
    const { context, scope, signal } = request;
    const startedAt = this.clock.now();
    scope.addSecret(request.credentials.password);
    scope.addSecret(registryAuthToken(request.credentials));

    const cacheRefs = await request.cache.prepare();
    let finalized = false;
    const daemonProcess = this.daemon.start(context, signal);
    this.log.info('Builder daemon started', { argv: daemonProcess.argv });

    try {
      const readinessPolls = await this.waitUntilReady(context, daemonProcess.hasExited, daemonProcess.exited, signal);

      const authFile = await scope.writeFile(path.join('registry', 'config.json'),
        renderRegistryAuthConfig(request.imageRef, request.credentials));

      this.log.info('Submitting build', { imageRef: request.imageRef, cacheImport: Boolean(cacheRefs.importRef) });
      const result = await this.daemon.build(context, {
        contextDir: request.sourceDir,
        dockerfile: this.options.dockerfile,
        imageRef: request.imageRef,
        push: true,
        cacheImport: cacheRefs.importRef,
        cacheExport: cacheRefs.exportRef,
        registryAuthDir: path.dirname(authFile),
      }, signal);

      const output = scope.mask(combinedOutput(result));
      if (result.exitCode !== 0) {
        throw new PipelineError(classifyBuildFailure(output, result.exitCode));
      }

      const cache = await request.cache.finalize(cacheRefs.stagingDir);
      finalized = true;
      return {
        imageRef: request.imageRef,
        durationMs: this.clock.now() - startedAt,
        output,
        readinessPolls,
        cache,
      };
    } finally {
      if (!finalized) await request.cache.discard(cacheRefs.stagingDir);
      await daemonProcess.stop();
      this.log.debug('Builder daemon stopped');
    }
  }

  /**
   * Poll the daemon's probe with backoff. An early daemon exit or an
   * exhausted budget is "builder unavailable".
   */
  private async waitUntilReady(
    context: ExecutionContext,
    hasExited: () => boolean,
    exited: Promise<{ exitCode: number | null; stderr: string }>,
    signal: AbortSignal | undefined,
  ): Promise<number> {
    const result = await executeWithPollingBudget<true>(
      async () => {
        if (hasExited()) {
          const { exitCode, stderr } = await exited;
          const tail = stderr.trim().split('\n').slice(-5).join('\n');
          return { kind: 'stop', reason: `daemon exited with code ${exitCode}${tail ? `: ${tail}` : ''}` };
        }
        return (await this.daemon.probe(context, signal))
          ? { kind: 'done', value: true }
          : { kind: 'pending', statusMessage: 'control endpoint not reachable' };
      },
      {
        ...this.options.readiness,
        onPollError: (err, pollCount) => {
          this.log.debug('Builder probe failed', { pollCount, error: err instanceof Error ? err.message : String(err) });
        },
      },
      this.clock,
      signal,
    );

    if (!result.success) {
      const reason = result.stopped
        ? result.error ?? 'daemon exited'
        : `control endpoint not reachable after ${result.totalElapsedMs}ms`;
      throw new PipelineError(builderUnavailableError(result.totalElapsedMs, reason));
    }
    this.log.info('Builder daemon ready', { polls: result.pollCount, waitedMs: result.totalElapsedMs });
    return result.pollCount;
  }
}
