/**
 * The delivery pipeline.
 *
 *   Checkout -> Install & Test -> Build & Push -> Deploy
 *
 * with an `always` hook that purges the build cache and a `failure` hook
 * that collects cluster diagnostics for the failure report.
 */

import path from 'path';
import { ImageBuilderCoordinator } from '../builder/image-builder';
import { BuildkitDaemon } from '../builder/daemon';
import { RegistryCredentials, expandRepositoryCommand } from '../builder/registry';
import { BuildCacheStore } from '../cache/build-cache';
import { ClusterAccess, ClusterClient, KubectlClusterClient } from '../cluster/cluster-client';
import { DiagnosticsCollector } from '../cluster/diagnostics';
import { ClusterReconciler } from '../cluster/reconciler';
import { CONTEXT_IDENTITIES, PipelineConfig } from '../config';
import { POLLING_PRESETS } from '../domain/async-polling';
import { BuildArtifact, imageRef, imageRepository, isProvenanceConflict } from '../domain/artifact';
import { CredentialBinding } from '../domain/credentials';
import { buildDescriptor, podSelector } from '../domain/descriptor';
import {
  PipelineError,
  createTypedError,
  rolloutFailedError,
  rolloutTimedOutError,
  secretMissingError,
  tagConflictError,
} from '../domain/errors';
import { Command, Hook, PipelineDefinition, StageContext, actionCommand, shellCommand } from '../engine/stage-runner';
import { Logger, logger as rootLogger } from '../logger';
import { Clock, systemClock } from '../runtime/clock';
import { ExecutionContext } from '../runtime/execution-context';
import { packageManagerCommands } from './package-manager';
import { GitSourceProvider, SOURCE_DIR, SourceProvider, checkoutCommand } from './source';

export const STAGE_NAMES = {
  checkout: 'Checkout',
  test: 'Install & Test',
  build: 'Build & Push',
  deploy: 'Deploy',
} as const;

export const REGISTRY_USERNAME_VARIABLE = 'REGISTRY_USERNAME';
export const REGISTRY_PASSWORD_VARIABLE = 'REGISTRY_PASSWORD';
export const KUBECONFIG_VARIABLE = 'KUBECONFIG';

export type ClusterClientFactory = (context: ExecutionContext, access: ClusterAccess) => ClusterClient;

export interface DeliveryPipelineDeps {
  source?: SourceProvider;
  imageBuilder?: ImageBuilderCoordinator;
  clusterClient?: ClusterClientFactory;
  clock?: Clock;
  log?: Logger;
}

export function registryBinding(config: PipelineConfig): CredentialBinding {
  return {
    kind: 'usernamePassword',
    id: config.registry.credentialId,
    usernameVariable: REGISTRY_USERNAME_VARIABLE,
    passwordVariable: REGISTRY_PASSWORD_VARIABLE,
  };
}

export function kubeconfigBinding(config: PipelineConfig): CredentialBinding {
  return {
    kind: 'secretFile',
    id: config.cluster.kubeconfigCredentialId,
    path: 'kubeconfig',
    variable: KUBECONFIG_VARIABLE,
  };
}

function registryCredentials(ctx: StageContext, bindingId: string): RegistryCredentials {
  const env = ctx.credentials.env;
  const username = env[REGISTRY_USERNAME_VARIABLE];
  const password = env[REGISTRY_PASSWORD_VARIABLE];
  if (username === undefined || password === undefined) {
    throw new PipelineError(secretMissingError(bindingId, ctx.stage));
  }
  return { username, password };
}

function requireArtifact(ctx: StageContext): BuildArtifact {
  const artifact = ctx.facts.artifact;
  if (!artifact) {
    throw new PipelineError(createTypedError({
      code: 'PIPELINE.NO_ARTIFACT',
      message: 'No image was pushed by an earlier stage',
      stage: ctx.stage,
    }));
  }
  return artifact;
}

export function createDeliveryPipeline(config: PipelineConfig, deps: DeliveryPipelineDeps = {}): PipelineDefinition {
  const clock = deps.clock ?? systemClock;
  const log = deps.log ?? rootLogger.child({ module: 'pipeline', pipelineId: config.pipelineId });
  const source = deps.source ?? new GitSourceProvider();
  const imageBuilder = deps.imageBuilder ?? new ImageBuilderCoordinator(
    new BuildkitDaemon({
      address: config.builder.address,
      daemonCommand: config.builder.daemonCommand,
      buildctlBinary: config.builder.buildctlBinary,
    }),
    {
      dockerfile: config.builder.dockerfile,
      readiness: { ...POLLING_PRESETS.builderReadiness, budgetMs: config.builder.readinessTimeoutMs },
    },
    clock,
  );
  const clusterClient: ClusterClientFactory = deps.clusterClient ?? ((context, access) =>
    new KubectlClusterClient(context, access, { kubectlBinary: config.cluster.kubectlBinary }, clock));

  const { namespace } = config.cluster;
  const deployment = config.deployment;

  const buildCommands: Command[] = [];
  const ensureRepository = config.registry.ensureRepositoryCommand;
  if (ensureRepository && ensureRepository.length > 0) {
    buildCommands.push(shellCommand(
      'ensure repository',
      expandRepositoryCommand(ensureRepository, imageRepository(config.registry.registry, config.registry.image), config.registry.image),
      { onFailure: 'absorb' },
    ));
  }
  buildCommands.push(actionCommand('build and push image', async (ctx) => {
    const ref = imageRef(config.registry.registry, config.registry.image, ctx.run.buildNumber);
    const provenance = {
      runId: ctx.run.id,
      pipelineId: ctx.run.pipelineId,
      buildNumber: ctx.run.buildNumber,
      commit: ctx.facts.commit,
    };

    const existing = await ctx.artifacts.getByRef(ref);
    if (existing && isProvenanceConflict(existing.provenance, provenance)) {
      if (config.registry.tagPolicy === 'fail') {
        throw new PipelineError({
          ...tagConflictError(ref, existing.provenance.runId, existing.provenance.commit),
          stage: ctx.stage,
        });
      }
      ctx.log.warn('Overwriting an image tag pushed from another source', {
        imageRef: ref,
        previousRunId: existing.provenance.runId,
      });
    }

    const result = await imageBuilder.buildAndPush({
      context: ctx.context,
      sourceDir: path.join(ctx.context.volume('workspace'), SOURCE_DIR),
      imageRef: ref,
      credentials: registryCredentials(ctx, config.registry.credentialId),
      cache: new BuildCacheStore(ctx.context.volume('build-cache')),
      scope: ctx.credentials,
      signal: ctx.signal,
    });

    const artifact: BuildArtifact = {
      repository: imageRepository(config.registry.registry, config.registry.image),
      tag: String(ctx.run.buildNumber),
      ref,
      provenance,
      pushedAt: new Date(clock.now()).toISOString(),
    };
    await ctx.artifacts.record(artifact);
    ctx.facts.artifact = artifact;
    ctx.log.info('Image pushed', { imageRef: ref, durationMs: result.durationMs, cache: result.cache });
  }));

  // Created per stage: the reconciler reads the stage's kubeconfig.
  const reconcilerFor = (ctx: StageContext) => new ClusterReconciler(
    clusterClient(ctx.context, ctx.credentials),
    { pollIntervalMs: config.cluster.pollIntervalMs },
    clock,
    ctx.log,
  );

  const deployCommands: Command[] = [
    actionCommand('apply descriptor', async (ctx) => {
      const artifact = requireArtifact(ctx);
      const doc = buildDescriptor({ ...deployment, namespace, image: artifact.ref });
      await reconcilerFor(ctx).apply(doc, ctx.signal, ctx.stage);
    }),
    actionCommand('wait for rollout', async (ctx) => {
      const timeoutMs = config.cluster.rolloutTimeoutMs;
      const outcome = await reconcilerFor(ctx).waitForRollout(deployment.name, namespace, timeoutMs, ctx.signal);
      switch (outcome.state) {
        case 'converged':
          return;
        case 'timed-out':
          throw new PipelineError({
            ...rolloutTimedOutError(
              deployment.name,
              namespace,
              timeoutMs,
              outcome.last?.readyReplicas ?? 0,
              outcome.last?.desiredReplicas ?? deployment.replicas,
            ),
            stage: ctx.stage,
          });
        case 'failed':
          throw new PipelineError({ ...rolloutFailedError(deployment.name, namespace, outcome.reason), stage: ctx.stage });
      }
    }),
  ];

  const purgeCache: Hook = {
    name: 'purge build cache',
    async run(ctx) {
      await new BuildCacheStore(ctx.volumes.paths['build-cache']).purge();
    },
  };

  const collectDiagnostics: Hook = {
    name: 'collect cluster diagnostics',
    context: CONTEXT_IDENTITIES.deployer,
    credentials: [kubeconfigBinding(config)],
    async run(ctx) {
      if (!ctx.context) {
        throw new PipelineError(createTypedError({
          code: 'HOOK.NO_CONTEXT',
          message: 'Diagnostics need the deployer context',
        }));
      }
      const collector = new DiagnosticsCollector(clusterClient(ctx.context, ctx.credentials), {
        deploymentName: deployment.name,
        logTailLines: config.diagnostics.logTailLines,
        eventLimit: config.diagnostics.eventLimit,
      }, ctx.log);
      ctx.attachDiagnostics(await collector.collect(podSelector(deployment), namespace, ctx.signal));
    },
  };

  const reportDeployment: Hook = {
    name: 'report deployment',
    async run(ctx) {
      ctx.log.info('Deployment complete', {
        buildNumber: ctx.run.buildNumber,
        commit: ctx.run.commit,
        imageRef: ctx.run.artifact?.ref,
      });
    },
  };

  return {
    id: config.pipelineId,
    stages: [
      {
        name: STAGE_NAMES.checkout,
        context: CONTEXT_IDENTITIES.source,
        commands: [checkoutCommand(source, config.source)],
        timeoutMs: config.stageTimeoutMs,
      },
      {
        name: STAGE_NAMES.test,
        context: CONTEXT_IDENTITIES.source,
        commands: packageManagerCommands(config.tests, log),
        timeoutMs: config.stageTimeoutMs,
      },
      {
        name: STAGE_NAMES.build,
        context: CONTEXT_IDENTITIES.builder,
        credentials: [registryBinding(config)],
        commands: buildCommands,
        timeoutMs: config.stageTimeoutMs,
      },
      {
        name: STAGE_NAMES.deploy,
        context: CONTEXT_IDENTITIES.deployer,
        credentials: [kubeconfigBinding(config)],
        commands: deployCommands,
        timeoutMs: config.stageTimeoutMs,
      },
    ],
    hooks: {
      always: [purgeCache],
      success: [reportDeployment],
      failure: [collectDiagnostics],
    },
  };
}
