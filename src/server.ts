/**
 * Application assembly.
 *
 * Wires one PipelineConfig into the store, publisher, execution-context
 * pool, credential scopes and executor, and mounts the HTTP API on top.
 */

import express from 'express';
import path from 'path';
import { createRunRoutes } from './api/runs';
import { errorHandler } from './api/middleware';
import { PipelineConfig } from './config';
import { CredentialScopeManager } from './credentials/credential-scope';
import { EnvSecretSource, SecretSource } from './credentials/secret-source';
import { EventPublisher } from './data-plane/publisher';
import { PipelineExecutor } from './engine/executor';
import { logger } from './logger';
import { DeliveryPipelineDeps, createDeliveryPipeline } from './pipeline/delivery-pipeline';
import { Clock, systemClock } from './runtime/clock';
import { CommandRunner, ProcessCommandRunner } from './runtime/command-runner';
import { ExecutionContextPool, hostEnvironment } from './runtime/execution-context';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';

export const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  config: PipelineConfig;
  store: Store;
  publisher: EventPublisher;
  executor: PipelineExecutor;
  scopes: CredentialScopeManager;
  clock: Clock;
}

export interface AppContextOptions {
  store?: Store;
  /** Defaults to a snapshot of `env`. */
  secrets?: SecretSource;
  runner?: CommandRunner;
  clock?: Clock;
  /** Host environment; PATH, HOME and friends are passed to contexts. */
  env?: Record<string, string | undefined>;
  pipeline?: Omit<DeliveryPipelineDeps, 'clock'>;
}

/** Create the application context with all services and the delivery pipeline registered. */
export function createAppContext(config: PipelineConfig, options: AppContextOptions = {}): AppContext {
  const env = options.env ?? {};
  const clock = options.clock ?? systemClock;
  const store = options.store ?? createMemoryStore();
  const publisher = new EventPublisher(store);
  const pool = new ExecutionContextPool(config.contexts, options.runner ?? new ProcessCommandRunner(), hostEnvironment(env));
  const scopes = new CredentialScopeManager(options.secrets ?? new EnvSecretSource(env), {
    scopeRoot: path.join(config.workRoot, 'credentials'),
  });
  const executor = new PipelineExecutor(store, publisher, { pool, scopes, clock }, {
    workRoot: config.workRoot,
    hookTimeoutMs: config.hookTimeoutMs,
    cancelGraceMs: config.cancelGraceMs,
  });
  executor.register(createDeliveryPipeline(config, { ...options.pipeline, clock }));

  return { config, store, publisher, executor, scopes, clock };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const startTime = ctx.clock.now();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: ctx.clock.now() - startTime,
      pipelines: ctx.executor.pipelineIds(),
    });
  });

  app.use('/api/v1', createRunRoutes(ctx.store, ctx.executor, ctx.publisher, ctx.config.pipelineId));

  app.use(errorHandler);

  logger.debug('Application assembled', { pipelineId: ctx.config.pipelineId });
  return app;
}
