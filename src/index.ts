/**
 * shipline: a continuous-delivery pipeline orchestrator.
 *
 * Public exports for programmatic use. The HTTP server lives in
 * server-main.ts and the command line in cli.ts.
 */

export { createApp, createAppContext, AppContext, AppContextOptions } from './server';
export * from './config';
export * from './domain';
export { createLogger, logger, setLogHandler, setLogLevel, parseLogLevel, LogLevel, Logger, LogEntry } from './logger';
export * from './engine/executor';
export * from './engine/stage-runner';
export * from './engine/state-machine';
export * from './pipeline/delivery-pipeline';
export * from './pipeline/source';
export * from './pipeline/package-manager';
export * from './credentials/credential-scope';
export * from './credentials/secret-source';
export * from './cache/build-cache';
export * from './builder/daemon';
export * from './builder/image-builder';
export * from './builder/registry';
export * from './cluster/cluster-client';
export * from './cluster/reconciler';
export * from './cluster/diagnostics';
export * from './runtime/clock';
export * from './runtime/command-runner';
export * from './runtime/execution-context';
export * from './storage/store';
export * from './storage/memory-store';
export * from './storage/file-store';
export { EventPublisher } from './data-plane/publisher';
