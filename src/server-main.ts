/**
 * HTTP server entry point.
 *
 * Configuration comes from SHIPLINE_CONFIG (a JSON file) and SHIPLINE_*
 * overrides; runs are kept in the configured store file.
 */

import { loadConfig } from './config';
import { LogLevel, logger, parseLogLevel, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';
import { FileStore } from './storage/file-store';

async function main(): Promise<void> {
  const { config, warnings } = await loadConfig({ env: process.env });
  setLogLevel(parseLogLevel(config.logLevel) ?? LogLevel.Info);
  for (const warning of warnings) logger.warn(warning);

  const store = await FileStore.open(config.storeFile);
  const context = createAppContext(config, { store, env: process.env });
  const app = createApp(context);

  app.listen(config.server.port, () => {
    logger.info('Server listening', { port: config.server.port, pipelineId: config.pipelineId });
  });
}

main().catch((err: unknown) => {
  logger.error('Server failed to start', { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
