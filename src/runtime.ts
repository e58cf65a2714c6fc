/**
 * Process-level wiring shared by the CLI commands
 */

import { type AppConfig, Configuration, config as defaultConfiguration } from './config';
import { loadPipelineConfig } from './config/yaml-loader';
import type { PipelineFile } from './config/yaml-types';
import type { PipelineContext } from './orchestrator';
import { SqliteTableStore } from './storage/sqlite-store';
import { ConfigurationError } from './utils/errors';
import { createLogger, type Logger } from './utils/logger';

export interface Runtime {
  appConfig: AppConfig;
  pipeline: PipelineFile;
  store: SqliteTableStore;
  logger: Logger;
  context: PipelineContext;
}

export interface RuntimeOptions {
  configuration?: Configuration;
  pipelinePath?: string;
  dbPath?: string;
}

/**
 * Validate configuration, open the store once for the process and build the run context
 */
export async function initializeRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const configuration = options.configuration ?? defaultConfiguration;
  const validation = configuration.validate();
  if (!validation.valid) {
    throw new ConfigurationError('Configuration validation failed', validation.errors);
  }

  const appConfig = configuration.load();
  const logger = createLogger({ service: 'channel-snapshot' }, appConfig.logLevel);
  logger.debug('Configuration loaded', configuration.redacted());

  const pipeline = await loadPipelineConfig(options.pipelinePath);
  const store = SqliteTableStore.open(options.dbPath ?? appConfig.dbPath);

  if (!appConfig.oauth) {
    logger.warn('YouTube OAuth credentials not set; analytics tables will not be refreshed');
  }

  return {
    appConfig,
    pipeline,
    store,
    logger,
    context: { config: appConfig, pipeline, store, logger }
  };
}
