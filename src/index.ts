#!/usr/bin/env node
import { loadConfig, loadEnvFile } from './config/loader.js';
import { errorLogFields } from './errors.js';
import { ModelRegistry } from './models/registry.js';
import { createPlatform } from './platform/index.js';
import { ProcessSupervisor } from './server/supervisor.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { findActivityLog } from './watcher/log-locator.js';
import { Orchestrator } from './watcher/orchestrator.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  loadEnvFile();

  const platform = createPlatform();
  const config = await loadConfig(platform);
  if (config.verbose) {
    setLogLevel('debug');
  }

  const supervisor = new ProcessSupervisor(
    { ...config.server, autoShutdownOnExit: config.autoShutdownOnExit },
    { processes: platform.processes }
  );
  const state = await supervisor.reconcile();
  logger.info(`llama-server is ${state}`);

  const registry = await ModelRegistry.create(config.models, {
    modelsDir: config.server.modelsDir,
    cacheDir: config.server.cacheDir,
    defaultModel: config.server.defaultModel,
  });
  logger.info(`${registry.available().length} of ${config.models.length} models available in ${config.server.modelsDir}`);

  if (config.server.autoStart && state === 'stopped') {
    const model = registry.autoSelect();
    if (model) {
      await supervisor.start(model.definition, model.path, {
        background: true,
        useCache: true,
        cachePath: registry.cachePath(model.id),
        availableModels: registry.available(),
      });
    } else {
      logger.warn('autoStart is set but no model is available');
    }
  }

  if (!config.steam.enabled) {
    logger.info('Game watcher disabled in config');
    await supervisor.shutdown();
    return;
  }

  const logPath = await findActivityLog(config.steam);
  if (!logPath) {
    logger.error(`Steam log ${config.steam.logFile} not found under ${config.steam.steamLogsDir}. Is Steam installed?`);
    process.exitCode = 1;
    return;
  }

  const orchestrator = new Orchestrator({
    config,
    supervisor,
    registry,
    processes: platform.processes,
    logPath,
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', errorLogFields(reason));
  });

  await orchestrator.run(controller.signal);
  await supervisor.shutdown();
  logger.info('Goodbye');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', errorLogFields(error));
  process.exit(1);
});
