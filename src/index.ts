#!/usr/bin/env node
import { formatUsage, parseArguments } from './cli/argumentParser.js';
import { ConfigManager } from './config/ConfigManager.js';
import { defaultConfig } from './config/defaults.js';
import { ApplicationError } from './errors/index.js';
import { FfprobeMetadataProbe } from './services/media/ffprobeService.js';
import {
  ManifestGenerationService,
  generationOptionsFromConfig,
} from './services/manifest/manifestGenerationService.js';
import { ManifestWriter } from './services/manifest/manifestWriter.js';
import { ManifestScheduler } from './services/schedulers/ManifestScheduler.js';
import { checkRequiredBinaries } from './utils/binaryCheck.js';
import { createErrorLogContext } from './utils/errorHandling.js';
import { createLogger, type Logger } from './utils/logger.js';

// Replaced by the configured logger once configuration has been resolved
let logger: Logger = createLogger(defaultConfig.logging);

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });
  process.exit(1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected - this indicates a bug that must be fixed', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${formatUsage()}\n`);
    return;
  }

  const configManager = ConfigManager.fromProcess(args);
  const config = configManager.getConfig();
  logger = createLogger(config.logging, config.verbose);

  await configManager.validate();

  await checkRequiredBinaries(config.scan.ffprobePath, logger);

  const generator = new ManifestGenerationService(
    generationOptionsFromConfig(config),
    new FfprobeMetadataProbe(logger, config.scan.ffprobePath),
    new ManifestWriter(logger),
    logger
  );

  const scheduler = new ManifestScheduler(generator, config.scheduler.loopSeconds, logger);
  await scheduler.run();
}

main().catch((error: unknown) => {
  if (error instanceof ApplicationError) {
    logger.error(`ERROR: ${error.message}`, { code: error.code, ...error.context });
  } else {
    logger.error('Failed to generate scene list', createErrorLogContext(error));
  }
  process.exitCode = 1;
});
