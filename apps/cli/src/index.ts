/**
 * keelson deploy entry point
 */

import {
  RolloutError,
  configureLogger,
  createChildLogger,
  getConfig,
  isRetryableError,
  wrapError,
} from '@keelson/shared';
import { initializeServices } from './services/index.js';
import { writeOutputs } from './outputs.js';

async function main(): Promise<void> {
  // Load configuration (and .env) before the first log line
  const config = getConfig();
  configureLogger({ level: config.logLevel, pretty: config.nodeEnv === 'development' });
  const logger = createChildLogger({ component: 'CLI' });

  const { pipeline } = initializeServices(config);

  logger.info(
    {
      runId: config.deploy.runId,
      service: config.deploy.serviceName,
      environment: config.deploy.environment,
      overlayDir: config.deploy.overlayDir,
      forceMode: config.deploy.forceMode,
      dryRun: config.deploy.dryRun,
    },
    'Starting deploy'
  );

  const outputs = await pipeline.run(config.deploy);
  await writeOutputs(outputs, config.outputs.file);
}

main().catch((err: unknown) => {
  const error = wrapError(err);
  createChildLogger({ component: 'CLI' }).error(
    {
      code: error.code,
      category: error.context.category,
      retryable: isRetryableError(error),
      lastStatus: err instanceof RolloutError ? err.lastStatus : undefined,
    },
    error.message
  );
  process.exitCode = 1;
});
