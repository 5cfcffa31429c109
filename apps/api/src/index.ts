/**
 * Scoring API Server
 *
 * Wires configuration, adapters and the scoring service, then listens.
 */

import {
  createCompatibilityScoringService,
  createDonorRegistrationHandler,
} from '@pairmatch/application';
import { createLogger } from '@pairmatch/core';
import { createScoringAdapters } from '@pairmatch/infrastructure';

import { buildApp } from './app.js';
import { loadConfig } from './config.js';

const logger = createLogger({ name: 'api' });

async function main(): Promise<void> {
  const config = loadConfig();

  const adapters = createScoringAdapters({
    source: config.service.name,
    databaseUrl: config.database.url,
    maxConnections: config.database.poolMax,
  });

  const scoring = createCompatibilityScoringService(
    { repository: adapters.repository, publisher: adapters.publisher },
    {
      cacheEnabled: config.scoring.cacheEnabled,
      maxBatchSize: config.scoring.maxBatchSize,
      serviceName: config.service.name,
    }
  );
  const donorRegistration = createDonorRegistrationHandler(scoring, {
    autoScoringEnabled: config.scoring.autoScoringEnabled,
  });

  const app = await buildApp({ config, scoring, donorRegistration });

  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => adapters.close())
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(
    {
      port: config.server.port,
      persistent: adapters.persistent,
      autoScoring: config.scoring.autoScoringEnabled,
    },
    'Scoring API started'
  );
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start scoring API');
  process.exit(1);
});
