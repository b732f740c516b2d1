import 'dotenv/config';
import { createApp, createServices } from '../api/app';
import { type AppConfig, loadConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';
import { logger } from '../src/utils/logger';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Refusing to start:');
      for (const issue of error.issues) {
        logger.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();

  if (config.billingDemoMode) {
    logger.warn('BILLING_DEMO_MODE is on: failed subscription lookups grant a one-day pro demo.');
  }
  for (const plan of config.plans) {
    if (!plan.providerPriceId) {
      logger.warn(`Plan "${plan.id}" has no Stripe price configured and cannot be purchased.`);
    }
  }

  const app = createApp(createServices(config));
  const server = app.listen(config.port, () => {
    logger.log(`Methodgraph Studio listening on port ${config.port} (${config.baseUrl})`);
  });

  const shutdown = (signal: string) => {
    logger.log(`${signal} received, closing server`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
