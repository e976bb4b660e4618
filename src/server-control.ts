import type { Server } from 'http';
import { createApp, createServices } from './app';
import { config, getConfigSummary, validateConfig, type ServiceConfig } from './core/config';
import { ValidationError } from './core/errors';
import { logger } from './core/logger';
import { seedStock } from './ops/seed';
import { createStockLedger } from './repositories/stock.ledger.factory';
import type { StockLedger } from './repositories/stock.ledger.types';

let server: Server | null = null;
let ledger: StockLedger | null = null;
let isShuttingDown = false;
let isStarted = false;

/**
 * Open the ledger, seed it if configured and start listening
 */
export async function startServer(serviceConfig: ServiceConfig = config): Promise<Server> {
  if (isStarted) {
    throw new Error('Server is already started');
  }

  const issues = validateConfig(serviceConfig);
  if (issues.length > 0) {
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, undefined, undefined, { issues });
  }
  logger.info(getConfigSummary(serviceConfig), 'Starting stock reservation service');

  const openedLedger = await createStockLedger(serviceConfig);
  ledger = openedLedger;

  if (serviceConfig.SEED_FILE !== undefined) {
    await seedStock(openedLedger, serviceConfig.SEED_FILE, serviceConfig.SEED_CONCURRENCY);
  }

  const app = createApp(createServices(openedLedger));

  return new Promise((resolve, reject) => {
    const listening = app.listen(serviceConfig.PORT, () => {
      logger.info({ port: serviceConfig.PORT, ledger: openedLedger.driver }, 'Server listening');
      isStarted = true;
      resolve(listening);
    });
    server = listening;

    listening.on('error', (error) => {
      logger.error({ error }, 'Server error');
      reject(error);
    });
  });
}

/**
 * Stop accepting requests, then close the ledger
 */
export async function stopServer(): Promise<void> {
  if (!isStarted || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  try {
    const running = server;
    if (running !== null) {
      await new Promise<void>((resolve, reject) => {
        running.close((error) => (error ? reject(error) : resolve()));
      });
      logger.info('Server stopped accepting new connections');
    }

    if (ledger !== null) {
      await ledger.close();
      logger.info('Stock ledger closed');
    }
    logger.info('Graceful shutdown completed');
  } finally {
    isStarted = false;
    isShuttingDown = false;
    server = null;
    ledger = null;
  }
}

/**
 * Check if server is currently running
 */
export function isServerRunning(): boolean {
  return isStarted && !isShuttingDown;
}
