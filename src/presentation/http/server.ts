#!/usr/bin/env node

/**
 * Demo server for Range-based pagination
 *
 * Usage:
 *   npm run dev (or ts-node src/presentation/http/server.ts)
 *
 * Then send an AJAX request with a range:
 *   curl -H 'X-Requested-With: XMLHttpRequest' -H 'Range: 0-9' -H 'Range-Unit: items' \
 *     http://localhost:3000/items
 */

import config from '../../config';
import { createApp } from './app';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';

const logger = new ConsoleLogger(config.LOG_LEVEL);

try {
  const app = createApp({ logger });

  // Start server
  const server = app.listen(config.PORT, () => {
    logger.info(`Range pagination demo running on http://localhost:${config.PORT}`);
    logger.info(`Pagination: mode=${config.PAGINATE_MODE}, ajaxOnly=${config.PAGINATE_AJAX_ONLY}`);
  });

  // Process termination handling
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, stopping server...`);
    server.close((error) => {
      if (error) {
        logger.error('Failed to close server:', error);
        process.exit(1);
      }
      logger.info('Server stopped');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
} catch (error) {
  logger.error('Failed to start server:', error);
  process.exit(1);
}
