#!/usr/bin/env node

/**
 * Main server file
 *
 * Usage:
 *   npm run dev (or tsx src/presentation/http/server.ts)
 *
 * Then resolve a stream:
 *   curl -X POST localhost:3000/resolve -H 'Content-Type: application/json' \
 *     -d '{"name":"x","title":"y","infoHash":"...","sources":[]}'
 */

import config, { isUnlockEnabled } from '../../config';
import { createApp } from './app';
import { CompositeLogger, type ClosableLogger } from '../../infrastructure/logging/CompositeLogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { FileLogger } from '../../infrastructure/logging/FileLogger';

const loggers: ClosableLogger[] = [new ConsoleLogger()];
if (config.LOG_TO_FILE) {
  loggers.push(new FileLogger());
}
const logger = new CompositeLogger(loggers);

const app = createApp({ logger });

const server = app.listen(config.PORT, () => {
  logger.info(`🚀 Stream resolver running on http://localhost:${config.PORT}`);
  if (isUnlockEnabled(config.UNLOCK_TOKEN)) {
    logger.info('🔓 Unlock service enabled');
  } else {
    logger.info('💡 Set REALDEBRID to unlock magnets through the remote service');
  }
});

let stopping = false;

function shutdown(signal: NodeJS.Signals): void {
  if (stopping) {
    return;
  }
  stopping = true;
  logger.info(`\n🛑 ${signal} received, stopping server...`);

  server.close((error) => {
    if (error) {
      logger.error('Failed to close server cleanly:', error);
    }
    void logger.close()
      .catch((closeError: unknown) => console.error('Failed to close log files:', closeError))
      .finally(() => process.exit(error ? 1 : 0));
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
