#!/usr/bin/env node

/**
 * Relay entry point
 * Loads configuration, wires the bar job into the relay server and runs it
 * until SIGINT or SIGTERM.
 */

// Load environment variables from .env file
import 'dotenv/config';

import { attachGlobalHandlers, createLogger, describeError, type Logger } from '@iqbridge/logger';
import { getConfigSummary, loadConfig } from './config/index.js';
import { runBarJob } from './jobs/bar-job.js';
import { FeedRelayServer } from './server/feed-relay.js';

async function start(): Promise<void> {
  const config = loadConfig();

  const logger: Logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  attachGlobalHandlers(logger);

  logger.info('Starting feed relay', getConfigSummary(config));

  const relay = new FeedRelayServer({
    host: config.relay.host,
    port: config.relay.port,
    idleProbeMs: config.relay.idleProbeMs,
    logger,
    runJob: (ticker, day) => runBarJob(ticker, day, { config, logger }),
  });
  await relay.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info('Shutting down', { signal });
    relay
      .stop()
      .then(() => {
        logger.info('Goodbye');
        process.exitCode = 0;
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) });
        process.exitCode = 1;
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error: unknown) => {
  console.error('Relay startup failed:', error);
  process.exit(1);
});
