#!/usr/bin/env npx tsx
/**
 * Ticker Relay Server
 *
 * Main entry point: loads configuration, starts the HTTP/WebSocket server and
 * the upstream feed, and shuts everything down cleanly on SIGINT/SIGTERM.
 *
 * Usage:
 *   npx tsx scripts/run-server.ts
 *
 * Configuration comes from the environment (or a .env file); see
 * config/server.config.ts for the full list of APP_ variables.
 */

import 'dotenv/config';
import { loadServerConfig, ConfigError, type ServerConfig } from '../config/server.config.js';
import { TickerServer } from '../src/server/ticker-server.js';
import { LogEvents, ServiceLogger } from '../src/utils/service-logger.js';

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const bootLogger = new ServiceLogger({ component: 'Main' });

  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      bootLogger.error(LogEvents.CONFIG_ERROR, { message: error.issues.join('; ') });
      process.exit(1);
    }
    throw error;
  }

  const logger = new ServiceLogger({ component: 'Main', level: config.logLevel });
  logger.info(LogEvents.CONFIG_LOADED, {
    symbols: [...config.symbols],
    url: config.upstreamUrl,
    host: config.host,
    port: config.port,
  });

  const server = new TickerServer({ config, logger });
  try {
    await server.start();
  } catch (error) {
    logger.error(LogEvents.ERROR, {
      message: 'Failed to start server',
      error: ServiceLogger.sanitizeErrorMessage(error),
    });
    await server.shutdown();
    process.exit(1);
  }

  // Handle shutdown signals
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(LogEvents.SHUTDOWN_INITIATED, { signal });
    await server.shutdown();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      logger.error(LogEvents.ERROR, { signal, error: ServiceLogger.sanitizeErrorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch(error => {
  console.log(
    JSON.stringify({
      timestamp: new Date().toISOString(),
      level: 'ERROR',
      event: 'fatal_error',
      message: ServiceLogger.sanitizeErrorMessage(error),
    })
  );
  process.exit(1);
});
