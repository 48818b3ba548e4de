#!/usr/bin/env node

/**
 * HTTP API server for finkpi.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 *   finkpi-web                   # If globally linked
 */

import { loadConfig } from '../core/config.js';
import { createEngine } from '../core/engine.js';
import { logger } from '../core/logger.js';
import { buildServer } from './app.js';

const config = loadConfig();
logger.level = config.logLevel;
const engine = createEngine(config);
const server = buildServer(engine);

async function shutdown(signal: string) {
  logger.info({ signal }, 'shutting down');
  await server.close();
  engine.close();
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err: unknown) => {
    logger.error({ err }, 'shutdown failed');
    process.exit(1);
  });
}

process.once('SIGINT', () => onSignal('SIGINT'));
process.once('SIGTERM', () => onSignal('SIGTERM'));

await server.listen({ port: config.port, host: config.host });

logger.info({ port: config.port, host: config.host }, 'finkpi API listening');
logger.info(`calc: http://localhost:${config.port}/v1/finance/calc/AAPL/grossProfit?period=latest&freq=Q`);
