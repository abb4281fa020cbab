#!/usr/bin/env node

/**
 * Freshdesk MCP Server
 *
 * Exposes Freshdesk ticket filtering to AI agents over stdio:
 * - Filtering tickets with query_hash conditions or helper parameters
 * - Unresolved tickets of an agent, resolved by name, email or id
 * - Unresolved tickets of a squad
 * - Ticket lookup, listing and search
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { FreshdeskClient } from './freshdesk/client.js';
import { FileLogger } from './logger.js';
import { FreshdeskMCPServer } from './server.js';

function parseArgs(argv: string[]): { logFile?: string } {
  const result: { logFile?: string } = {};

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--log-file' && i + 1 < argv.length) {
      result.logFile = argv[i + 1];
      i++;
    }
  }

  return result;
}

async function main(): Promise<void> {
  const { logFile } = parseArgs(process.argv.slice(2));
  const logger = new FileLogger(logFile);
  logger.log(logger.toFile ? '📝 Logging to file enabled' : '📝 Logging to stderr');

  const config = loadConfig();
  const server = new FreshdeskMCPServer(config, new FreshdeskClient(config, logger), logger);

  const shutdown = (): void => {
    logger.log('🛑 Server shutdown requested');
    void server
      .close()
      .catch((error: unknown) => logger.log(`❌ Error during shutdown: ${String(error)}`))
      .finally(() => {
        logger.close();
        process.exit(0);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await server.run();
  } catch (error) {
    logger.log(`💥 Server error: ${error instanceof Error ? error.message : String(error)}`);
    logger.close();
    throw error;
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`❌ Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
