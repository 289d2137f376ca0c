#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { logger } from './utils/index.js';

async function main() {
  const config = await loadConfig();
  const { server, store } = createServer(config);

  await store.init();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, closing server`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Error while closing server:', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  logger.info(`customer-signals running on stdio (store: ${store.path})`);
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
