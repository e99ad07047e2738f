#!/usr/bin/env node

import { getConfig, log } from './config.js';
import { createServerKernel, parseServerArgs, SERVER_VERSION } from './serverArgs.js';
import { getCatalogToolNames } from './tools/index.js';
import { StdioAdapter } from './transports/index.js';

async function main(): Promise<void> {
  const config = getConfig();
  const { catalog } = parseServerArgs(process.argv, config.catalog);

  log(`Starting ${catalog} MCP server`);
  log(`Environment: ${config.env}`);

  const kernel = createServerKernel(catalog);
  log(`Tools: ${getCatalogToolNames([...kernel.tools]).join(', ')}`);

  const adapter = new StdioAdapter();
  let shuttingDown = false;

  const shutdown = (reason: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`Shutting down (${reason})`);
    adapter.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log(`Error during shutdown: ${error}`);
        process.exit(1);
      }
    );
  };

  adapter.onClosed(() => shutdown('peer disconnected'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await adapter.start(kernel, { name: catalog, version: SERVER_VERSION });
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
