#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import updateNotifier from 'update-notifier';
import { readFileSync } from 'fs';
import { createServer } from './server.js';
import { runCLI } from './cli.js';
import { logger } from './logger.js';

// Check for updates (cached 24hr, non-blocking)
try {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'name' in pkg && 'version' in pkg
    && typeof pkg.name === 'string' && typeof pkg.version === 'string') {
    const notifier = updateNotifier({ pkg: { name: pkg.name, version: pkg.version }, updateCheckInterval: 1000 * 60 * 60 * 24 });
    notifier.notify({ isGlobal: true });
  }
} catch (error) {
  logger.debug('Update check skipped', { error: String(error) });
}

async function startMCPServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('QA evaluation MCP server running');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const result = await runCLI(args);

  switch (result) {
    case 'handled':
      process.exit(process.exitCode ?? 0);
      break;
    case 'server':
      await startMCPServer();
      break;
  }
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
