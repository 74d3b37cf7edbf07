#!/usr/bin/env node
/**
 * stdio entry point: `pandoc-convert-mcp`. Configuration comes from the environment.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createToolContext } from './context.js';
import { Logger } from './logger.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logLevel);
  const server = createServer(createToolContext(config, logger));
  await server.connect(new StdioServerTransport());
  logger.info('pandoc-convert MCP server listening on stdio');
}

main().catch((e: unknown) => {
  new Logger().error('Failed to start server', e instanceof Error ? e : undefined);
  process.exitCode = 1;
});
