#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { SERVER_VERSION, createServer } from './server.js';

async function main(): Promise<void> {
  const { config, warnings } = loadConfig();
  const logger = createLogger(config.debug);
  for (const warning of warnings) logger.warn(warning);

  const server = createServer(config, logger);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(`mac-automation MCP server v${SERVER_VERSION} running on stdio`);
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
