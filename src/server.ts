import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from './bridge/errors.js';
import type { ServerConfig } from './config.js';
import type { Logger } from './logger.js';
import { handleToolCall, tools } from './tools/index.js';

export const SERVER_NAME = 'mac-automation-mcp';
export const SERVER_VERSION = '1.0.0';

export function createServer(config: ServerConfig, logger: Logger): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      const envelope = await handleToolCall(name, args ?? {}, { config, signal: extra.signal });
      logger.debug(
        `${name}: success=${envelope.success} runtime=${envelope.runtime_seconds}s parsed=${envelope.parsed}`
      );
      for (const diagnostic of envelope.diagnostics ?? []) {
        logger.warn(`${name}: ${diagnostic.message}`);
      }
      return { content: [{ type: 'text', text: JSON.stringify(envelope, null, 2) }] };
    } catch (err: unknown) {
      logger.error(`${name} failed: ${errorMessage(err)}`);
      return {
        content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  });

  return server;
}
