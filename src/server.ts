import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from './tools/index.js';
import { APP_NAME, APP_VERSION } from './config.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export function createServer(config: AppConfig): McpServer {
  const server = new McpServer({
    name: APP_NAME,
    version: APP_VERSION,
  });

  registerAllTools(server, config);

  logger.info('MCP server created, default folder:', config.defaultFolder);

  return server;
}
