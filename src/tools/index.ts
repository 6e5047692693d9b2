import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppConfig } from '../config.js';
import { registerAnalyzeTool } from './analyze.js';
import { registerDeduplicateTool } from './deduplicate.js';

export function registerAllTools(server: McpServer, config: AppConfig): void {
  registerAnalyzeTool(server, config);
  registerDeduplicateTool(server, config);
}
