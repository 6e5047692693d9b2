import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { resolveEngineOptions } from '../config.js';
import type { AppConfig } from '../config.js';
import { deduplicate, readExportFile } from '../records/index.js';
import { engineInputSchema, errorResult, jsonResult, summarizeDecision } from './shared.js';

export function registerAnalyzeTool(server: McpServer, config: AppConfig): void {
  server.registerTool('analyze_export', {
    description: 'Analyze a password-manager CSV export for duplicate logins without writing anything. '
      + 'Returns counts and the keep/remove decision for every duplicate group.',
    inputSchema: engineInputSchema,
  }, async ({ filePath, filter, defaultFolder }) => {
    try {
      const { headers, records } = await readExportFile(filePath);
      const result = deduplicate(records, resolveEngineOptions(config, { filter, defaultFolder }));

      return jsonResult({
        filePath,
        headers,
        stats: result.stats,
        duplicateGroups: result.decisions
          .filter(d => d.group.records.length > 1)
          .map(summarizeDecision),
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
