import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { resolveEngineOptions } from '../config.js';
import type { AppConfig } from '../config.js';
import { deduplicate, defaultOutputPath, readExportFile, writeExportFile } from '../records/index.js';
import { logger } from '../utils/index.js';
import { engineInputSchema, errorResult, jsonResult } from './shared.js';

export function registerDeduplicateTool(server: McpServer, config: AppConfig): void {
  server.registerTool('deduplicate_export', {
    description: 'Deduplicate logins in a password-manager CSV export and write the result as CSV '
      + 'with the original column order. Non-login entries are kept unchanged.',
    inputSchema: {
      ...engineInputSchema,
      outputPath: z.string().optional()
        .describe('Where to write the result (default: <input>_deduplicated.csv)'),
      dryRun: z.boolean().optional().default(false).describe('Compute the result without writing it'),
    },
  }, async ({ filePath, filter, defaultFolder, outputPath, dryRun }) => {
    try {
      const { headers, records } = await readExportFile(filePath);
      const result = deduplicate(records, resolveEngineOptions(config, { filter, defaultFolder }));
      const target = outputPath ?? defaultOutputPath(filePath);

      if (!dryRun) {
        await writeExportFile(target, headers, result.output);
        logger.info(`Wrote ${result.output.length} entries to ${target}`);
      }

      return jsonResult({
        dryRun,
        outputPath: dryRun ? null : target,
        stats: result.stats,
        message: dryRun
          ? `Would write ${result.stats.totalOutput} entries (${result.stats.totalRemovedLogins} logins removed)`
          : `Wrote ${result.stats.totalOutput} entries to ${target} (${result.stats.totalRemovedLogins} logins removed)`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
