#!/usr/bin/env node

import { Command } from 'commander';
import { APP_NAME, APP_VERSION, loadConfig, resolveEngineOptions } from './config.js';
import {
  DEFAULT_FOLDER,
  deduplicate,
  defaultOutputPath,
  fileExists,
  formatReport,
  readExportFile,
  writeExportFile,
} from './records/index.js';
import type { DedupOptions } from './types/index.js';
import { ExportFileError, errorMessage, logger } from './utils/index.js';

export type LineWriter = (line: string) => void;

interface CliOptions {
  input: string;
  output?: string;
  filter?: string;
  analyze: boolean;
  defaultFolder?: string;
}

export async function runDedup(options: CliOptions, print: LineWriter): Promise<void> {
  const config = await loadConfig();
  const settings: DedupOptions = {
    ...resolveEngineOptions(config, options),
    analyzeOnly: options.analyze,
  };
  const outputPath = options.output ?? defaultOutputPath(options.input);

  print('=== PASSWORD EXPORT DEDUPLICATION ===');
  print(`Input file: ${options.input}`);
  print(`Output file: ${outputPath}`);
  print(`Analysis mode: ${settings.analyzeOnly ? 'Enabled' : 'Disabled'}`);
  print(`Filter keywords: ${settings.filterKeywords.join(', ')}`);
  print(`Default folder: ${settings.defaultFolder}`);
  print('='.repeat(40));

  if (!(await fileExists(options.input))) {
    throw new ExportFileError('read', options.input, new Error('file not found'));
  }

  const { headers, records } = await readExportFile(options.input);
  print(`CSV column headers: ${headers.join(', ')}`);

  const result = deduplicate(records, settings);
  formatReport(result, settings.analyzeOnly).forEach(line => print(line));

  if (settings.analyzeOnly) {
    print('');
    print('Analysis mode: No output file was created.');
    return;
  }

  if (await fileExists(outputPath)) {
    logger.info(`Output file already exists, overwriting: ${outputPath}`);
  }
  await writeExportFile(outputPath, headers, result.output);
  print('');
  print(`Wrote ${result.stats.finalLoginCount} login entries and ${result.stats.passthroughCount} other entries to ${outputPath}`);
}

export function buildProgram(print: LineWriter = line => console.log(line)): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Deduplicate logins in a password-manager CSV export')
    .version(APP_VERSION)
    .requiredOption('-i, --input <path>', 'Input CSV export file path')
    .option('-o, --output <path>', 'Output CSV path (default: <input>_deduplicated.csv)')
    .option('-f, --filter <keywords>', 'Comma-separated keywords to filter out entries (in name, URL, or username)')
    .option('-a, --analyze', 'Run in analysis mode without creating an output file', false)
    .option('-d, --default-folder <folder>', `Folder for entries with an empty folder (default: "${DEFAULT_FOLDER}")`)
    .action(async (options: CliOptions) => {
      await runDedup(options, print);
    });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((err) => {
    logger.error(errorMessage(err));
    process.exit(1);
  });
}
