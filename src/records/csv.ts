import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import Papa from 'papaparse';
import { REQUIRED_FIELDS } from '../types/index.js';
import type { ExportRecord, ParsedExport } from '../types/index.js';
import { ExportFileError, MissingFieldsError, logger } from '../utils/index.js';
import { createRecord } from './enrich.js';

/** Parse export CSV text. Throws MissingFieldsError when the header lacks a required column. */
export function parseExport(text: string): ParsedExport {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  const headers = parsed.meta.fields ?? [];
  const missing = REQUIRED_FIELDS.filter(f => !headers.includes(f));
  if (missing.length > 0) {
    throw new MissingFieldsError(missing);
  }

  for (const error of parsed.errors) {
    logger.warn(`CSV row ${error.row ?? '?'}: ${error.message}`);
  }

  const records = parsed.data.map(row => {
    const fields: Record<string, string> = {};
    for (const header of headers) {
      const value = row[header];
      fields[header] = typeof value === 'string' ? value : '';
    }
    return createRecord(fields);
  });

  return { headers, records };
}

/** Serialize records back to CSV in the given column order. */
export function serializeExport(headers: readonly string[], records: readonly ExportRecord[]): string {
  return Papa.unparse({
    fields: [...headers],
    data: records.map(record => headers.map(h => record[h] ?? '')),
  });
}

export async function readExportFile(filePath: string): Promise<ParsedExport> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ExportFileError('read', filePath, err);
  }
  return parseExport(text);
}

export async function writeExportFile(
  filePath: string,
  headers: readonly string[],
  records: readonly ExportRecord[],
): Promise<void> {
  try {
    await fs.writeFile(filePath, serializeExport(headers, records) + '\r\n', 'utf-8');
  } catch (err) {
    throw new ExportFileError('write', filePath, err);
  }
}

/** `export.csv` -> `export_deduplicated.csv`, next to the input. */
export function defaultOutputPath(inputPath: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}_deduplicated${ext}`);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
