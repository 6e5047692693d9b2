import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createRecord } from '../src/records/enrich.js';
import type { ExportRecord } from '../src/types/record.js';

export const EXPORT_HEADERS = [
  'folder', 'favorite', 'type', 'name', 'notes', 'fields', 'reprompt',
  'login_uri', 'login_username', 'login_password', 'login_totp',
];

/** Build a login record with every export column present. */
export function makeLogin(overrides: Record<string, string> = {}): ExportRecord {
  const base: Record<string, string> = Object.fromEntries(EXPORT_HEADERS.map(h => [h, '']));
  return createRecord({ ...base, type: 'login', ...overrides });
}

export function makeItem(type: string, overrides: Record<string, string> = {}): ExportRecord {
  return makeLogin({ type, ...overrides });
}

/** Create a temp directory for file-based tests. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-dedup-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Render rows as CSV in EXPORT_HEADERS order. Values must not need quoting. */
export function toCsv(records: ExportRecord[], headers: string[] = EXPORT_HEADERS): string {
  const lines = [headers.join(',')];
  for (const record of records) {
    lines.push(headers.map(h => record[h] ?? '').join(','));
  }
  return lines.join('\n') + '\n';
}
