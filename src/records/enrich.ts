import { FIELDS } from '../types/index.js';
import type { ExportRecord } from '../types/index.js';
import { hasScheme, isDomainName, isIpAddress } from './domain.js';

/** Read a field, treating a missing column as empty. */
export function field(record: ExportRecord, name: string): string {
  return record[name] ?? '';
}

/** Build a frozen record so nothing downstream can edit it in place. */
export function createRecord(fields: Record<string, string>): ExportRecord {
  return Object.freeze({ ...fields });
}

/**
 * Fill an empty login URI from a name that is itself an address, and an
 * empty folder from the default. Returns a new record; re-applying is a no-op.
 */
export function enrichRecord(record: ExportRecord, defaultFolder: string): ExportRecord {
  const updates: Record<string, string> = {};

  const name = field(record, FIELDS.name);
  if (!field(record, FIELDS.uri) && name) {
    const trimmed = name.trim();
    if (isIpAddress(trimmed) || isDomainName(trimmed)) {
      updates[FIELDS.uri] = `https://${trimmed}`;
    } else if (hasScheme(trimmed)) {
      updates[FIELDS.uri] = trimmed;
    }
  }

  if (!field(record, FIELDS.folder)) {
    updates[FIELDS.folder] = defaultFolder;
  }

  return createRecord({ ...record, ...updates });
}
