import { FIELDS } from '../types/index.js';
import type { ExportRecord } from '../types/index.js';
import { field } from './enrich.js';

const SEARCHED_FIELDS = [FIELDS.name, FIELDS.uri, FIELDS.username] as const;

/** Split a comma-separated keyword list, dropping blanks. */
export function parseKeywords(raw: string | readonly string[] | undefined): string[] {
  if (!raw) return [];
  const parts = typeof raw === 'string' ? raw.split(',') : raw;
  return parts.map(k => k.trim()).filter(k => k.length > 0);
}

/** True when any keyword occurs (case-insensitively) in the name, URI or username. */
export function matchesKeyword(record: ExportRecord, keywords: readonly string[]): boolean {
  if (keywords.length === 0) return false;
  const haystacks = SEARCHED_FIELDS.map(name => field(record, name).toLowerCase());
  return keywords.some(keyword => {
    const needle = keyword.trim().toLowerCase();
    return needle.length > 0 && haystacks.some(h => h.includes(needle));
  });
}
