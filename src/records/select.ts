import { FIELDS } from '../types/index.js';
import type { ExportRecord, Selection, SelectionRule } from '../types/index.js';
import { field } from './enrich.js';

type Picker = (records: readonly ExportRecord[]) => ExportRecord | undefined;

const has = (name: string) => (record: ExportRecord) => field(record, name) !== '';
const hasTotp = has(FIELDS.totp);
const hasNotes = has(FIELDS.notes);
const hasUri = has(FIELDS.uri);

function longestNotes(records: readonly ExportRecord[]): ExportRecord | undefined {
  let best: ExportRecord | undefined;
  for (const record of records) {
    if (!best || field(record, FIELDS.notes).length > field(best, FIELDS.notes).length) {
      best = record;
    }
  }
  return best && hasNotes(best) ? best : undefined;
}

/**
 * Priority order for choosing the record to keep. Each rule returns the
 * first qualifying record in group order, or undefined to fall through.
 * `longest-notes` can only match when `notes` already has.
 */
export const SELECTION_RULES: ReadonlyArray<{ rule: SelectionRule; pick: Picker }> = [
  { rule: 'totp-and-notes', pick: records => records.find(r => hasTotp(r) && hasNotes(r)) },
  { rule: 'totp', pick: records => records.find(hasTotp) },
  { rule: 'uri', pick: records => records.find(hasUri) },
  { rule: 'notes', pick: records => records.find(hasNotes) },
  { rule: 'longest-notes', pick: longestNotes },
  { rule: 'first', pick: records => records[0] },
];

/** Pick the one record of a duplicate group to keep. */
export function selectBest(records: readonly ExportRecord[]): Selection {
  if (records.length === 0) {
    throw new Error('Cannot select from an empty group');
  }
  if (records.length === 1) {
    return { record: records[0], rule: 'single' };
  }

  for (const { rule, pick } of SELECTION_RULES) {
    const record = pick(records);
    if (record) return { record, rule };
  }

  return { record: records[0], rule: 'first' };
}
