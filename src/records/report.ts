import { FIELDS } from '../types/index.js';
import type { Decision, DedupResult, DedupStats, ExportRecord } from '../types/index.js';
import { field } from './enrich.js';

export type KeptCategory = 'totp' | 'notes' | 'uri' | 'basic';

/** Classify a kept record by its most valuable attribute. */
export function keptCategory(record: ExportRecord): KeptCategory {
  if (field(record, FIELDS.totp)) return 'totp';
  if (field(record, FIELDS.notes)) return 'notes';
  if (field(record, FIELDS.uri)) return 'uri';
  return 'basic';
}

export interface TallyInput {
  logins: readonly ExportRecord[];
  enriched: readonly ExportRecord[];
  passthroughCount: number;
  filteredOut: number;
  decisions: readonly Decision[];
}

export function tally(input: TallyInput): DedupStats {
  const { logins, enriched, decisions } = input;

  let urisFixed = 0;
  let foldersDefaulted = 0;
  enriched.forEach((after, i) => {
    const before = logins[i];
    if (field(after, FIELDS.uri) !== field(before, FIELDS.uri)) urisFixed++;
    if (field(after, FIELDS.folder) !== field(before, FIELDS.folder)) foldersDefaulted++;
  });

  const kept = { totp: 0, notes: 0, uri: 0, basic: 0 };
  let uniqueGroups = 0;
  let duplicatesRemoved = 0;
  for (const decision of decisions) {
    if (decision.group.records.length === 1) {
      uniqueGroups++;
      continue;
    }
    duplicatesRemoved += decision.removed.length;
    kept[keptCategory(decision.kept)]++;
  }

  const finalLoginCount = decisions.length;
  return {
    loginCount: logins.length,
    passthroughCount: input.passthroughCount,
    emptyFolderCount: logins.filter(r => !field(r, FIELDS.folder)).length,
    emptyUriCount: logins.filter(r => !field(r, FIELDS.uri)).length,
    urisFixed,
    foldersDefaulted,
    filteredOut: input.filteredOut,
    totalGroups: decisions.length,
    uniqueGroups,
    duplicateGroups: decisions.length - uniqueGroups,
    duplicatesRemoved,
    keptWithTotp: kept.totp,
    keptWithNotes: kept.notes,
    keptWithUri: kept.uri,
    keptBasic: kept.basic,
    finalLoginCount,
    totalRemovedLogins: logins.length - finalLoginCount,
    totalOutput: finalLoginCount + input.passthroughCount,
  };
}

const DETAIL_LIMIT = 10;
const yesNo = (value: string) => (value ? 'Yes' : 'No');
const orEmpty = (value: string) => value || '(empty)';

function describeGroup(decision: Decision, index: number, analyzeOnly: boolean): string[] {
  const { key, records } = decision.group;
  const count = (name: string) => records.filter(r => field(r, name)).length;
  const lines = [
    '',
    `[Group ${index}] Name: ${key.name} | Domain: ${orEmpty(key.domain)} | Username: ${orEmpty(key.username)}`,
    `  Total entries: ${records.length}`,
    `  Group characteristics: ${key.hasTotp ? 'Has TOTP' : 'No TOTP'}, ${key.hasNotes ? 'Has notes' : 'No notes'}`,
    `  Entries with login_uri: ${count(FIELDS.uri)}/${records.length}`,
    `  Entries with TOTP: ${count(FIELDS.totp)}/${records.length}`,
    `  Entries with notes: ${count(FIELDS.notes)}/${records.length}`,
    `  DECISION: Keeping entry with TOTP: ${yesNo(field(decision.kept, FIELDS.totp))}, `
      + `URI: ${yesNo(field(decision.kept, FIELDS.uri))}, Notes: ${yesNo(field(decision.kept, FIELDS.notes))} `
      + `(rule: ${decision.rule})`,
  ];

  if (analyzeOnly) {
    lines.push('  Entries in this group:');
    records.forEach((record, i) => {
      const action = record === decision.kept ? 'KEEP' : 'REMOVE';
      lines.push(
        `    [${action}] Entry ${i + 1}: ${field(record, FIELDS.name)}`
        + ` | ${field(record, FIELDS.totp) ? 'Has TOTP' : 'No TOTP'}`
        + ` | ${field(record, FIELDS.uri) ? 'Has URI' : 'No URI'}`
        + ` | ${field(record, FIELDS.notes) ? 'Has notes' : 'No notes'}`
        + ` | Folder: ${field(record, FIELDS.folder)}`,
      );
    });
  }

  return lines;
}

/** Render the operator-facing progress and summary lines for a finished run. */
export function formatReport(result: DedupResult, analyzeOnly: boolean): string[] {
  const { stats, filtered, decisions } = result;
  const lines: string[] = [];

  lines.push(
    `Read ${stats.loginCount} login entries and ${stats.passthroughCount} other entries`,
    `  - Login entries with empty folder: ${stats.emptyFolderCount}`,
    `  - Login entries with empty login_uri: ${stats.emptyUriCount}`,
    `Fixed ${stats.urisFixed} empty login_uri fields`,
    `Set default folder for ${stats.foldersDefaulted} entries with empty folders`,
    `Removed ${stats.filteredOut} entries containing filter keywords`,
  );
  filtered.forEach((record, i) => {
    lines.push(
      `  ${i + 1}. ${field(record, FIELDS.name)} | URL: ${field(record, FIELDS.uri)}`
      + ` | Username: ${field(record, FIELDS.username)}`,
    );
  });

  lines.push(
    `Created ${stats.totalGroups} unique groups`,
    `  - ${stats.uniqueGroups} groups have a single entry (no duplicates)`,
    `  - ${stats.duplicateGroups} groups have multiple entries (duplicates)`,
  );

  const duplicates = decisions.filter(d => d.group.records.length > 1);
  const shown = analyzeOnly ? duplicates : duplicates.slice(0, DETAIL_LIMIT);
  shown.forEach((decision, i) => lines.push(...describeGroup(decision, i + 1, analyzeOnly)));
  if (duplicates.length > shown.length) {
    lines.push(`  ... and ${duplicates.length - shown.length} more duplicate groups (use --analyze for full details)`);
  }

  lines.push(
    '',
    'Summary of deduplication decisions:',
    `  - Fixed ${stats.urisFixed} empty login_uri fields`,
    `  - Set default folder for ${stats.foldersDefaulted} entries with empty folders`,
    `  - Removed ${stats.filteredOut} entries by keyword filtering`,
    `  - Keeping ${stats.uniqueGroups} unique entries (no duplicates)`,
    `  - Keeping ${stats.keptWithTotp} entries with TOTP from duplicate groups`,
    `  - Keeping ${stats.keptWithNotes} entries with notes (but no TOTP) from duplicate groups`,
    `  - Keeping ${stats.keptWithUri} entries with URI (but no TOTP/notes) from duplicate groups`,
    `  - Keeping ${stats.keptBasic} basic entries (no TOTP/notes/URI) from duplicate groups`,
    `  - Preserving ${stats.passthroughCount} non-login entries (notes, cards, etc.)`,
    `  - Removing ${stats.duplicatesRemoved} duplicate entries`,
    `  - Final login entry count: ${stats.finalLoginCount}`,
    `  - Total removed login entries: ${stats.totalRemovedLogins}`,
    `  - Total entries in final output: ${stats.totalOutput}`,
  );

  return lines;
}
