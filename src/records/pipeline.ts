import { FIELDS, LOGIN_TYPE } from '../types/index.js';
import type { Decision, DedupResult, EngineOptions, ExportRecord } from '../types/index.js';
import { logger } from '../utils/index.js';
import { enrichRecord, field } from './enrich.js';
import { matchesKeyword } from './filter.js';
import { groupRecords } from './group.js';
import { selectBest } from './select.js';
import { tally } from './report.js';

export const DEFAULT_FOLDER = 'Personal';

export function isLogin(record: ExportRecord): boolean {
  return field(record, FIELDS.type) === LOGIN_TYPE;
}

/**
 * Run the full deduplication over an export: enrich logins, drop
 * keyword matches, group by key and keep one record per group.
 * Non-login records pass through untouched after the kept logins.
 */
export function deduplicate(
  records: readonly ExportRecord[],
  options: Partial<EngineOptions> = {},
): DedupResult {
  const keywords = options.filterKeywords ?? [];
  const defaultFolder = options.defaultFolder ?? DEFAULT_FOLDER;

  const logins = records.filter(isLogin);
  const passthrough = records.filter(r => !isLogin(r));

  const enriched = logins.map(r => enrichRecord(r, defaultFolder));

  const kept: ExportRecord[] = [];
  const filtered: ExportRecord[] = [];
  for (const record of enriched) {
    (matchesKeyword(record, keywords) ? filtered : kept).push(record);
  }

  const { groups } = groupRecords(kept);
  const decisions: Decision[] = groups.map(group => {
    const { record, rule } = selectBest(group.records);
    return {
      group,
      kept: record,
      removed: group.records.filter(r => r !== record),
      rule,
    };
  });

  const stats = tally({
    logins,
    enriched,
    passthroughCount: passthrough.length,
    filteredOut: filtered.length,
    decisions,
  });

  logger.debug('Deduplication finished:', JSON.stringify(stats));

  return {
    output: [...decisions.map(d => d.kept), ...passthrough],
    decisions,
    filtered,
    stats,
  };
}
