import type { ExportRecord } from './record.js';
import type { GroupingKey } from '../records/group.js';

export type SelectionRule =
  | 'single'
  | 'totp-and-notes'
  | 'totp'
  | 'uri'
  | 'notes'
  | 'longest-notes'
  | 'first';

export interface Group {
  key: GroupingKey;
  records: ExportRecord[];
}

export interface Selection {
  record: ExportRecord;
  rule: SelectionRule;
}

export interface Decision {
  group: Group;
  kept: ExportRecord;
  removed: ExportRecord[];
  rule: SelectionRule;
}

/** Settings the engine itself reads. */
export interface EngineOptions {
  filterKeywords: string[];
  defaultFolder: string;
}

export interface DedupOptions extends EngineOptions {
  /** Report only; the engine runs the same but nothing is written. */
  analyzeOnly: boolean;
}

export interface DedupStats {
  loginCount: number;
  passthroughCount: number;
  emptyFolderCount: number;
  emptyUriCount: number;
  urisFixed: number;
  foldersDefaulted: number;
  filteredOut: number;
  totalGroups: number;
  uniqueGroups: number;
  duplicateGroups: number;
  duplicatesRemoved: number;
  keptWithTotp: number;
  keptWithNotes: number;
  keptWithUri: number;
  keptBasic: number;
  finalLoginCount: number;
  totalRemovedLogins: number;
  totalOutput: number;
}

export interface DedupResult {
  /** Kept credential records in first-seen group order, then passthrough records. */
  output: ExportRecord[];
  decisions: Decision[];
  filtered: ExportRecord[];
  stats: DedupStats;
}
