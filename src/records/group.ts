import { FIELDS } from '../types/index.js';
import type { ExportRecord, Group } from '../types/index.js';
import { extractDomain } from './domain.js';
import { field } from './enrich.js';

/**
 * Composite identity of a login. Two records with equal keys are duplicates.
 * TOTP and notes presence are part of the key so entries carrying them are
 * never folded into entries without.
 */
export class GroupingKey {
  readonly hash: string;

  constructor(
    readonly name: string,
    readonly domain: string,
    readonly username: string,
    readonly password: string,
    readonly hasTotp: boolean,
    readonly hasNotes: boolean,
  ) {
    this.hash = JSON.stringify([name, domain, username, password, hasTotp, hasNotes]);
    Object.freeze(this);
  }

  static of(record: ExportRecord): GroupingKey {
    const uri = field(record, FIELDS.uri);
    const domain = extractDomain(uri) ?? uri;
    return new GroupingKey(
      field(record, FIELDS.name),
      domain,
      field(record, FIELDS.username),
      field(record, FIELDS.password),
      field(record, FIELDS.totp) !== '',
      field(record, FIELDS.notes) !== '',
    );
  }

  equals(other: GroupingKey): boolean {
    return this.name === other.name
      && this.domain === other.domain
      && this.username === other.username
      && this.password === other.password
      && this.hasTotp === other.hasTotp
      && this.hasNotes === other.hasNotes;
  }

  toString(): string {
    return this.hash;
  }
}

export function groupingKey(record: ExportRecord): GroupingKey {
  return GroupingKey.of(record);
}

export interface Grouping {
  /** Every group, in order of the first record seen for each key. */
  groups: Group[];
  singletons: Group[];
  duplicates: Group[];
}

export function groupRecords(records: readonly ExportRecord[]): Grouping {
  const byKey = new Map<string, Group>();

  for (const record of records) {
    const key = groupingKey(record);
    let group = byKey.get(key.hash);
    if (!group) {
      group = { key, records: [] };
      byKey.set(key.hash, group);
    }
    group.records.push(record);
  }

  const groups = [...byKey.values()];
  return {
    groups,
    singletons: groups.filter(g => g.records.length === 1),
    duplicates: groups.filter(g => g.records.length > 1),
  };
}
