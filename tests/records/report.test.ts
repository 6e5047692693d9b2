import { describe, it, expect } from 'vitest';
import { formatReport, keptCategory } from '../../src/records/report.js';
import { deduplicate } from '../../src/records/pipeline.js';
import { makeLogin } from '../helpers.js';
import { sampleExport } from './fixtures.js';

describe('keptCategory', () => {
  it('should rank TOTP, then notes, then URI', () => {
    expect(keptCategory(makeLogin({ login_totp: 't', notes: 'n', login_uri: 'u' }))).toBe('totp');
    expect(keptCategory(makeLogin({ notes: 'n', login_uri: 'u' }))).toBe('notes');
    expect(keptCategory(makeLogin({ login_uri: 'u' }))).toBe('uri');
    expect(keptCategory(makeLogin())).toBe('basic');
  });
});

describe('formatReport', () => {
  const result = deduplicate(sampleExport().records, { filterKeywords: ['old'] });

  it('should report the step counts', () => {
    const lines = formatReport(result, false);

    expect(lines.slice(0, 6)).toEqual([
      'Read 6 login entries and 2 other entries',
      '  - Login entries with empty folder: 1',
      '  - Login entries with empty login_uri: 1',
      'Fixed 1 empty login_uri fields',
      'Set default folder for 1 entries with empty folders',
      'Removed 1 entries containing filter keywords',
    ]);
    expect(lines[6]).toBe('  1. Old Bank | URL: https://oldbank.test | Username: x');
    expect(lines.slice(7, 10)).toEqual([
      'Created 3 unique groups',
      '  - 1 groups have a single entry (no duplicates)',
      '  - 2 groups have multiple entries (duplicates)',
    ]);
  });

  it('should print empty URL and username of filtered entries as blanks', () => {
    const filtered = deduplicate([makeLogin({ name: 'Old Notes' })], { filterKeywords: ['old'] });

    expect(formatReport(filtered, false)).toContain('  1. Old Notes | URL:  | Username: ');
  });

  it('should describe each duplicate group and its decision', () => {
    const lines = formatReport(result, false);

    expect(lines).toContain('[Group 1] Name: example.com | Domain: example.com | Username: u');
    expect(lines).toContain('  DECISION: Keeping entry with TOTP: No, URI: Yes, Notes: No (rule: uri)');
    expect(lines).toContain('[Group 2] Name: Mail | Domain: mail.test | Username: m');
    expect(lines).toContain('  Group characteristics: Has TOTP, No notes');
    expect(lines).toContain('  DECISION: Keeping entry with TOTP: Yes, URI: Yes, Notes: No (rule: totp)');
    expect(lines.some(l => l.startsWith('    [KEEP]'))).toBe(false);
  });

  it('should list every record with its action in analysis mode', () => {
    const lines = formatReport(result, true);

    expect(lines).toContain('    [KEEP] Entry 1: example.com | No TOTP | Has URI | No notes | Folder: Personal');
    expect(lines).toContain('    [REMOVE] Entry 2: example.com | No TOTP | Has URI | No notes | Folder: Work');
  });

  it('should end with the summary', () => {
    const lines = formatReport(result, false);

    expect(lines.slice(-15)).toEqual([
      '',
      'Summary of deduplication decisions:',
      '  - Fixed 1 empty login_uri fields',
      '  - Set default folder for 1 entries with empty folders',
      '  - Removed 1 entries by keyword filtering',
      '  - Keeping 1 unique entries (no duplicates)',
      '  - Keeping 1 entries with TOTP from duplicate groups',
      '  - Keeping 0 entries with notes (but no TOTP) from duplicate groups',
      '  - Keeping 1 entries with URI (but no TOTP/notes) from duplicate groups',
      '  - Keeping 0 basic entries (no TOTP/notes/URI) from duplicate groups',
      '  - Preserving 2 non-login entries (notes, cards, etc.)',
      '  - Removing 2 duplicate entries',
      '  - Final login entry count: 3',
      '  - Total removed login entries: 3',
      '  - Total entries in final output: 5',
    ]);
  });

  it('should cap group details outside analysis mode', () => {
    const records = Array.from({ length: 12 }, (_, i) => [
      makeLogin({ name: `Site ${i}` }),
      makeLogin({ name: `Site ${i}` }),
    ]).flat();
    const many = deduplicate(records);

    const lines = formatReport(many, false);

    expect(lines.filter(l => l.startsWith('[Group '))).toHaveLength(10);
    expect(lines).toContain('  ... and 2 more duplicate groups (use --analyze for full details)');
    expect(formatReport(many, true).filter(l => l.startsWith('[Group '))).toHaveLength(12);
  });
});
