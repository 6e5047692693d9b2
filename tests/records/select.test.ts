import { describe, it, expect } from 'vitest';
import { SELECTION_RULES, selectBest } from '../../src/records/select.js';
import { makeLogin } from '../helpers.js';

describe('selectBest', () => {
  it('should return the only member of a single-record group', () => {
    const only = makeLogin({ name: 'A' });
    expect(selectBest([only])).toEqual({ record: only, rule: 'single' });
  });

  it('should prefer a record with both TOTP and notes', () => {
    const totpOnly = makeLogin({ name: 'A', login_totp: 'abc' });
    const both = makeLogin({ name: 'A', login_totp: 'abc', notes: 'recovery codes' });

    const selection = selectBest([totpOnly, both]);

    expect(selection.record).toBe(both);
    expect(selection.rule).toBe('totp-and-notes');
  });

  it('should prefer TOTP over notes', () => {
    const notesOnly = makeLogin({ name: 'A', notes: 'n' });
    const totpOnly = makeLogin({ name: 'A', login_totp: 'abc' });

    const selection = selectBest([notesOnly, totpOnly]);

    expect(selection.record).toBe(totpOnly);
    expect(selection.rule).toBe('totp');
  });

  it('should take the first TOTP record when several have one', () => {
    const first = makeLogin({ name: 'A', login_totp: 'one' });
    const second = makeLogin({ name: 'A', login_totp: 'two' });
    expect(selectBest([first, second]).record).toBe(first);
  });

  it('should prefer a URI over notes', () => {
    const notesOnly = makeLogin({ name: 'A', notes: 'n' });
    const withUri = makeLogin({ name: 'A', login_uri: 'https://a.test' });

    const selection = selectBest([notesOnly, withUri]);

    expect(selection.record).toBe(withUri);
    expect(selection.rule).toBe('uri');
  });

  it('should fall back to the first record with notes', () => {
    const short = makeLogin({ name: 'A', notes: 'a' });
    const long = makeLogin({ name: 'A', notes: 'a much longer note' });

    const selection = selectBest([short, long]);

    expect(selection.record).toBe(short);
    expect(selection.rule).toBe('notes');
  });

  it('should take the first record when nothing distinguishes them', () => {
    const first = makeLogin({ name: 'A' });
    const second = makeLogin({ name: 'A' });

    expect(selectBest([first, second])).toEqual({ record: first, rule: 'first' });
  });

  it('should reject an empty group', () => {
    expect(() => selectBest([])).toThrow('Cannot select from an empty group');
  });
});

describe('SELECTION_RULES', () => {
  it('should apply rules in priority order', () => {
    expect(SELECTION_RULES.map(r => r.rule)).toEqual([
      'totp-and-notes', 'totp', 'uri', 'notes', 'longest-notes', 'first',
    ]);
  });

  it('should pick the longest notes, earliest on ties, only when notes exist', () => {
    const longestNotes = SELECTION_RULES[4].pick;
    const a = makeLogin({ notes: 'abc' });
    const b = makeLogin({ notes: 'abcdef' });
    const c = makeLogin({ notes: 'ghijkl' });

    expect(longestNotes([a, b, c])).toBe(b);
    expect(longestNotes([makeLogin(), makeLogin()])).toBeUndefined();
  });
});
