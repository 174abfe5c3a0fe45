import { describe, it, expect } from 'vitest';
import { decodeParameters } from '../../../src/correlator/params.js';
import {
  DEFAULT_SUBSTITUTION_OPTIONS,
  quoteSqlString,
  substitutePlaceholders,
} from '../../../src/correlator/substitute.js';

describe('substitutePlaceholders', () => {
  it('quotes strings and inlines numbers', () => {
    const result = substitutePlaceholders(
      'SELECT * FROM users WHERE name = ? AND id = ?',
      decodeParameters('[String:1:John][Int:2:42]')
    );

    expect(result).toEqual({ ok: true, sql: "SELECT * FROM users WHERE name = 'John' AND id = 42" });
  });

  it("doubles single quotes exactly once", () => {
    const result = substitutePlaceholders('INSERT INTO t (name) VALUES (?)', decodeParameters("[String:1:O'Brien]"));

    expect(result).toEqual({ ok: true, sql: "INSERT INTO t (name) VALUES ('O''Brien')" });
  });

  it('inlines every verbatim type regardless of case', () => {
    const result = substitutePlaceholders(
      'VALUES (?, ?, ?, ?, ?)',
      decodeParameters('[BigDecimal:1:1.50][Number:2:3][INT:3:4][long:4:5][Float:5:6.5]')
    );

    expect(result).toEqual({ ok: true, sql: 'VALUES (1.50, 3, 4, 5, 6.5)' });
  });

  it('fails on an unsupported type', () => {
    const result = substitutePlaceholders('a = ?', decodeParameters('[Timestamp:1:2024-01-15]'));

    expect(result).toEqual({
      ok: false,
      issue: { kind: 'unsupported-type', position: 1, typeName: 'Timestamp' },
    });
  });

  it('fails when a placeholder has no binding', () => {
    const result = substitutePlaceholders('a = ? AND b = ?', decodeParameters('[Int:1:1]'));

    expect(result).toEqual({ ok: false, issue: { kind: 'missing-value', position: 2 } });
  });

  it('counts placeholders independently of binding order', () => {
    const result = substitutePlaceholders('a = ? AND b = ?', decodeParameters('[Int:2:20][Int:1:10]'));

    expect(result).toEqual({ ok: true, sql: 'a = 10 AND b = 20' });
  });

  it('ignores bindings that no placeholder consumes', () => {
    const result = substitutePlaceholders('a = ?', decodeParameters('[Int:1:1][Int:5:9]'));

    expect(result).toEqual({ ok: true, sql: 'a = 1' });
  });

  it('preserves every other character of the template', () => {
    const template = "SELECT x,y FROM t\tWHERE a=? AND b IN (?, ?) -- note: 'q'";
    const result = substitutePlaceholders(template, decodeParameters('[Int:1:1][String:2:b][Long:3:3]'));

    expect(result).toEqual({ ok: true, sql: "SELECT x,y FROM t\tWHERE a=1 AND b IN ('b', 3) -- note: 'q'" });
  });

  it('returns the template unchanged when there are no placeholders', () => {
    expect(substitutePlaceholders('SELECT 1', new Map())).toEqual({ ok: true, sql: 'SELECT 1' });
  });

  it('renders the configured null literal as NULL', () => {
    const options = { ...DEFAULT_SUBSTITUTION_OPTIONS, nullLiteral: 'null' };
    const result = substitutePlaceholders('a = ? AND b = ?', decodeParameters('[String:1:null][Int:2:null]'), options);

    expect(result).toEqual({ ok: true, sql: 'a = NULL AND b = NULL' });
  });

  it('quotes additional configured types', () => {
    const options = { ...DEFAULT_SUBSTITUTION_OPTIONS, quotedTypes: ['string', 'Timestamp'] };
    const result = substitutePlaceholders('a = ?', decodeParameters('[TIMESTAMP:1:2024-01-15 09:00:08]'), options);

    expect(result).toEqual({ ok: true, sql: "a = '2024-01-15 09:00:08'" });
  });
});

describe('quoteSqlString', () => {
  it('wraps and escapes', () => {
    expect(quoteSqlString("it's")).toBe("'it''s'");
  });
});
