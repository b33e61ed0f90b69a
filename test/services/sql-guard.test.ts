import { describe, it, expect } from 'vitest';
import { ensureLimit, formatResults, validateSelectSql } from '../../src/services/sql-guard';

describe('validateSelectSql', () => {
  it('should accept a plain SELECT', () => {
    expect(validateSelectSql('SELECT name FROM chords WHERE difficulty >= $1')).toEqual({
      isValid: true,
      reason: 'Query passed validation',
    });
  });

  it('should reject anything that is not a SELECT', () => {
    expect(validateSelectSql('  delete from chords')).toEqual({
      isValid: false,
      reason: 'Only SELECT queries are allowed',
    });
  });

  it('should reject forbidden keywords inside a SELECT', () => {
    expect(validateSelectSql('SELECT 1; DROP TABLE chords').reason).toBe('Forbidden keyword: DROP');
    expect(validateSelectSql('select * from chords where 1=1 -- comment').reason).toBe('Forbidden keyword: --');
    expect(validateSelectSql('SELECT /* hidden */ name FROM chords').reason).toBe('Forbidden keyword: /*');
  });

  it('should reject statements that write through a SELECT', () => {
    expect(validateSelectSql('SELECT * INTO stolen FROM chords').reason).toBe('Forbidden keyword: INTO');
    expect(validateSelectSql("SELECT setval('chords_id_seq', 1)").reason).toBe('Forbidden function: setval');
    expect(validateSelectSql("select nextval ('chords_id_seq')").reason).toBe('Forbidden function: nextval');
  });

  it('should reject functions that hold the connection or reach the server', () => {
    expect(validateSelectSql('SELECT pg_sleep(600)').reason).toBe('Forbidden function: pg_sleep');
    expect(validateSelectSql("SELECT pg_read_file('/etc/hosts')").reason).toBe('Forbidden function: pg_read_file');
  });

  it('should allow column names that merely contain a keyword', () => {
    expect(validateSelectSql('SELECT created_at, updated_by FROM agent_logs').isValid).toBe(true);
  });

  it('should reject stacked statements', () => {
    expect(validateSelectSql('SELECT 1; SELECT 2').reason).toBe('Multiple statements are not allowed');
    expect(validateSelectSql('SELECT 1;').isValid).toBe(true);
  });
});

describe('ensureLimit', () => {
  it('should append the default limit', () => {
    expect(ensureLimit('SELECT name FROM chords;')).toBe('SELECT name FROM chords LIMIT 50');
  });

  it('should keep an existing limit', () => {
    expect(ensureLimit('SELECT name FROM chords limit 5')).toBe('SELECT name FROM chords limit 5');
  });

  it('should use a custom limit', () => {
    expect(ensureLimit('SELECT 1', 10)).toBe('SELECT 1 LIMIT 10');
  });
});

describe('formatResults', () => {
  const rows = [
    { name: 'Cmaj7', difficulty: 1, intervals: ['1', '3', '5', '7'] },
    { name: 'C7alt', difficulty: 4, intervals: null },
  ];

  it('should render a markdown table', () => {
    expect(formatResults(rows)).toEqual({
      formatted: [
        '| name | difficulty | intervals |',
        '| --- | --- | --- |',
        '| Cmaj7 | 1 | ["1","3","5","7"] |',
        '| C7alt | 4 |  |',
      ].join('\n'),
      count: 2,
    });
  });

  it('should render a list', () => {
    expect(formatResults(rows, 'list').formatted).toBe(
      '- name: Cmaj7, difficulty: 1, intervals: ["1","3","5","7"]\n- name: C7alt, difficulty: 4, intervals: '
    );
  });

  it('should summarise', () => {
    expect(formatResults(rows, 'summary')).toEqual({ formatted: 'Found 2 results.', count: 2 });
  });

  it('should say when there is nothing to show', () => {
    expect(formatResults([], 'table')).toEqual({ formatted: 'No results found.', count: 0 });
  });
});
