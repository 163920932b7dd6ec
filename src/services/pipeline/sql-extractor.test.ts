import { describe, it, expect } from 'vitest';
import {
  extractSql,
  fromAnyFence,
  fromLineScan,
  fromRawText,
  fromSqlFence,
} from './sql-extractor.js';

describe('extractSql', () => {
  it('takes the body of a fenced sql block', () => {
    expect(extractSql('```sql\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('finds a statement surrounded by prose', () => {
    const text =
      "Sure! Here's the result:\n\nSELECT * FROM orders WHERE id = 1;\n\nLet me know if you need more.";
    expect(extractSql(text)).toBe('SELECT * FROM orders WHERE id = 1;');
  });

  it('returns undefined when the response has no SQL', () => {
    expect(extractSql('I cannot answer this.')).toBeUndefined();
  });

  it('is idempotent on its own output wrapped in a sql fence', () => {
    const inputs = [
      '```sql\nSELECT name FROM customers\n```',
      'Here you go:\nSELECT name\nFROM customers\nWHERE city = \'Paris\';\nThanks',
      'WITH t AS (SELECT 1 AS x) SELECT x FROM t',
    ];
    for (const input of inputs) {
      const first = extractSql(input);
      expect(first).toBeDefined();
      expect(extractSql('```sql\n' + first + '\n```')).toBe(first);
    }
  });

  it('prefers a sql fence over an earlier untagged one', () => {
    const text = '```\nSELECT 2\n```\n```sql\nSELECT 1\n```';
    expect(extractSql(text)).toBe('SELECT 1');
  });
});

describe('fromSqlFence', () => {
  it('matches the tag case-insensitively', () => {
    expect(fromSqlFence('```SQL\nSELECT 3\n```')).toBe('SELECT 3');
  });

  it('skips an empty sql block', () => {
    expect(fromSqlFence('```sql\n```\n```sql\nSELECT 2\n```')).toBe('SELECT 2');
  });

  it('ignores blocks with another tag', () => {
    expect(fromSqlFence('```python\nprint(1)\n```')).toBeUndefined();
  });
});

describe('fromAnyFence', () => {
  it('drops a language tag on the opening line', () => {
    expect(fromAnyFence('```postgresql\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('keeps an untagged block', () => {
    expect(fromAnyFence('```\nSELECT name FROM customers\n```')).toBe(
      'SELECT name FROM customers'
    );
  });

  it('skips blocks without a statement keyword', () => {
    expect(fromAnyFence('```\nhello world\n```')).toBeUndefined();
  });
});

describe('fromLineScan', () => {
  it('collects lines until the terminating semicolon, skipping comments', () => {
    const text = 'Here you go:\nSELECT name\n-- only active\nFROM customers\nWHERE is_active = 1;\nThanks';
    expect(fromLineScan(text)).toBe('SELECT name\nFROM customers\nWHERE is_active = 1;');
  });

  it('stops at a blank line', () => {
    expect(fromLineScan('select count(*)\nfrom orders\n\nThat counts them.')).toBe(
      'select count(*)\nfrom orders'
    );
  });

  it('returns undefined without a statement start', () => {
    expect(fromLineScan('The table is called orders.')).toBeUndefined();
  });
});

describe('fromRawText', () => {
  it('returns the trimmed text when it mentions a SQL keyword', () => {
    expect(fromRawText('  Count rows FROM orders  ')).toBe('Count rows FROM orders');
  });

  it('returns undefined for plain prose', () => {
    expect(fromRawText('No idea, sorry.')).toBeUndefined();
  });
});
