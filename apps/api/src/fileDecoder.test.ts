import { describe, it, expect } from 'vitest';
import { DecodeError, EmptyTableError } from './errors.js';
import {
  assertNotEmpty,
  decode,
  parseDelimited,
  previewRows,
  tryDecode,
  uniqueColumnNames,
} from './fileDecoder.js';

describe('decode', () => {
  it('parses plain UTF-8 with the first candidate', () => {
    const table = decode(Buffer.from('Date,Amount,Category\n2024-01-05,100,Food\n'));
    expect(table.encoding).toBe('utf-8');
    expect(table.columns).toEqual(['Date', 'Amount', 'Category']);
    expect(table.records).toEqual([{ Date: '2024-01-05', Amount: '100', Category: 'Food' }]);
  });

  it('falls back to utf-8-sig when the file starts with a byte order mark', () => {
    const table = decode(Buffer.from('\uFEFFDate,Amount\n2024-01-05,1\n'));
    expect(table.encoding).toBe('utf-8-sig');
    expect(table.columns).toEqual(['Date', 'Amount']);
  });

  it('falls back to latin1 for bytes that are not valid UTF-8', () => {
    const bytes = Buffer.concat([
      Buffer.from('Name,Amount\nCaf'),
      Buffer.from([0xe9]),
      Buffer.from(',5\n'),
    ]);
    const table = decode(bytes);
    expect(table.encoding).toBe('latin1');
    expect(table.records[0].Name).toBe('Café');
  });

  it('raises DecodeError when every candidate fails to parse', () => {
    const bytes = Buffer.from('a,b\n1,2,3\n');
    expect(() => decode(bytes)).toThrow(DecodeError);

    const result = tryDecode(bytes);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.attempts.map(a => a.encoding)).toEqual(['utf-8', 'utf-8-sig', 'latin1']);
    }
  });

  it('uses a custom candidate list in order', () => {
    const result = tryDecode(Buffer.from('x\n1\n'), [
      { encoding: 'broken', decode: () => { throw new Error('nope'); } },
      { encoding: 'ascii', decode: bytes => Buffer.from(bytes).toString('ascii') },
    ]);
    expect(result).toEqual({
      ok: true,
      encoding: 'ascii',
      table: { columns: ['x'], records: [{ x: '1' }] },
    });
  });
});

describe('parseDelimited', () => {
  it('pads short rows and skips blank lines', () => {
    const table = parseDelimited('a,b,c\n\n1,2\n\n');
    expect(table.records).toEqual([{ a: '1', b: '2', c: '' }]);
  });

  it('keeps quoted delimiters inside a cell', () => {
    const table = parseDelimited('Amount,Note\n"1,000","x, y"\n');
    expect(table.records[0]).toEqual({ Amount: '1,000', Note: 'x, y' });
  });

  it('reads a quote inside an unquoted cell as text', () => {
    const table = decode(Buffer.from('Date,Amount,Note\n2024-01-05,100,5" pipe\n2024-01-06,7,Bob\'s "special" order\n'));
    expect(table.encoding).toBe('utf-8');
    expect(table.records.map(r => r.Note)).toEqual(['5" pipe', 'Bob\'s "special" order']);
  });

  it('makes header names unique', () => {
    expect(uniqueColumnNames(['a', 'a', '', 'b', 'a'])).toEqual(['a', 'a.1', 'Unnamed: 2', 'b', 'a.2']);
    const table = parseDelimited('Amount,Amount\n1,2\n');
    expect(table.records[0]).toEqual({ Amount: '1', 'Amount.1': '2' });
  });
});

describe('assertNotEmpty', () => {
  it('rejects a file with no bytes', () => {
    const table = decode(Buffer.alloc(0));
    expect(table.columns).toEqual([]);
    expect(() => assertNotEmpty(table)).toThrow(EmptyTableError);
  });

  it('rejects a header without rows', () => {
    expect(() => assertNotEmpty(decode(Buffer.from('a,b\n')))).toThrow(EmptyTableError);
  });

  it('accepts a table with at least one row', () => {
    expect(() => assertNotEmpty(decode(Buffer.from('a\n1\n')))).not.toThrow();
  });
});

describe('previewRows', () => {
  it('returns copies of the first rows', () => {
    const table = parseDelimited('n\n1\n2\n3\n');
    const preview = previewRows(table, 2);
    expect(preview).toEqual([{ n: '1' }, { n: '2' }]);
    preview[0].n = 'changed';
    expect(table.records[0].n).toBe('1');
  });
});
