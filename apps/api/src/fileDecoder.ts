import { parse } from 'csv-parse/sync';
import type { PreviewRow } from '@budget-lens/shared';
import { type DecodeAttempt, DecodeError, EmptyTableError } from './errors.js';

export type SourceRecord = Record<string, string>;

export type Table = {
  columns: string[]; // unique, in file order
  records: SourceRecord[];
};

export type DecodedTable = Table & { encoding: string };

export type DecodeCandidate = {
  encoding: string;
  decode: (bytes: Uint8Array) => string;
};

export type DecodeResult =
  | { ok: true; encoding: string; table: Table }
  | { ok: false; attempts: DecodeAttempt[] };

const BOM = '\uFEFF';

export const DEFAULT_CANDIDATES: readonly DecodeCandidate[] = [
  {
    encoding: 'utf-8',
    decode: bytes => {
      const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
      // leave BOM-prefixed files to the signature-aware candidate
      if (text.startsWith(BOM)) throw new Error('Unexpected byte order mark');
      return text;
    },
  },
  {
    encoding: 'utf-8-sig',
    decode: bytes => new TextDecoder('utf-8', { fatal: true }).decode(bytes),
  },
  {
    encoding: 'latin1',
    decode: bytes => Buffer.from(bytes).toString('latin1'),
  },
];

function isRowList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

/**
 * Make header names unique: blank headers become `Unnamed: <index>` and
 * repeats of `x` become `x.1`, `x.2`, ...
 */
export function uniqueColumnNames(headers: string[]): string[] {
  const taken = new Set<string>();
  const suffixes = new Map<string, number>();

  return headers.map((raw, idx) => {
    const base = raw === '' ? `Unnamed: ${idx}` : raw;
    let suffix = suffixes.get(base) ?? 0;
    let name = base;
    while (taken.has(name)) {
      suffix += 1;
      name = `${base}.${suffix}`;
    }
    suffixes.set(base, suffix);
    taken.add(name);
    return name;
  });
}

export function parseDelimited(text: string): Table {
  const parsed: unknown = parse(text, {
    skip_empty_lines: true,
    relax_column_count_less: true,
    // a stray quote inside an unquoted cell is literal text
    relax_quotes: true,
  });
  if (!isRowList(parsed)) throw new Error('Parser returned non-text records');

  const [header = [], ...body] = parsed;
  const columns = uniqueColumnNames(header);
  const records = body.map(row =>
    Object.fromEntries(columns.map((column, idx) => [column, row[idx] ?? '']))
  );
  return { columns, records };
}

export function tryDecode(
  bytes: Uint8Array,
  candidates: readonly DecodeCandidate[] = DEFAULT_CANDIDATES
): DecodeResult {
  const attempts: DecodeAttempt[] = [];
  for (const candidate of candidates) {
    try {
      const table = parseDelimited(candidate.decode(bytes));
      return { ok: true, encoding: candidate.encoding, table };
    } catch (err) {
      attempts.push({
        encoding: candidate.encoding,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return { ok: false, attempts };
}

export function decode(
  bytes: Uint8Array,
  candidates: readonly DecodeCandidate[] = DEFAULT_CANDIDATES
): DecodedTable {
  const result = tryDecode(bytes, candidates);
  if (!result.ok) throw new DecodeError(result.attempts);
  return { ...result.table, encoding: result.encoding };
}

export function assertNotEmpty(table: Table): void {
  if (!table.columns.length || !table.records.length) throw new EmptyTableError();
}

export function previewRows(table: Table, limit: number): PreviewRow[] {
  return table.records.slice(0, Math.max(0, limit)).map(record => ({ ...record }));
}
