import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import type { CellValue, ColumnMapping } from '@budget-lens/shared';
import { UnknownColumnError } from './errors.js';
import type { SourceRecord, Table } from './fileDecoder.js';

dayjs.extend(customParseFormat);

export const NO_CATEGORY_COLUMN = '(none)';
export const UNCATEGORIZED = 'Uncategorized';

export type NormalizedRow = {
  index: number; // position in the source table
  record: SourceRecord;
  date: CellValue<Date>;
  amount: CellValue<number>;
  category: string;
};

// Tried in order, strictly. Month-first wins for ambiguous slash dates; day-first
// only catches the ones no month-first reading accepts.
const DATE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD HH:mm:ss.SSS',
  'YYYY-MM-DD[T]HH:mm',
  'YYYY-MM-DD[T]HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm:ss.SSS',
  'YYYY/MM/DD',
  'YYYY/M/D',
  'MM/DD/YYYY',
  'M/D/YYYY',
  'MM/DD/YYYY HH:mm',
  'MM/DD/YYYY HH:mm:ss',
  'M/D/YYYY H:mm',
  'DD/MM/YYYY',
  'D/M/YYYY',
  'MM-DD-YYYY',
  'DD.MM.YYYY',
  'D.M.YYYY',
  'YYYYMMDD',
  'D MMM YYYY',
  'DD MMM YYYY',
  'D MMMM YYYY',
  'MMM D, YYYY',
  'MMMM D, YYYY',
  'MMM D YYYY',
];

const ISO_WITH_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;
const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/;
const FRACTION = /\.(\d{1,3})\d*$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Drops the offset so the timestamp keeps the wall-clock day and month it was written with. */
function wallClock(iso: string): string {
  return iso
    .replace(OFFSET_SUFFIX, '')
    .replace(FRACTION, (_, digits: string) => `.${digits.padEnd(3, '0')}`);
}

export function parseDateCell(raw: string): CellValue<Date> {
  const text = raw.trim();
  if (!text) return { kind: 'invalid', raw };
  const parsed = dayjs(ISO_WITH_OFFSET.test(text) ? wallClock(text) : text, DATE_FORMATS, true);
  return parsed.isValid() ? { kind: 'valid', value: parsed.toDate() } : { kind: 'invalid', raw };
}

export function parseAmountCell(raw: string): CellValue<number> {
  const text = raw.replace(/,/g, '').trim();
  if (!DECIMAL.test(text)) return { kind: 'invalid', raw };
  const value = Number(text);
  return Number.isFinite(value) ? { kind: 'valid', value } : { kind: 'invalid', raw };
}

export function categoryOf(record: SourceRecord, categoryColumn: string): string {
  if (categoryColumn === NO_CATEGORY_COLUMN) return UNCATEGORIZED;
  const value = String(record[categoryColumn] ?? '');
  return value.trim() ? value : UNCATEGORIZED;
}

export function formatDay(date: Date): string {
  return dayjs(date).format('YYYY-MM-DD');
}

export function formatMonth(date: Date): string {
  return dayjs(date).format('YYYY-MM');
}

export function assertMappedColumns(table: Table, mapping: ColumnMapping): void {
  const known = new Set(table.columns);
  const wanted = [mapping.dateColumn, mapping.amountColumn];
  if (mapping.categoryColumn !== NO_CATEGORY_COLUMN) wanted.push(mapping.categoryColumn);
  const missing = wanted.find(column => !known.has(column));
  if (missing !== undefined) throw new UnknownColumnError(missing);
}

/**
 * Derive the canonical date/amount/category fields for every record. Cells
 * that fail coercion become invalid markers; no row is ever dropped.
 */
export function normalize(table: Table, mapping: ColumnMapping): NormalizedRow[] {
  assertMappedColumns(table, mapping);
  return table.records.map((record, index) => ({
    index,
    record,
    date: parseDateCell(record[mapping.dateColumn] ?? ''),
    amount: parseAmountCell(record[mapping.amountColumn] ?? ''),
    category: categoryOf(record, mapping.categoryColumn),
  }));
}

const SYNONYMS: Record<keyof ColumnMapping, string[]> = {
  dateColumn: ['date', 'transaction date', 'posted', 'posted date', 'posting date', 'booking date', 'day'],
  amountColumn: ['amount', 'value', 'total', 'cost', 'price', 'debit', 'expense', 'spent'],
  categoryColumn: ['category', 'type', 'group', 'class', 'label'],
};

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

function findColumn(columns: string[], synonyms: string[]): string | undefined {
  const normalized = columns.map(normalizeHeader);
  for (const synonym of synonyms) {
    const idx = normalized.indexOf(synonym);
    if (idx >= 0) return columns[idx];
  }
  return undefined;
}

export function suggestMapping(columns: string[]): ColumnMapping {
  const first = columns[0] ?? '';
  return {
    dateColumn: findColumn(columns, SYNONYMS.dateColumn) ?? first,
    amountColumn: findColumn(columns, SYNONYMS.amountColumn) ?? first,
    categoryColumn: findColumn(columns, SYNONYMS.categoryColumn) ?? NO_CATEGORY_COLUMN,
  };
}
