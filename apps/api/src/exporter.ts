import dayjs from 'dayjs';
import { stringify } from 'csv-stringify/sync';
import type { CellValue } from '@budget-lens/shared';
import type { NormalizedRow } from './fieldMapper.js';
import type { Table } from './fileDecoder.js';

export const EXPORT_FILENAME = 'filtered_budget.csv';
export const DERIVED_COLUMNS = ['_date', '_amount', '_category'] as const;

export function formatDateCell(cell: CellValue<Date>): string {
  if (cell.kind !== 'valid') return '';
  const d = dayjs(cell.value);
  const midnight = d.hour() === 0 && d.minute() === 0 && d.second() === 0 && d.millisecond() === 0;
  return d.format(midnight ? 'YYYY-MM-DD' : 'YYYY-MM-DD HH:mm:ss');
}

export function formatAmountCell(cell: CellValue<number>): string {
  return cell.kind === 'valid' ? String(cell.value) : '';
}

/** Source columns first; a derived column whose name already exists keeps that slot. */
export function exportColumns(table: Table): string[] {
  const columns = [...table.columns];
  for (const derived of DERIVED_COLUMNS) {
    if (!columns.includes(derived)) columns.push(derived);
  }
  return columns;
}

export function exportRecord(row: NormalizedRow): Record<string, string> {
  return {
    ...row.record,
    _date: formatDateCell(row.date),
    _amount: formatAmountCell(row.amount),
    _category: row.category,
  };
}

export function exportCsv(table: Table, rows: NormalizedRow[]): Buffer {
  const columns = exportColumns(table);
  const text = stringify(
    rows.map(row => {
      const record = exportRecord(row);
      return columns.map(c => record[c] ?? '');
    }),
    { header: true, columns, record_delimiter: 'unix' }
  );
  return Buffer.from(text, 'utf-8');
}
