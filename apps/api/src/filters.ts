import dayjs from 'dayjs';
import type { DateRange } from '@budget-lens/shared';
import { InvalidDateRangeInput } from './errors.js';
import { formatDay, type NormalizedRow } from './fieldMapper.js';

export type FilterSpec = {
  dateRange: DateRange;
  categories: ReadonlySet<string>;
};

const DAY = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDay(value: string): boolean {
  return DAY.test(value) && dayjs(value, 'YYYY-MM-DD', true).isValid();
}

/**
 * Earliest and latest calendar day among valid dates. Without any valid date
 * the range falls back to January 1st of `today`'s year through `today`.
 */
export function defaultDateRange(rows: NormalizedRow[], today: Date = new Date()): DateRange {
  let start: string | undefined;
  let end: string | undefined;
  for (const row of rows) {
    if (row.date.kind !== 'valid') continue;
    const day = formatDay(row.date.value);
    if (start === undefined || day < start) start = day;
    if (end === undefined || day > end) end = day;
  }
  if (start === undefined || end === undefined) {
    return {
      start: dayjs(today).startOf('year').format('YYYY-MM-DD'),
      end: formatDay(today),
    };
  }
  return { start, end };
}

/** Exactly two `YYYY-MM-DD` endpoints, as picked in a range selector. */
export function parseDateRange(endpoints: string[]): DateRange {
  if (endpoints.length !== 2) {
    throw new InvalidDateRangeInput(`Expected 2 endpoints, got ${endpoints.length}.`);
  }
  const [start, end] = endpoints.map(e => e.trim());
  for (const endpoint of [start, end]) {
    if (!isCalendarDay(endpoint)) {
      throw new InvalidDateRangeInput(`'${endpoint}' is not a YYYY-MM-DD date.`);
    }
  }
  return { start, end };
}

export function availableCategories(rows: NormalizedRow[]): string[] {
  return Array.from(new Set(rows.map(r => r.category)));
}

export function matchesFilter(row: NormalizedRow, spec: FilterSpec): boolean {
  if (row.date.kind !== 'valid') return false;
  const day = formatDay(row.date.value);
  return (
    day >= spec.dateRange.start &&
    day <= spec.dateRange.end &&
    spec.categories.has(row.category)
  );
}

export function filterRows(rows: NormalizedRow[], spec: FilterSpec): NormalizedRow[] {
  return rows.filter(row => matchesFilter(row, spec));
}
