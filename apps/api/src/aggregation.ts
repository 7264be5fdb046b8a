import type { CategoryTotal, FormattedKpis, KpiSet, MonthTotal } from '@budget-lens/shared';
import { formatMonth, type NormalizedRow } from './fieldMapper.js';

export const ABSENT = '—';

function validAmounts(rows: NormalizedRow[]): number[] {
  const amounts: number[] = [];
  for (const r of rows) {
    if (r.amount.kind === 'valid') amounts.push(r.amount.value);
  }
  return amounts;
}

/**
 * KPIs over the filtered rows. `count` counts every row (transactions),
 * while total/average/maximum only see rows with a valid amount.
 */
export function summarize(rows: NormalizedRow[]): KpiSet {
  const amounts = validAmounts(rows);
  const total = amounts.reduce((sum, a) => sum + a, 0);
  const maximum = amounts.reduce<number | null>((max, a) => (max === null || a > max ? a : max), null);
  return {
    total,
    average: amounts.length ? total / amounts.length : null,
    maximum,
    count: rows.length,
  };
}

function compareLabels(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function totalsByCategory(rows: NormalizedRow[]): CategoryTotal[] {
  const byCategory = new Map<string, number>();
  for (const r of rows) {
    if (r.amount.kind !== 'valid') continue;
    byCategory.set(r.category, (byCategory.get(r.category) ?? 0) + r.amount.value);
  }
  return Array.from(byCategory.entries())
    .sort((a, b) => compareLabels(a[0], b[0]))
    .map(([category, total]) => ({ category, total }));
}

export function totalsByMonth(rows: NormalizedRow[]): MonthTotal[] {
  const byMonth = new Map<string, number>();
  for (const r of rows) {
    if (r.date.kind !== 'valid' || r.amount.kind !== 'valid') continue;
    const month = formatMonth(r.date.value);
    byMonth.set(month, (byMonth.get(month) ?? 0) + r.amount.value);
  }
  return Array.from(byMonth.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([month, total]) => ({ month, total }));
}

const money = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatAmount(value: number | null, currencySymbol: string): string {
  if (value === null || !Number.isFinite(value)) return ABSENT;
  const text = money.format(Math.abs(value));
  return value < 0 ? `-${currencySymbol}${text}` : `${currencySymbol}${text}`;
}

export function formatKpis(kpis: KpiSet, currencySymbol: string): FormattedKpis {
  return {
    total: formatAmount(kpis.total, currencySymbol),
    average: formatAmount(kpis.average, currencySymbol),
    maximum: formatAmount(kpis.maximum, currencySymbol),
    count: String(kpis.count),
  };
}
