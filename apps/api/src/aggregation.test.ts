import { describe, it, expect } from 'vitest';
import {
  formatAmount,
  formatKpis,
  summarize,
  totalsByCategory,
  totalsByMonth,
} from './aggregation.js';
import { normalize } from './fieldMapper.js';
import { parseDelimited } from './fileDecoder.js';

const mapping = { dateColumn: 'Date', amountColumn: 'Amount', categoryColumn: 'Category' };

function rowsOf(lines: string[]) {
  return normalize(parseDelimited(['Date,Amount,Category', ...lines].join('\n')), mapping);
}

const rows = rowsOf(['2024-01-05,100,Food', '2024-02-10,abc,Food', '2024-03-01,50,Rent']);

describe('summarize', () => {
  it('counts every transaction but totals only valid amounts', () => {
    expect(summarize(rows)).toEqual({ total: 150, average: 75, maximum: 100, count: 3 });
  });

  it('reports average and maximum as absent without valid amounts', () => {
    expect(summarize(rowsOf(['2024-01-05,n/a,Food']))).toEqual({
      total: 0,
      average: null,
      maximum: null,
      count: 1,
    });
  });

  it('handles negative amounts', () => {
    expect(summarize(rowsOf(['2024-01-05,-30,Food', '2024-01-06,-10,Food'])).maximum).toBe(-10);
  });
});

describe('totalsByCategory', () => {
  it('sums valid amounts per category', () => {
    expect(totalsByCategory(rows)).toEqual([
      { category: 'Food', total: 100 },
      { category: 'Rent', total: 50 },
    ]);
  });

  it('orders categories by label', () => {
    const mixed = rowsOf(['2024-01-01,1,b', '2024-01-01,2,B', '2024-01-01,3,a']);
    expect(totalsByCategory(mixed).map(t => t.category)).toEqual(['B', 'a', 'b']);
  });

  it('adds up to the KPI total', () => {
    const many = rowsOf([
      '2024-01-01,12,Food',
      '2024-01-02,7,Rent',
      '2024-02-03,x,Fun',
      '2024-02-04,25,Food',
      '2024-03-05,1,Fun',
    ]);
    const sum = totalsByCategory(many).reduce((acc, t) => acc + t.total, 0);
    expect(sum).toBe(summarize(many).total);
  });
});

describe('totalsByMonth', () => {
  it('groups by calendar month in chronological order', () => {
    expect(totalsByMonth(rows)).toEqual([
      { month: '2024-01', total: 100 },
      { month: '2024-03', total: 50 },
    ]);
  });

  it('skips rows without a valid date', () => {
    const dated = rowsOf(['2024-05-02,5,Food', 'someday,9,Food', '2023-12-31,1,Food', '2024-05-20,5,Food']);
    expect(totalsByMonth(dated)).toEqual([
      { month: '2023-12', total: 1 },
      { month: '2024-05', total: 10 },
    ]);
  });
});

describe('formatKpis', () => {
  it('renders currency values and marks absent ones', () => {
    expect(formatKpis({ total: 1234.5, average: null, maximum: -20, count: 3 }, '₹')).toEqual({
      total: '₹1,234.50',
      average: '—',
      maximum: '-₹20.00',
      count: '3',
    });
  });

  it('rounds to two decimals', () => {
    expect(formatAmount(0.006, '$')).toBe('$0.01');
    expect(formatAmount(1000000, '')).toBe('1,000,000.00');
  });
});
