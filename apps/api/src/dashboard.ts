import type {
  ColumnMapping,
  DashboardResponse,
  DashboardSelection,
} from '@budget-lens/shared';
import { formatKpis, summarize, totalsByCategory, totalsByMonth } from './aggregation.js';
import { EmptyFilterResultWarning } from './errors.js';
import { exportCsv, exportRecord } from './exporter.js';
import { normalize, suggestMapping, type NormalizedRow } from './fieldMapper.js';
import { previewRows, type Table } from './fileDecoder.js';
import {
  availableCategories,
  defaultDateRange,
  filterRows,
  parseDateRange,
  type FilterSpec,
} from './filters.js';

/** Raw selections as they arrive from the caller; anything left out takes its default. */
export type SettingsInput = {
  dateColumn?: string;
  amountColumn?: string;
  categoryColumn?: string;
  dateRange?: string[];
  categories?: string[];
};

export type DashboardSettings = Readonly<{
  mapping: Readonly<ColumnMapping>;
  filter: Readonly<FilterSpec>;
  availableCategories: readonly string[];
}>;

export type DashboardOptions = {
  previewRows: number;
  currencySymbol: string;
  today?: Date;
};

export type ResolvedPass = {
  settings: DashboardSettings;
  rows: NormalizedRow[];
};

export function resolveSettings(
  table: Table,
  input: SettingsInput,
  today: Date = new Date()
): ResolvedPass {
  const suggested = suggestMapping(table.columns);
  const mapping: ColumnMapping = Object.freeze({
    dateColumn: input.dateColumn ?? suggested.dateColumn,
    amountColumn: input.amountColumn ?? suggested.amountColumn,
    categoryColumn: input.categoryColumn ?? suggested.categoryColumn,
  });

  const rows = normalize(table, mapping);
  const dateRange =
    input.dateRange === undefined ? defaultDateRange(rows, today) : parseDateRange(input.dateRange);
  const available = availableCategories(rows);
  const categories = new Set(input.categories ?? available);

  const settings: DashboardSettings = Object.freeze({
    mapping,
    filter: Object.freeze({ dateRange: Object.freeze(dateRange), categories }),
    availableCategories: Object.freeze(available),
  });
  return { settings, rows };
}

export function toSelection(settings: DashboardSettings): DashboardSelection {
  return {
    mapping: { ...settings.mapping },
    dateRange: { ...settings.filter.dateRange },
    availableCategories: [...settings.availableCategories],
    categories: Array.from(settings.filter.categories),
  };
}

/**
 * One full pass: map columns, filter, aggregate. Fatal input problems throw a
 * PipelineError before anything is computed; an empty filter result comes
 * back as status 'empty'.
 */
export function buildDashboard(
  table: Table,
  input: SettingsInput,
  options: DashboardOptions
): DashboardResponse {
  const { settings, rows } = resolveSettings(table, input, options.today);
  const selection = toSelection(settings);
  const preview = previewRows(table, options.previewRows);
  const filtered = filterRows(rows, settings.filter);

  if (!filtered.length) {
    return {
      status: 'empty',
      warning: new EmptyFilterResultWarning().message,
      selection,
      preview,
    };
  }

  const kpis = summarize(filtered);
  return {
    status: 'ok',
    selection,
    preview,
    kpis,
    display: formatKpis(kpis, options.currencySymbol),
    byCategory: totalsByCategory(filtered),
    byMonth: totalsByMonth(filtered),
    rows: filtered.map(exportRecord),
  };
}

export function buildExport(table: Table, input: SettingsInput, today?: Date): Buffer {
  const { settings, rows } = resolveSettings(table, input, today);
  const filtered = filterRows(rows, settings.filter);
  if (!filtered.length) throw new EmptyFilterResultWarning();
  return exportCsv(table, filtered);
}
