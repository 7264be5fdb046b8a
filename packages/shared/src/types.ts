export type CellValue<T> = { kind: 'valid'; value: T } | { kind: 'invalid'; raw: string };

export type ColumnMapping = {
  dateColumn: string;
  amountColumn: string;
  categoryColumn: string; // '(none)' disables the category column
};

export type DateRange = {
  start: string; // 'YYYY-MM-DD', inclusive
  end: string; // 'YYYY-MM-DD', inclusive
};

export type KpiSet = {
  total: number;
  average: number | null; // null when no row has a valid amount
  maximum: number | null;
  count: number;
};

export type FormattedKpis = {
  total: string;
  average: string;
  maximum: string;
  count: string;
};

export type CategoryTotal = { category: string; total: number };

export type MonthTotal = { month: string; total: number }; // month: 'YYYY-MM'

export type PreviewRow = Record<string, string>;

export type DashboardSelection = {
  mapping: ColumnMapping;
  dateRange: DateRange;
  availableCategories: string[];
  categories: string[];
};

export type DashboardOk = {
  status: 'ok';
  selection: DashboardSelection;
  preview: PreviewRow[];
  kpis: KpiSet;
  display: FormattedKpis;
  byCategory: CategoryTotal[];
  byMonth: MonthTotal[];
  rows: PreviewRow[];
};

export type DashboardEmpty = {
  status: 'empty';
  warning: string;
  selection: DashboardSelection;
  preview: PreviewRow[];
};

export type DashboardResponse = DashboardOk | DashboardEmpty;

export type InspectResponse = {
  filename?: string;
  encoding: string;
  columns: string[];
  rowCount: number;
  preview: PreviewRow[];
  suggestedMapping: ColumnMapping;
};

export type ErrorResponse = { error: string; code?: string };
