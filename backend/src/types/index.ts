// Type definitions
export type CurrencyCode = string;

// ISO YYYY-MM-DD, no time component
export type CalendarDate = string;

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

export type RangeMode = 'this_month' | 'last_month' | 'custom';

export type RangeSelection =
  | { mode: 'this_month' }
  | { mode: 'last_month' }
  | { mode: 'custom'; start: CalendarDate; end: CalendarDate };

export type RawSeries = Record<CalendarDate, Record<CurrencyCode, number>>;

export interface RateRow {
  date: CalendarDate;
  // null marks a rate the provider did not return for that day
  rates: Record<CurrencyCode, number | null>;
}

export interface RateTable {
  currencies: CurrencyCode[];
  rows: RateRow[];
}

export interface RateStats {
  currency: CurrencyCode;
  min: number | null;
  max: number | null;
  mean: number | null;
  observations: number;
}

export interface QueryMeta {
  base: CurrencyCode;
  targets: CurrencyCode[];
  range: DateRange;
  fetchedAt: string;
  source: string;
  endpoint: string;
}

export interface TimeframeQuery {
  base: CurrencyCode;
  targets: CurrencyCode[];
  range: DateRange;
  pauseSeconds?: number;
}

export interface TimeframeResult {
  payload: unknown;
  fetchedAt: string;
  cached: boolean;
}

export interface TimeseriesResponse {
  status: 'success';
  meta: QueryMeta;
  currencies: CurrencyCode[];
  rows: RateRow[];
  stats: RateStats[];
  cached: boolean;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
}

export interface TimeseriesQuerystring {
  base?: string;
  targets?: string | string[];
  mode?: string;
  start?: string;
  end?: string;
  throttle?: string;
}
