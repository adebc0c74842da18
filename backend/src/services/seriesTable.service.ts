import type { CurrencyCode, RateRow, RateStats, RateTable, RawSeries } from '../types/index.js';
import { MalformedSeriesError } from '../errors.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertRawSeries(series: unknown): asserts series is RawSeries {
  if (!isPlainObject(series)) {
    throw new MalformedSeriesError('Time series must be a mapping of dates to rates');
  }

  for (const [date, rates] of Object.entries(series)) {
    if (!isPlainObject(rates)) {
      throw new MalformedSeriesError(`Rates for ${date} must be a mapping of currencies to numbers`);
    }
    for (const [currency, rate] of Object.entries(rates)) {
      if (typeof rate !== 'number' || !Number.isFinite(rate)) {
        throw new MalformedSeriesError(`Rate for ${currency} on ${date} is not a number`);
      }
    }
  }
}

/**
 * One row per date of the series, ascending; columns follow `targets` order.
 * A currency the series lacks on a given date is stored as null, never 0.
 */
export function buildRateTable(series: unknown, targets: CurrencyCode[]): RateTable {
  assertRawSeries(series);

  // ISO dates sort chronologically as plain strings
  const dates = Object.keys(series).sort();

  const rows: RateRow[] = dates.map(date => {
    const day = series[date];
    const rates: Record<CurrencyCode, number | null> = {};
    for (const currency of targets) {
      rates[currency] = Object.prototype.hasOwnProperty.call(day, currency) ? day[currency] : null;
    }
    return { date, rates };
  });

  return { currencies: [...targets], rows };
}

export function hasAnyRate(table: RateTable): boolean {
  return table.rows.some(row => table.currencies.some(currency => row.rates[currency] !== null));
}

export function summarizeRateTable(table: RateTable): RateStats[] {
  return table.currencies.map(currency => {
    const values = table.rows
      .map(row => row.rates[currency])
      .filter((rate): rate is number => rate !== null);

    if (values.length === 0) {
      return { currency, min: null, max: null, mean: null, observations: 0 };
    }

    const sum = values.reduce((acc, rate) => acc + rate, 0);
    return {
      currency,
      min: Math.min(...values),
      max: Math.max(...values),
      mean: sum / values.length,
      observations: values.length
    };
  });
}
