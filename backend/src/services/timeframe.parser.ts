import type { CurrencyCode, RawSeries } from '../types/index.js';
import { MalformedSeriesError, UpstreamApiError } from '../errors.js';
import { isPlainObject } from './seriesTable.service.js';

const DEFAULT_PROVIDER_SOURCE = 'USD';

function readDayBlock(date: string, block: unknown, quoted: boolean): Record<CurrencyCode, number> {
  if (!isPlainObject(block)) {
    throw new MalformedSeriesError(`Rates for ${date} must be a mapping of currencies to numbers`);
  }

  const rates: Record<CurrencyCode, number> = {};
  for (const [key, value] of Object.entries(block)) {
    const rate = typeof value === 'string' ? parseFloat(value) : value;
    if (typeof rate !== 'number' || !Number.isFinite(rate)) {
      throw new MalformedSeriesError(`Rate for ${key} on ${date} is not a number`);
    }
    // quotes are keyed by pair, e.g. USDEUR
    rates[quoted ? key.slice(-3) : key] = rate;
  }
  return rates;
}

// r[c] / r[base] for every currency of the day, the provider source becomes 1 / r[base]
function convertToBase(
  rates: Record<CurrencyCode, number>,
  base: CurrencyCode,
  providerSource: CurrencyCode
): Record<CurrencyCode, number> {
  const baseRate = base === providerSource ? 1 : rates[base];
  if (baseRate === undefined || baseRate === 0) {
    return {};
  }

  const converted: Record<CurrencyCode, number> = {};
  for (const [currency, rate] of Object.entries(rates)) {
    converted[currency] = rate / baseRate;
  }
  converted[base] = 1;
  if (!(providerSource in converted)) {
    converted[providerSource] = 1 / baseRate;
  }
  return converted;
}

export interface TimeframeDays {
  days: Record<string, Record<CurrencyCode, number>>;
  providerSource: CurrencyCode;
}

/**
 * Checks an exchangerate.host /timeframe payload and reads its days, pair keys
 * (USDEUR) reduced to currency codes. Throws on the error envelope or on any
 * shape it cannot read, so a payload that passes here converts without error.
 */
export function readTimeframePayload(payload: unknown): TimeframeDays {
  if (!isPlainObject(payload)) {
    throw new MalformedSeriesError('Unexpected API response: body is not a JSON object');
  }

  if (payload.success === false) {
    const info = isPlainObject(payload.error) && typeof payload.error.info === 'string'
      ? payload.error.info
      : 'unknown error';
    throw new UpstreamApiError(`API error: ${info}`);
  }

  const quoted = payload.quotes !== undefined && payload.quotes !== null;
  const container = quoted ? payload.quotes : payload.rates;
  if (!isPlainObject(container)) {
    throw new MalformedSeriesError("Unexpected API response: missing 'rates'/'quotes'.");
  }

  const providerSource = typeof payload.source === 'string'
    ? payload.source
    : typeof payload.base === 'string' ? payload.base : DEFAULT_PROVIDER_SOURCE;

  const days: Record<string, Record<CurrencyCode, number>> = {};
  for (const [date, block] of Object.entries(container)) {
    days[date] = readDayBlock(date, block, quoted);
  }
  return { days, providerSource };
}

// Every day re-expressed in `base` terms; a day lacking the base rate is kept with no rates
export function toRawSeries(payload: unknown, base: CurrencyCode): RawSeries {
  const { days, providerSource } = readTimeframePayload(payload);

  const series: RawSeries = {};
  for (const [date, rates] of Object.entries(days)) {
    series[date] = convertToBase(rates, base, providerSource);
  }
  return series;
}
