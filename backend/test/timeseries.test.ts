import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import CacheService from '../src/services/cache.service.js';
import ExchangeRateService from '../src/services/exchangerate.service.js';
import TimeseriesService, { parseTimeseriesQuery } from '../src/services/timeseries.service.js';
import { InvalidRangeError, QueryValidationError } from '../src/errors.js';
import { mockFetchJson, requestedUrl, silentLogger } from './helpers.js';

describe('parseTimeseriesQuery', () => {
  it('normalises currencies and defaults the base and period', () => {
    expect(parseTimeseriesQuery({ targets: 'eur, usd' })).toEqual({
      base: 'GBP',
      targets: ['EUR', 'USD'],
      selection: { mode: 'last_month' },
      pauseSeconds: 0
    });
  });

  it('accepts repeated targets and drops duplicates', () => {
    const request = parseTimeseriesQuery({ base: 'chf', targets: ['EUR', 'USD', 'EUR'], mode: 'this_month' });

    expect(request.base).toBe('CHF');
    expect(request.targets).toEqual(['EUR', 'USD']);
    expect(request.selection).toEqual({ mode: 'this_month' });
  });

  it('reads a custom period and throttle', () => {
    const request = parseTimeseriesQuery({
      targets: 'EUR',
      mode: 'custom',
      start: '2024-03-01',
      end: '2024-03-10',
      throttle: '0.5'
    });

    expect(request.selection).toEqual({ mode: 'custom', start: '2024-03-01', end: '2024-03-10' });
    expect(request.pauseSeconds).toBe(0.5);
  });

  it('leaves start/end ordering to the resolver', () => {
    const request = parseTimeseriesQuery({ targets: 'EUR', mode: 'custom', start: '2024-03-10', end: '2024-03-01' });

    expect(request.selection).toEqual({ mode: 'custom', start: '2024-03-10', end: '2024-03-01' });
  });

  it.each([
    [{}, 'Choose at least one target currency.'],
    [{ targets: ' , ' }, 'Choose at least one target currency.'],
    [{ targets: 'EURO' }, 'Invalid target currency code: "EURO"'],
    [{ targets: 'EUR', base: 'G1P' }, 'Invalid base currency code: "G1P"'],
    [{ targets: 'EUR', mode: 'last_year' }, 'Unknown period "last_year", expected this_month, last_month or custom'],
    [{ targets: 'EUR', mode: 'custom', end: '2024-03-01' }, 'Custom period needs a start date as YYYY-MM-DD'],
    [{ targets: 'EUR', mode: 'custom', start: '2024-03-01', end: '2024-02-30' }, 'Custom period needs an end date as YYYY-MM-DD'],
    [{ targets: 'EUR', throttle: '3' }, 'Throttle must be between 0 and 2 seconds']
  ])('rejects %j', (query, message) => {
    expect(() => parseTimeseriesQuery(query)).toThrow(new QueryValidationError(message));
  });
});

describe('TimeseriesService', () => {
  let service: TimeseriesService;

  beforeEach(() => {
    const cache = new CacheService(silentLogger, { redisUrl: '' });
    const exchangeRate = new ExchangeRateService(silentLogger, cache, {
      apiBase: 'https://fx.test',
      accessKey: 'test-key'
    });
    service = new TimeseriesService(silentLogger, exchangeRate);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the table for last month in base terms', async () => {
    const fetchMock = mockFetchJson({
      success: true,
      source: 'USD',
      quotes: {
        '2024-01-03': { USDEUR: 0.5, USDGBP: 0.25 },
        '2024-01-02': { USDEUR: 1, USDGBP: 0.5, USDCHF: 0.25 }
      }
    });
    vi.stubGlobal('fetch', fetchMock);

    const result = await service.getTimeseries(
      { base: 'GBP', targets: ['CHF', 'EUR'], selection: { mode: 'last_month' }, pauseSeconds: 0 },
      new Date(2024, 1, 10)
    );

    expect(requestedUrl(fetchMock).searchParams.get('start_date')).toBe('2024-01-01');
    expect(requestedUrl(fetchMock).searchParams.get('end_date')).toBe('2024-01-31');
    expect(result.table).toEqual({
      currencies: ['CHF', 'EUR'],
      rows: [
        { date: '2024-01-02', rates: { CHF: 0.5, EUR: 2 } },
        { date: '2024-01-03', rates: { CHF: null, EUR: 2 } }
      ]
    });
    expect(result.meta).toMatchObject({
      base: 'GBP',
      targets: ['CHF', 'EUR'],
      range: { start: '2024-01-01', end: '2024-01-31' },
      source: 'exchangerate.host',
      endpoint: '/timeframe'
    });
    expect(result.cached).toBe(false);
  });

  it('does not fetch when the custom range is inverted', async () => {
    const fetchMock = mockFetchJson({ success: true, rates: {} });
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      service.getTimeseries({
        base: 'GBP',
        targets: ['EUR'],
        selection: { mode: 'custom', start: '2024-03-10', end: '2024-03-01' },
        pauseSeconds: 0
      })
    ).rejects.toThrow(InvalidRangeError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
