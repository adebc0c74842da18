import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import CacheService from '../src/services/cache.service.js';
import ExchangeRateService from '../src/services/exchangerate.service.js';
import { ConfigurationError, MalformedSeriesError, UpstreamApiError } from '../src/errors.js';
import type { TimeframeQuery } from '../src/types/index.js';
import { jsonResponse, mockFetchJson, requestedUrl, silentLogger } from './helpers.js';

const query: TimeframeQuery = {
  base: 'GBP',
  targets: ['USD', 'EUR'],
  range: { start: '2024-01-01', end: '2024-01-31' }
};

const payload = {
  success: true,
  source: 'USD',
  quotes: { '2024-01-01': { USDEUR: 0.5, USDGBP: 0.25 } }
};

describe('ExchangeRateService', () => {
  let cache: CacheService;
  let service: ExchangeRateService;

  beforeEach(() => {
    cache = new CacheService(silentLogger, { redisUrl: '' });
    service = new ExchangeRateService(silentLogger, cache, {
      apiBase: 'https://fx.test',
      accessKey: 'test-key'
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests the timeframe with the base added to the currencies', async () => {
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);

    const result = await service.fetchTimeframe(query);

    const url = requestedUrl(fetchMock);
    expect(url.origin + url.pathname).toBe('https://fx.test/timeframe');
    expect(url.searchParams.get('access_key')).toBe('test-key');
    expect(url.searchParams.get('start_date')).toBe('2024-01-01');
    expect(url.searchParams.get('end_date')).toBe('2024-01-31');
    expect(url.searchParams.get('currencies')).toBe('EUR,GBP,USD');
    expect(result.payload).toEqual(payload);
    expect(result.cached).toBe(false);
  });

  it('serves a repeated query from the cache', async () => {
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);

    const first = await service.fetchTimeframe(query);
    const second = await service.fetchTimeframe({ ...query, targets: ['EUR', 'USD'] });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(second.cached).toBe(true);
    expect(second.payload).toEqual(payload);
    expect(second.fetchedAt).toBe(first.fetchedAt);
  });

  it('fetches again for a different range', async () => {
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);

    await service.fetchTimeframe(query);
    await service.fetchTimeframe({ ...query, range: { start: '2024-02-01', end: '2024-02-29' } });

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports a non-2xx answer as UpstreamApiError and caches nothing', async () => {
    const fetchMock = mockFetchJson({ message: 'down' }, 503);
    vi.stubGlobal('fetch', fetchMock);

    await expect(service.fetchTimeframe(query)).rejects.toThrow(UpstreamApiError);
    await expect(service.fetchTimeframe(query)).rejects.toThrow('exchangerate.host error: 503');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects an error envelope and does not cache it', async () => {
    const fetchMock = mockFetchJson({ success: false, error: { info: 'quota reached' } });
    vi.stubGlobal('fetch', fetchMock);

    await expect(service.fetchTimeframe(query)).rejects.toThrow(new UpstreamApiError('API error: quota reached'));
    await expect(service.fetchTimeframe(query)).rejects.toThrow(UpstreamApiError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not cache a body it cannot read, so the next request fetches again', async () => {
    const fetchMock = vi.fn()
      .mockResolvedValueOnce(jsonResponse({ success: true }))
      .mockResolvedValueOnce(jsonResponse(payload));
    vi.stubGlobal('fetch', fetchMock);

    await expect(service.fetchTimeframe(query)).rejects.toThrow(
      new MalformedSeriesError("Unexpected API response: missing 'rates'/'quotes'.")
    );
    const retried = await service.fetchTimeframe(query);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(retried.payload).toEqual(payload);
    expect(retried.cached).toBe(false);
  });

  it('refetches once the cached entry is older than 24 hours', async () => {
    let now = 1_700_000_000_000;
    const clockedCache = new CacheService(silentLogger, { redisUrl: '', ttlSeconds: 24 * 60 * 60, now: () => now });
    const clocked = new ExchangeRateService(silentLogger, clockedCache, {
      apiBase: 'https://fx.test',
      accessKey: 'test-key'
    });
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);

    await clocked.fetchTimeframe(query);
    now += 24 * 60 * 60 * 1000 - 1;
    const fresh = await clocked.fetchTimeframe(query);
    now += 1;
    const refetched = await clocked.fetchTimeframe(query);

    expect(fresh.cached).toBe(true);
    expect(refetched.cached).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('lets network failures through unchanged', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(service.fetchTimeframe(query)).rejects.toThrow(new TypeError('fetch failed'));
  });

  it('refuses to call the provider without an access key', async () => {
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);
    const keyless = new ExchangeRateService(silentLogger, cache, { apiBase: 'https://fx.test', accessKey: '' });

    await expect(keyless.fetchTimeframe(query)).rejects.toThrow(ConfigurationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('waits for the throttle before fetching', async () => {
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);

    const startedAt = Date.now();
    await service.fetchTimeframe({ ...query, pauseSeconds: 0.05 });

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(45);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('skips the throttle when the query is cached', async () => {
    const fetchMock = mockFetchJson(payload);
    vi.stubGlobal('fetch', fetchMock);
    await service.fetchTimeframe(query);

    const startedAt = Date.now();
    const result = await service.fetchTimeframe({ ...query, pauseSeconds: 2 });

    expect(result.cached).toBe(true);
    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
