import type { FastifyBaseLogger } from 'fastify';
import type { TimeframeQuery, TimeframeResult } from '../types/index.js';
import {
  EXCHANGERATE_API_BASE,
  EXCHANGERATE_API_KEY,
  MAX_THROTTLE_SECONDS,
  TIMEFRAME_ENDPOINT
} from '../config/constants.js';
import { ConfigurationError, UpstreamApiError } from '../errors.js';
import CacheService from './cache.service.js';
import { isPlainObject } from './seriesTable.service.js';
import { readTimeframePayload } from './timeframe.parser.js';

export interface ExchangeRateOptions {
  apiBase?: string;
  accessKey?: string;
}

interface CachedTimeframe {
  payload: unknown;
  fetchedAt: string;
}

function isCachedTimeframe(value: unknown): value is CachedTimeframe {
  return isPlainObject(value) && 'payload' in value && typeof value.fetchedAt === 'string';
}

class ExchangeRateService {
  private logger: FastifyBaseLogger;
  private cacheService: CacheService;
  private apiBase: string;
  private accessKey: string;

  constructor(logger: FastifyBaseLogger, cacheService: CacheService, options: ExchangeRateOptions = {}) {
    this.logger = logger;
    this.cacheService = cacheService;
    this.apiBase = options.apiBase ?? EXCHANGERATE_API_BASE;
    this.accessKey = options.accessKey ?? EXCHANGERATE_API_KEY;
  }

  hasAccessKey(): boolean {
    return this.accessKey.length > 0;
  }

  // The base is requested too so every day can be converted locally
  buildTimeframeUrl(query: TimeframeQuery): string {
    const currencies = [...new Set([...query.targets, query.base])].sort();
    const params = new URLSearchParams({
      access_key: this.accessKey,
      start_date: query.range.start,
      end_date: query.range.end,
      currencies: currencies.join(','),
      format: '1'
    });
    return `${this.apiBase}${TIMEFRAME_ENDPOINT}?${params.toString()}`;
  }

  /**
   * One GET to /timeframe, cached for the configured TTL. No retry: a network
   * failure propagates as is, a non-2xx answer or error envelope becomes
   * UpstreamApiError and an unreadable body MalformedSeriesError.
   */
  async fetchTimeframe(query: TimeframeQuery): Promise<TimeframeResult> {
    const cacheKey = this.cacheService.getTimeframeKey(query.base, query.targets, query.range);
    const cached = await this.cacheService.get(cacheKey);

    if (isCachedTimeframe(cached)) {
      return { payload: cached.payload, fetchedAt: cached.fetchedAt, cached: true };
    }

    if (!this.hasAccessKey()) {
      throw new ConfigurationError('EXCHANGERATE_API_KEY is not configured');
    }

    const pauseSeconds = Math.min(Math.max(query.pauseSeconds ?? 0, 0), MAX_THROTTLE_SECONDS);
    if (pauseSeconds > 0) {
      await new Promise(r => setTimeout(r, pauseSeconds * 1000));
    }

    const url = this.buildTimeframeUrl(query);
    const logUrl = url.replace(/access_key=[^&]*/, 'access_key=***');
    this.logger.info(`Fetching from exchangerate.host: ${logUrl}`);

    const response = await fetch(url, {
      headers: { 'Accept': 'application/json' },
      signal: AbortSignal.timeout(30_000)
    });

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.error(`exchangerate.host error ${response.status}: ${errorText}`);
      throw new UpstreamApiError(`exchangerate.host error: ${response.status}`, {
        upstreamStatus: response.status,
        requestUrl: logUrl
      });
    }

    const payload: unknown = await response.json();
    const result: CachedTimeframe = { payload, fetchedAt: new Date().toISOString() };

    // error envelopes and unreadable bodies arrive with a 200 and must not be cached
    readTimeframePayload(payload);
    await this.cacheService.set(cacheKey, result);
    return { ...result, cached: false };
  }
}

export default ExchangeRateService;
