import type { FastifyBaseLogger } from 'fastify';
import type {
  CurrencyCode,
  QueryMeta,
  RangeSelection,
  RateTable,
  TimeseriesQuerystring
} from '../types/index.js';
import {
  DEFAULT_BASE,
  EXCHANGERATE_SOURCE,
  MAX_THROTTLE_SECONDS,
  TIMEFRAME_ENDPOINT
} from '../config/constants.js';
import { QueryValidationError } from '../errors.js';
import { isCalendarDate, resolveDateRange } from './dateRange.service.js';
import { buildRateTable } from './seriesTable.service.js';
import { toRawSeries } from './timeframe.parser.js';
import ExchangeRateService from './exchangerate.service.js';

const CURRENCY_CODE = /^[A-Z]{3}$/;

export interface TimeseriesRequest {
  base: CurrencyCode;
  targets: CurrencyCode[];
  selection: RangeSelection;
  pauseSeconds: number;
}

export interface TimeseriesResult {
  meta: QueryMeta;
  table: RateTable;
  cached: boolean;
}

function parseCurrency(value: string, field: string): CurrencyCode {
  const code = value.trim().toUpperCase();
  if (!CURRENCY_CODE.test(code)) {
    throw new QueryValidationError(`Invalid ${field} currency code: "${value}"`);
  }
  return code;
}

function parseSelection(query: TimeseriesQuerystring): RangeSelection {
  const mode = query.mode && query.mode.trim() !== '' ? query.mode.trim() : 'last_month';

  if (mode === 'this_month' || mode === 'last_month') {
    return { mode };
  }
  if (mode !== 'custom') {
    throw new QueryValidationError(`Unknown period "${mode}", expected this_month, last_month or custom`);
  }

  const { start, end } = query;
  if (!start || !isCalendarDate(start)) {
    throw new QueryValidationError('Custom period needs a start date as YYYY-MM-DD');
  }
  if (!end || !isCalendarDate(end)) {
    throw new QueryValidationError('Custom period needs an end date as YYYY-MM-DD');
  }
  return { mode, start, end };
}

function parseThrottle(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return 0;

  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0 || seconds > MAX_THROTTLE_SECONDS) {
    throw new QueryValidationError(`Throttle must be between 0 and ${MAX_THROTTLE_SECONDS} seconds`);
  }
  return seconds;
}

export function parseTimeseriesQuery(query: TimeseriesQuerystring): TimeseriesRequest {
  const base = parseCurrency(query.base && query.base.trim() !== '' ? query.base : DEFAULT_BASE, 'base');

  // Accept both ?targets=EUR,USD and repeated ?targets=EUR&targets=USD
  const rawTargets = Array.isArray(query.targets) ? query.targets : [query.targets ?? ''];
  const targets = [...new Set(
    rawTargets
      .flatMap(t => t.split(','))
      .filter(t => t.trim() !== '')
      .map(t => parseCurrency(t, 'target'))
  )];

  if (targets.length === 0) {
    throw new QueryValidationError('Choose at least one target currency.');
  }

  return {
    base,
    targets,
    selection: parseSelection(query),
    pauseSeconds: parseThrottle(query.throttle)
  };
}

class TimeseriesService {
  private logger: FastifyBaseLogger;
  private exchangeRateService: ExchangeRateService;

  constructor(logger: FastifyBaseLogger, exchangeRateService: ExchangeRateService) {
    this.logger = logger;
    this.exchangeRateService = exchangeRateService;
  }

  /**
   * Resolves the period, fetches it (or reuses the cached payload) and
   * reshapes it into one row per date and one column per target.
   * An invalid range throws before anything is fetched.
   */
  async getTimeseries(request: TimeseriesRequest, today: Date = new Date()): Promise<TimeseriesResult> {
    const range = resolveDateRange(request.selection, today);

    const timeframe = await this.exchangeRateService.fetchTimeframe({
      base: request.base,
      targets: request.targets,
      range,
      pauseSeconds: request.pauseSeconds
    });

    const series = toRawSeries(timeframe.payload, request.base);
    const table = buildRateTable(series, request.targets);
    this.logger.info(
      `Built rate table ${request.base} -> ${request.targets.join(',')}: ${table.rows.length} rows (${range.start} to ${range.end})`
    );

    return {
      meta: {
        base: request.base,
        targets: request.targets,
        range,
        fetchedAt: timeframe.fetchedAt,
        source: EXCHANGERATE_SOURCE,
        endpoint: TIMEFRAME_ENDPOINT
      },
      table,
      cached: timeframe.cached
    };
  }
}

export default TimeseriesService;
