import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ErrorResponse, TimeseriesQuerystring, TimeseriesResponse } from '../types/index.js';
import { openApiSpec } from '../config/openapi.js';
import { CACHE_KEY_PREFIX, COMMON_CURRENCIES } from '../config/constants.js';
import { FxExportError } from '../errors.js';
import CacheService from '../services/cache.service.js';
import ExchangeRateService from '../services/exchangerate.service.js';
import TimeseriesService, { type TimeseriesResult, parseTimeseriesQuery } from '../services/timeseries.service.js';
import { hasAnyRate, summarizeRateTable } from '../services/seriesTable.service.js';
import { XLSX_MIME_TYPE, buildWorkbook, exportFileName, renderWorkbook } from '../services/workbook.service.js';
import { renderQueryForm } from '../views/queryForm.js';

export interface RouteServices {
  cacheService: CacheService;
  exchangeRateService: ExchangeRateService;
  timeseriesService: TimeseriesService;
}

function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  // Network failures are not classified, they are reported as a bad gateway
  const statusCode = error instanceof FxExportError ? error.statusCode : 502;
  const message = error instanceof Error ? error.message : 'Unknown error';
  const payload: ErrorResponse = { status: 'error', message };
  return reply.code(statusCode).send(payload);
}

// Rows that are all missing usually mean the provider does not know the base
function findNoDataMessage({ meta, table }: TimeseriesResult): string | null {
  if (table.rows.length === 0) {
    return 'No data returned for this period. Try a different period or currencies.';
  }
  if (!hasAnyRate(table)) {
    return `No rates returned for base ${meta.base} (${meta.targets.join(', ')}). Try a different base or currencies.`;
  }
  return null;
}

function sendNoData(reply: FastifyReply, message: string): FastifyReply {
  const payload: ErrorResponse = { status: 'error', message };
  return reply.code(404).send(payload);
}

export function setupRoutes(fastify: FastifyInstance, services: RouteServices) {
  const { cacheService, exchangeRateService, timeseriesService } = services;

  async function runQuery(query: TimeseriesQuerystring): Promise<TimeseriesResult> {
    return timeseriesService.getTimeseries(parseTimeseriesQuery(query));
  }

  fastify.get('/', async (request, reply) => {
    reply.type('text/html');
    return renderQueryForm();
  });

  // API info endpoint
  fastify.get('/api', async () => ({
    service: 'FX Timeseries Exporter API',
    version: '1.0.0',
    endpoints: {
      health: 'GET /api/health',
      currencies: 'GET /api/fx/currencies',
      timeseries: 'GET /api/fx/timeseries?base=GBP&targets=EUR,USD&mode=custom&start=2024-01-01&end=2024-01-31',
      export: 'GET /api/fx/timeseries/export?base=GBP&targets=EUR,USD&mode=last_month',
      openapi: 'GET /api/openapi.json'
    }
  }));

  fastify.get('/api/openapi.json', async () => openApiSpec);

  fastify.get('/api/health', async () => {
    let cacheStatus = 'disconnected';
    let cachedKeys = 0;

    try {
      await cacheService.ping();
      cacheStatus = 'connected';
      const keys = await cacheService.keys(`${CACHE_KEY_PREFIX}*`);
      cachedKeys = keys.length;
    } catch (err) {
      fastify.log.error({ err }, 'Cache health check failed');
    }

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      apiKeyConfigured: exchangeRateService.hasAccessKey(),
      cache: {
        backend: cacheService.getBackend(),
        status: cacheStatus,
        cachedKeys
      }
    };
  });

  fastify.get('/api/fx/currencies', async () => {
    const currencies = [...COMMON_CURRENCIES].sort();
    return {
      status: 'success',
      currencies,
      count: currencies.length
    };
  });

  fastify.get<{ Querystring: TimeseriesQuerystring }>('/api/fx/timeseries', async (request, reply) => {
    try {
      const result = await runQuery(request.query);
      const noData = findNoDataMessage(result);
      if (noData) {
        return sendNoData(reply, noData);
      }

      const { meta, table, cached } = result;
      const payload: TimeseriesResponse = {
        status: 'success',
        meta,
        currencies: table.currencies,
        rows: table.rows,
        stats: summarizeRateTable(table),
        cached
      };
      return payload;
    } catch (error) {
      fastify.log.error({ err: error }, 'Error in /api/fx/timeseries');
      return sendError(reply, error);
    }
  });

  fastify.get<{ Querystring: TimeseriesQuerystring }>('/api/fx/timeseries/export', async (request, reply) => {
    try {
      const result = await runQuery(request.query);
      const noData = findNoDataMessage(result);
      if (noData) {
        return sendNoData(reply, noData);
      }

      const { meta, table } = result;
      const file = await renderWorkbook(buildWorkbook(table, meta));
      return reply
        .type(XLSX_MIME_TYPE)
        .header('Content-Disposition', `attachment; filename="${exportFileName(meta)}"`)
        .send(file);
    } catch (error) {
      fastify.log.error({ err: error }, 'Error in /api/fx/timeseries/export');
      return sendError(reply, error);
    }
  });

  fastify.setNotFoundHandler((request, reply) => {
    const payload: ErrorResponse = { status: 'error', message: 'Not found' };
    return reply.code(404).send(payload);
  });
}
