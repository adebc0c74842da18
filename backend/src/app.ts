import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import CacheService, { type CacheOptions } from './services/cache.service.js';
import ExchangeRateService, { type ExchangeRateOptions } from './services/exchangerate.service.js';
import TimeseriesService from './services/timeseries.service.js';
import { setupRoutes } from './routes/index.js';

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
  cache?: CacheOptions;
  exchangeRate?: ExchangeRateOptions;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true
  });

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS']
  });

  // Services share the Fastify logger
  const cacheService = new CacheService(fastify.log, options.cache);
  const exchangeRateService = new ExchangeRateService(fastify.log, cacheService, options.exchangeRate);
  const timeseriesService = new TimeseriesService(fastify.log, exchangeRateService);

  fastify.addHook('onClose', async () => {
    await cacheService.close();
  });

  setupRoutes(fastify, { cacheService, exchangeRateService, timeseriesService });
  return fastify;
}
