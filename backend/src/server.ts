import { buildApp } from './app.js';
import { CACHE_TTL_SECONDS, EXCHANGERATE_API_KEY } from './config/constants.js';

const fastify = await buildApp();

const start = async () => {
  try {
    const port = parseInt(process.env.PORT || '8000', 10);
    const host = process.env.HOST || '0.0.0.0';

    await fastify.listen({ port, host });
    fastify.log.info(`Cache TTL: ${CACHE_TTL_SECONDS}s (${CACHE_TTL_SECONDS / 3600} h)`);
    if (!EXCHANGERATE_API_KEY) {
      fastify.log.warn('EXCHANGERATE_API_KEY is not set - uncached queries will fail');
    }
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
