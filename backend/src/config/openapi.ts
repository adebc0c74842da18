const timeseriesParameters = [
  {
    name: 'base',
    in: 'query',
    description: 'Base currency, every rate is expressed per unit of it (default GBP)',
    schema: { type: 'string', example: 'GBP' }
  },
  {
    name: 'targets',
    in: 'query',
    required: true,
    description: 'Target currencies, comma separated or repeated. Column order follows this list.',
    schema: { type: 'string', example: 'EUR,USD,CHF' }
  },
  {
    name: 'mode',
    in: 'query',
    description: 'Period selection',
    schema: { type: 'string', enum: ['this_month', 'last_month', 'custom'], default: 'last_month' }
  },
  {
    name: 'start',
    in: 'query',
    description: 'First day (YYYY-MM-DD), custom mode only',
    schema: { type: 'string', format: 'date' }
  },
  {
    name: 'end',
    in: 'query',
    description: 'Last day (YYYY-MM-DD), custom mode only',
    schema: { type: 'string', format: 'date' }
  },
  {
    name: 'throttle',
    in: 'query',
    description: 'Pause in seconds before calling the provider (0 to 2)',
    schema: { type: 'number', minimum: 0, maximum: 2, default: 0 }
  }
];

const errorResponse = {
  description: 'Error',
  content: {
    'application/json': {
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'error' },
          message: { type: 'string' }
        }
      }
    }
  }
};

export const openApiSpec = {
  openapi: '3.1.0',
  info: {
    title: 'FX Timeseries Exporter API',
    version: '1.0.0',
    description: `Historical FX rates from exchangerate.host (/timeframe), reshaped into one row per date and one column per currency.

**Characteristics:**
- Cache: 24 hours (Redis when REDIS_URL is set, in memory otherwise)
- A rate the provider did not return is \`null\`, never 0
- Export: .xlsx with a Rates sheet and a Meta sheet`
  },
  servers: [
    {
      url: 'http://localhost:8000',
      description: 'Development server'
    }
  ],
  paths: {
    '/api/health': {
      get: {
        summary: 'Health check',
        tags: ['System'],
        responses: {
          '200': {
            description: 'API is healthy',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'ok' },
                    timestamp: { type: 'string', format: 'date-time' },
                    apiKeyConfigured: { type: 'boolean' },
                    cache: {
                      type: 'object',
                      properties: {
                        backend: { type: 'string', enum: ['redis', 'memory'] },
                        status: { type: 'string', example: 'connected' },
                        cachedKeys: { type: 'number', example: 2 }
                      }
                    }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/fx/currencies': {
      get: {
        summary: 'Selectable currencies',
        tags: ['FX'],
        responses: {
          '200': {
            description: 'Currency codes',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    currencies: { type: 'array', items: { type: 'string' } },
                    count: { type: 'number' }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/fx/timeseries': {
      get: {
        summary: 'Rate table preview',
        tags: ['FX'],
        parameters: timeseriesParameters,
        responses: {
          '200': {
            description: 'Rate table, query metadata and min/max/mean per currency',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    meta: { type: 'object' },
                    currencies: { type: 'array', items: { type: 'string' } },
                    rows: {
                      type: 'array',
                      items: {
                        type: 'object',
                        properties: {
                          date: { type: 'string', format: 'date' },
                          rates: {
                            type: 'object',
                            additionalProperties: { type: ['number', 'null'] }
                          }
                        }
                      }
                    },
                    stats: { type: 'array', items: { type: 'object' } },
                    cached: { type: 'boolean' }
                  }
                }
              }
            }
          },
          '400': errorResponse,
          '404': errorResponse,
          '502': errorResponse
        }
      }
    },
    '/api/fx/timeseries/export': {
      get: {
        summary: 'Rate table as .xlsx',
        tags: ['FX'],
        parameters: timeseriesParameters,
        responses: {
          '200': {
            description: 'Workbook with Rates and Meta sheets',
            content: {
              'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': {
                schema: { type: 'string', format: 'binary' }
              }
            }
          },
          '400': errorResponse,
          '404': errorResponse,
          '502': errorResponse
        }
      }
    }
  }
};
