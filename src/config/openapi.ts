import { DEFAULT_CURRENCIES, MAX_DAYS_OFFSET } from './constants.js';

const errorSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'error' },
    message: { type: 'string' },
    requestUrl: { type: 'string' },
    params: { type: 'object', additionalProperties: { type: 'string' } },
    upstreamStatus: { type: 'number' }
  }
};

export const openApiSpec = {
  openapi: '3.1.0',
  info: {
    title: 'PrivatBank Exchange History API',
    version: '1.0.0',
    description: `Buy/sell rates of the PrivatBank archive for the last 1 to ${MAX_DAYS_OFFSET} days.

${DEFAULT_CURRENCIES.join(' and ')} are always included; more currencies can be requested.
Days are fetched one by one and the first upstream failure fails the whole request.`
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
                    timestamp: { type: 'string', format: 'date-time' }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/exchange-rates': {
      get: {
        summary: 'Rates for the last N days',
        tags: ['Exchange Rates'],
        parameters: [
          {
            name: 'days',
            in: 'query',
            required: true,
            description: `Number of days back from today (1-${MAX_DAYS_OFFSET}); today is not included`,
            schema: { type: 'integer', minimum: 1, maximum: MAX_DAYS_OFFSET, example: 2 }
          },
          {
            name: 'currencies',
            in: 'query',
            required: false,
            description: 'Additional comma-separated currency codes',
            schema: { type: 'string', example: 'GBP,PLN' }
          }
        ],
        responses: {
          '200': {
            description: 'One entry per day, oldest first',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    days: { type: 'integer', example: 2 },
                    currencies: { type: 'array', items: { type: 'string' } },
                    source: { type: 'string' },
                    queriedAt: { type: 'string', format: 'date-time' },
                    data: {
                      type: 'array',
                      items: {
                        type: 'object',
                        additionalProperties: {
                          type: 'object',
                          additionalProperties: {
                            type: 'object',
                            properties: {
                              sale: { oneOf: [{ type: 'number' }, { type: 'string', enum: ['unknown'] }] },
                              purchase: { oneOf: [{ type: 'number' }, { type: 'string', enum: ['unknown'] }] }
                            }
                          }
                        }
                      },
                      example: [{ '01.01.2024': { USD: { sale: 38.2, purchase: 37.6 } } }]
                    }
                  }
                }
              }
            }
          },
          '400': {
            description: 'Invalid day offset',
            content: { 'application/json': { schema: errorSchema } }
          },
          '502': {
            description: 'Exchange API failed or was unreachable',
            content: { 'application/json': { schema: errorSchema } }
          }
        }
      }
    }
  }
};
