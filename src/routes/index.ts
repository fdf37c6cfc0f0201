import type { FastifyInstance } from 'fastify';
import type { ExchangeRatesQuerystring } from '../types/index.js';
import { exchangeRatesQuerySchema } from '../types/schemas.js';
import { openApiSpec } from '../config/openapi.js';
import { MAX_DAYS_OFFSET } from '../config/constants.js';
import { InvalidOffsetError, InvalidResponseError, RequestFailedError, isRemoteRequestError } from '../errors.js';
import type { RemoteRequestError } from '../errors.js';
import { activeCurrencies, parseCurrencyList } from '../utils/rates.js';
import type ExchangeHistoryService from '../services/exchangeHistory.service.js';

interface ErrorPayload {
  status: 'error';
  message: string;
  requestUrl?: string;
  params?: Record<string, string>;
  upstreamStatus?: number;
}

export function setupRoutes(fastify: FastifyInstance, historyService: ExchangeHistoryService) {
  // API info endpoint
  fastify.get('/api', async () => ({
    service: 'PrivatBank Exchange History API',
    version: '1.0.0',
    endpoints: {
      health: 'GET /api/health',
      rates: 'GET /api/exchange-rates?days=2&currencies=GBP,PLN',
      openapi: 'GET /api/openapi.json'
    }
  }));

  // OpenAPI JSON endpoint
  fastify.get('/api/openapi.json', async () => openApiSpec);

  // Health check endpoint
  fastify.get('/api/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString()
  }));

  // Exchange rates for the last N days
  fastify.get<{ Querystring: ExchangeRatesQuerystring }>('/api/exchange-rates', async (request, reply) => {
    const query = exchangeRatesQuerySchema.safeParse(request.query);
    if (!query.success) {
      const payload: ErrorPayload = {
        status: 'error',
        message: `Query parameter "days" is required and must be a number from 1 to ${MAX_DAYS_OFFSET}`
      };
      return reply.code(400).send(payload);
    }

    const { days, currencies } = query.data;
    const currencyList = parseCurrencyList(currencies);

    try {
      const data = await historyService.getRatesForPeriod(days, currencyList);
      return {
        status: 'success',
        days,
        currencies: activeCurrencies(currencyList),
        source: 'PrivatBank exchange rates archive',
        queriedAt: new Date().toISOString(),
        data
      };
    } catch (error) {
      if (error instanceof InvalidOffsetError) {
        const payload: ErrorPayload = { status: 'error', message: error.message };
        return reply.code(400).send(payload);
      }

      if (isRemoteRequestError(error)) {
        fastify.log.error({ err: error }, 'Error in /api/exchange-rates');
        return reply.code(502).send(remoteErrorPayload(error));
      }

      throw error;
    }
  });
}

function remoteErrorPayload(error: RemoteRequestError): ErrorPayload {
  const payload: ErrorPayload = {
    status: 'error',
    message: error.message,
    requestUrl: error.url
  };
  if (error instanceof RequestFailedError) {
    payload.params = error.params;
    payload.upstreamStatus = error.status;
  } else if (error instanceof InvalidResponseError) {
    payload.params = error.params;
  }
  return payload;
}
