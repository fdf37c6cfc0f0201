import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import PrivatBankService from './services/privatbank.service.js';
import ExchangeHistoryService from './services/exchangeHistory.service.js';
import { setupRoutes } from './routes/index.js';
import { EXCHANGE_API_URL, LOG_LEVEL, REQUEST_TIMEOUT_MS } from './config/constants.js';

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
  apiUrl?: string;
  fetchFn?: typeof fetch;
  now?: () => Date;
}

export async function buildApp(options: AppOptions = {}) {
  const fastify = Fastify({
    logger: options.logger ?? { level: LOG_LEVEL || 'info' }
  });

  // CORS configuration
  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS']
  });

  // Initialize services
  const bankService = new PrivatBankService(fastify.log, {
    apiUrl: options.apiUrl ?? EXCHANGE_API_URL,
    timeoutMs: REQUEST_TIMEOUT_MS,
    fetchFn: options.fetchFn
  });
  const historyService = new ExchangeHistoryService(fastify.log, bankService, { now: options.now });

  setupRoutes(fastify, historyService);

  return fastify;
}
