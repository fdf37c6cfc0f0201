import { buildApp } from './app.js';
import { EXCHANGE_API_URL, HOST, PORT, REQUEST_TIMEOUT_MS } from './config/constants.js';

const fastify = await buildApp();

try {
  await fastify.listen({ port: PORT, host: HOST });
  fastify.log.info(`Exchange API: ${EXCHANGE_API_URL}`);
  fastify.log.info(`Request timeout: ${REQUEST_TIMEOUT_MS > 0 ? `${REQUEST_TIMEOUT_MS}ms` : 'transport default'}`);
} catch (err) {
  fastify.log.error(err);
  process.exit(1);
}
