#!/usr/bin/env node
import { runCli, EXIT_FAILURE } from './cli.js';
import { createCliLogger } from './logger.js';
import { EXCHANGE_API_URL, LOG_LEVEL, REQUEST_TIMEOUT_MS } from './config/constants.js';

const logger = createCliLogger(LOG_LEVEL);

try {
  process.exitCode = await runCli(process.argv.slice(2), {
    logger,
    apiUrl: EXCHANGE_API_URL,
    timeoutMs: REQUEST_TIMEOUT_MS,
    stdout: text => process.stdout.write(`${text}\n`),
    stderr: text => process.stderr.write(`${text}\n`)
  });
} catch (err) {
  logger.fatal({ err }, 'Unexpected failure');
  process.exitCode = EXIT_FAILURE;
}
