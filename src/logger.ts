import { pino } from 'pino';
import type { Logger } from 'pino';

/** CLI logger: stdout is reserved for the rates, so logs go to stderr. */
export function createCliLogger(level = 'fatal'): Logger {
  return pino({ name: 'pb-rates', level }, pino.destination(2));
}
