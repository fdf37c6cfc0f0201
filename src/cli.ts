import { parseArgs } from 'node:util';
import type { BaseLogger } from 'pino';
import PrivatBankService from './services/privatbank.service.js';
import ExchangeHistoryService from './services/exchangeHistory.service.js';
import { InvalidOffsetError, isRemoteRequestError } from './errors.js';
import { parseCurrencyList } from './utils/rates.js';
import { MAX_DAYS_OFFSET } from './config/constants.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: pb-rates <days> [--currency USD,EUR]

  <days>                 number of days back from today (1-${MAX_DAYS_OFFSET}), today excluded
  -c, --currency <list>  additional comma-separated currency codes, e.g. "GBP,PLN"
  -h, --help             show this help`;

export interface CliContext {
  logger: BaseLogger;
  apiUrl: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  now?: () => Date;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const NEGATIVE_NUMBER = /^-\d+$/;
const INTEGER = /^-?\d+$/;

/** Plain decimal integers only; anything else is NaN and fails offset validation. */
export function parseOffset(value: string): number {
  return INTEGER.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  // parseArgs would take `-1` for a short option
  const negativeNumbers = argv.filter(arg => NEGATIVE_NUMBER.test(arg));
  const optionArgs = argv.filter(arg => !NEGATIVE_NUMBER.test(arg));

  let values: { currency?: string; help?: boolean };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: optionArgs,
      allowPositionals: true,
      options: {
        currency: { type: 'string', short: 'c' },
        help: { type: 'boolean', short: 'h' }
      }
    }));
  } catch (error) {
    ctx.stderr(`${error instanceof Error ? error.message : String(error)}\n${USAGE}`);
    return EXIT_USAGE;
  }
  positionals = [...positionals, ...negativeNumbers];

  if (values.help) {
    ctx.stdout(USAGE);
    return EXIT_OK;
  }

  if (positionals.length !== 1) {
    ctx.stderr(USAGE);
    return EXIT_USAGE;
  }

  const daysOffset = parseOffset(positionals[0]);
  const currencyList = parseCurrencyList(values.currency);

  const bankService = new PrivatBankService(ctx.logger, {
    apiUrl: ctx.apiUrl,
    timeoutMs: ctx.timeoutMs,
    fetchFn: ctx.fetchFn
  });
  const historyService = new ExchangeHistoryService(ctx.logger, bankService, { now: ctx.now });

  try {
    const result = await historyService.getRatesForPeriod(daysOffset, currencyList);
    ctx.stdout(JSON.stringify(result, null, 2));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof InvalidOffsetError) {
      ctx.stderr(error.message);
      return EXIT_USAGE;
    }
    if (isRemoteRequestError(error)) {
      ctx.stderr(`Oops, something went wrong. Error: ${error.message}.`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
