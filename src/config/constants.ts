// Configuration constants
export const EXCHANGE_API_URL =
  process.env.EXCHANGE_API_URL || 'https://api.privatbank.ua/p24api/exchange_rates';

// 0 leaves the timeout to the HTTP client's defaults
export const REQUEST_TIMEOUT_MS = parseInt(process.env.REQUEST_TIMEOUT_MS || '0', 10);

export const LOG_LEVEL = process.env.LOG_LEVEL;

export const PORT = parseInt(process.env.PORT || '8000', 10);
export const HOST = process.env.HOST || '0.0.0.0';

// Business rules
export const API_DATE_FORMAT = 'dd.MM.yyyy';
export const MAX_DAYS_OFFSET = 10;
export const DEFAULT_CURRENCIES: readonly string[] = ['USD', 'EUR'];
export const UNKNOWN_RATE = 'unknown';
