import type { z } from 'zod';
import type { exchangeRatesQuerySchema, exchangeResponseSchema, rateEntrySchema } from './schemas.js';

// Type definitions
export type RateEntry = z.infer<typeof rateEntrySchema>;

export type ExchangeResponse = z.infer<typeof exchangeResponseSchema>;

export type RateValue = number | 'unknown';

export interface CurrencyRates {
  sale: RateValue;
  purchase: RateValue;
}

/** One day of rates, keyed by the date string the bank returned. */
export type DailyRates = Record<string, Record<string, CurrencyRates>>;

export type RequestParams = Record<string, string>;

export type ExchangeRatesQuerystring = z.input<typeof exchangeRatesQuerySchema>;
