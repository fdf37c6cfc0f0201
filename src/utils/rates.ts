import { DEFAULT_CURRENCIES, UNKNOWN_RATE } from '../config/constants.js';
import type { CurrencyRates, DailyRates, ExchangeResponse } from '../types/index.js';

/** Defaults first, then the additions; each code listed once. */
export function activeCurrencies(additionalCurrencies?: readonly string[]): string[] {
  const currencies = new Set(DEFAULT_CURRENCIES);
  for (const currency of additionalCurrencies ?? []) {
    currencies.add(currency);
  }
  return [...currencies];
}

/** Keeps only the requested currencies, in the order the bank listed them. */
export function filterByCurrency(
  response: ExchangeResponse,
  additionalCurrencies?: readonly string[]
): ExchangeResponse {
  const wanted = new Set(activeCurrencies(additionalCurrencies));

  return {
    ...response,
    exchangeRate: response.exchangeRate.filter(
      entry => entry.currency !== undefined && wanted.has(entry.currency)
    )
  };
}

export function reshapeByDate(response: ExchangeResponse): DailyRates {
  const ratesByCurrency: Record<string, CurrencyRates> = {};

  for (const entry of response.exchangeRate) {
    if (entry.currency === undefined) continue;
    ratesByCurrency[entry.currency] = {
      sale: entry.saleRate ?? UNKNOWN_RATE,
      purchase: entry.purchaseRate ?? UNKNOWN_RATE
    };
  }

  return { [response.date]: ratesByCurrency };
}

/** Splits a `USD,GBP` style list; blanks are dropped, case is kept. */
export function parseCurrencyList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const currencies = value
    .split(',')
    .map(c => c.trim())
    .filter(c => c !== '');
  return currencies.length > 0 ? currencies : undefined;
}
