import { vi } from 'vitest';
import type { RateEntry } from '../types/index.js';

export const TEST_API_URL = 'https://bank.test/p24api/exchange_rates';

export const defaultRateEntries: RateEntry[] = [
  { baseCurrency: 'UAH', saleRateNB: 37.9, purchaseRateNB: 37.9 },
  { baseCurrency: 'UAH', currency: 'USD', saleRateNB: 37.9, purchaseRateNB: 37.9, saleRate: 38.1, purchaseRate: 37.5 },
  { baseCurrency: 'UAH', currency: 'EUR', saleRateNB: 41.2, purchaseRateNB: 41.2, saleRate: 41.6, purchaseRate: 40.9 },
  { baseCurrency: 'UAH', currency: 'GBP', saleRateNB: 47.8, purchaseRateNB: 47.8, saleRate: 48.2, purchaseRate: 47.1 }
];

export function exchangeResponseBody(date: string, exchangeRate: RateEntry[] = defaultRateEntries) {
  return {
    date,
    bank: 'PB',
    baseCurrency: 980,
    baseCurrencyLit: 'UAH',
    exchangeRate
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

/** A fetch stub that answers per requested `date` query parameter. */
export function stubFetchByDate(handler: (date: string) => Response | Promise<Response>) {
  return vi.fn<typeof fetch>(async input => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    return handler(url.searchParams.get('date') ?? '');
  });
}

/** Fixed clock: 3 January 2024, local time. */
export const fixedNow = () => new Date(2024, 0, 3, 12, 0, 0);
