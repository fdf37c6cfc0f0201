import { z } from 'zod';

export const rateEntrySchema = z.object({
  baseCurrency: z.string().optional(),
  // The national bank summary row comes without a currency
  currency: z.string().optional(),
  saleRateNB: z.number().optional(),
  purchaseRateNB: z.number().optional(),
  saleRate: z.number().optional(),
  purchaseRate: z.number().optional()
});

export const exchangeResponseSchema = z.object({
  date: z.string(),
  bank: z.string().optional(),
  baseCurrency: z.number().optional(),
  baseCurrencyLit: z.string().optional(),
  exchangeRate: z.array(rateEntrySchema)
});

export const exchangeRatesQuerySchema = z.object({
  days: z.coerce.number({ invalid_type_error: 'days must be a number' }),
  currencies: z.string().optional()
});
