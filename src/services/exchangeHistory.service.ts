import type { BaseLogger } from 'pino';
import type { DailyRates } from '../types/index.js';
import { buildDateRange, formatApiDate } from '../utils/dateRange.js';
import { filterByCurrency, reshapeByDate } from '../utils/rates.js';
import PrivatBankService from './privatbank.service.js';

export interface ExchangeHistoryServiceOptions {
  now?: () => Date;
}

class ExchangeHistoryService {
  private logger: BaseLogger;
  private bankService: PrivatBankService;
  private now: () => Date;

  constructor(logger: BaseLogger, bankService: PrivatBankService, options: ExchangeHistoryServiceOptions = {}) {
    this.logger = logger;
    this.bankService = bankService;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rates for each of the last `daysOffset` days (yesterday included, today
   * excluded), oldest first. Dates are fetched one after another and the
   * first failure aborts the whole period.
   */
  async getRatesForPeriod(daysOffset: number, additionalCurrencies?: readonly string[]): Promise<DailyRates[]> {
    const dateRange = buildDateRange(daysOffset, this.now());
    this.logger.info(
      `Fetching ${dateRange.length} day(s) of rates: ${formatApiDate(dateRange[0])} - ${formatApiDate(dateRange[dateRange.length - 1])}`
    );

    const history: DailyRates[] = [];

    for (const date of dateRange) {
      const ratesPerDay = await this.bankService.fetchRatesForDate(date);
      const filtered = filterByCurrency(ratesPerDay, additionalCurrencies);
      history.push(reshapeByDate(filtered));
    }

    this.logger.info(`Fetched rates for ${history.length} day(s)`);
    return history;
  }
}

export default ExchangeHistoryService;
