import type { BaseLogger } from 'pino';
import { exchangeResponseSchema } from '../types/schemas.js';
import type { ExchangeResponse, RequestParams } from '../types/index.js';
import { ConnectionFailedError, InvalidResponseError, RequestFailedError, describeError } from '../errors.js';
import { formatApiDate } from '../utils/dateRange.js';

export interface PrivatBankServiceOptions {
  apiUrl: string;
  /** Per-request timeout; 0 disables it. */
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

class PrivatBankService {
  private logger: BaseLogger;
  private apiUrl: string;
  private timeoutMs: number;
  private fetchFn: typeof fetch;

  constructor(logger: BaseLogger, options: PrivatBankServiceOptions) {
    this.logger = logger;
    this.apiUrl = options.apiUrl;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  buildRequestUrl(params: RequestParams): string {
    const url = new URL(this.apiUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  async fetchRatesForDate(date: Date): Promise<ExchangeResponse> {
    const params = { date: formatApiDate(date) };
    const body = await this.getRequest(params);

    const parsed = exchangeResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      this.logger.error(`Unexpected exchange API payload for ${params.date}: ${issues}`);
      throw new InvalidResponseError(this.apiUrl, params, issues);
    }

    return parsed.data;
  }

  private async getRequest(params: RequestParams): Promise<unknown> {
    const url = this.buildRequestUrl(params);
    this.logger.info(`Fetching from exchange API: ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { 'Accept': 'application/json' },
        signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined
      });
    } catch (error) {
      const detail = describeError(error);
      this.logger.error({ err: error }, `Exchange API unreachable: ${detail}`);
      throw new ConnectionFailedError(this.apiUrl, detail, { cause: error });
    }

    if (response.status !== 200) {
      let errorText = '';
      try {
        errorText = await response.text();
      } catch (error) {
        this.logger.warn({ err: error }, 'Could not read exchange API error body');
      }
      this.logger.error(`Exchange API error ${response.status}: ${errorText || response.statusText}`);
      throw new RequestFailedError(this.apiUrl, params, response.status);
    }

    try {
      return await response.json();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new InvalidResponseError(this.apiUrl, params, `body is not JSON (${error.message})`, { cause: error });
      }
      throw new ConnectionFailedError(this.apiUrl, describeError(error), { cause: error });
    }
  }
}

export default PrivatBankService;
