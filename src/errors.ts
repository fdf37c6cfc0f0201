import { MAX_DAYS_OFFSET } from './config/constants.js';
import type { RequestParams } from './types/index.js';

export class ExchangeRatesError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidOffsetError extends ExchangeRatesError {
  public readonly offset: number;

  constructor(offset: number) {
    super(`Incorrect offset value. Please choose value from 1 to ${MAX_DAYS_OFFSET}.`);
    this.offset = offset;
  }
}

/** The exchange API answered with anything but 200. */
export class RequestFailedError extends ExchangeRatesError {
  constructor(
    public readonly url: string,
    public readonly params: RequestParams,
    public readonly status: number
  ) {
    super(`Request status: ${status}. Url: ${url}, params: ${JSON.stringify(params)}`);
  }
}

/** The exchange API could not be reached at all. */
export class ConnectionFailedError extends ExchangeRatesError {
  constructor(
    public readonly url: string,
    public readonly detail: string,
    options?: ErrorOptions
  ) {
    super(`Connection error: ${url} (${detail})`, options);
  }
}

export class InvalidResponseError extends ExchangeRatesError {
  constructor(
    public readonly url: string,
    public readonly params: RequestParams,
    public readonly detail: string,
    options?: ErrorOptions
  ) {
    super(`Invalid response from ${url}, params: ${JSON.stringify(params)}: ${detail}`, options);
  }
}

export type RemoteRequestError = RequestFailedError | ConnectionFailedError | InvalidResponseError;

export function isRemoteRequestError(error: unknown): error is RemoteRequestError {
  return (
    error instanceof RequestFailedError ||
    error instanceof ConnectionFailedError ||
    error instanceof InvalidResponseError
  );
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause instanceof Error) return `${error.message}: ${error.cause.message}`;
  return error.message;
}
