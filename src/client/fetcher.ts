import retry from "async-retry";
import undici, { type Dispatcher, errors } from "undici";

import Debug from "../utils/debug.js";
import { LengthMismatchError, TransportError } from "../utils/errors.js";
import { retryCodes, successCodes } from "../utils/http-client.js";
import type { Window } from "../utils/range.js";
import { toString } from "../utils/range.js";
import { toRangeHeader } from "./planner.js";

const debug = Debug("fetcher");

// Set by node:net on connections that failed or dropped
const networkCodes: readonly string[] = [
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
];

const isTransient = (error: unknown): boolean => {
  if (
    error instanceof errors.SocketError ||
    error instanceof errors.ConnectTimeoutError ||
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError
  ) {
    return true;
  }
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    networkCodes.includes(error.code)
  );
};

const toTransportError = (window: Window, error: unknown): TransportError => {
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(window, message, {
    retryable: isTransient(error),
  });
};

export interface FetcherOptions {
  url: string;
  retries: number;
  retryDelay: number; // milliseconds
  timeout: number; // milliseconds, per request
}

export class ChunkFetcher {
  readonly url: string;
  readonly retries: number;
  readonly retryDelay: number;
  readonly timeout: number;

  constructor({ url, retries, retryDelay, timeout }: FetcherOptions) {
    this.url = url;
    this.retries = retries;
    this.retryDelay = retryDelay;
    this.timeout = timeout;
  }

  /**
   * Downloads exactly the bytes of `window`. Only transient transport
   * errors are retried, and only when `retries` is above zero. When the
   * retries run out, the error of the last attempt is thrown.
   */
  async fetch(window: Window): Promise<Uint8Array> {
    let lastError: Error | undefined;
    let chunk: Uint8Array | undefined;
    try {
      chunk = await retry(
        async (bail: (e: Error) => void): Promise<Uint8Array | undefined> => {
          try {
            return await this.request(window);
          } catch (error: unknown) {
            lastError =
              error instanceof Error
                ? error
                : new TransportError(window, String(error));
            if (lastError instanceof TransportError && lastError.retryable) {
              throw lastError;
            }
            bail(lastError);
            return undefined;
          }
        },
        {
          retries: this.retries,
          factor: 1,
          minTimeout: this.retryDelay,
          maxTimeout: this.retryDelay,
          randomize: false,
          onRetry: (error: Error, attempt: number) => {
            debug(
              "retrying window %s (attempt %d of %d) because of error: %s",
              toString(window),
              attempt,
              this.retries,
              error.message
            );
          },
        }
      );
    } catch (error: unknown) {
      throw lastError ?? error;
    }
    if (chunk === undefined) {
      throw new TransportError(window, "request was abandoned");
    }
    return chunk;
  }

  private async request(window: Window): Promise<Uint8Array> {
    const range = toRangeHeader(window);
    debug("requesting %s for window %s", range, toString(window));

    let data: Dispatcher.ResponseData;
    try {
      data = await undici.request(this.url, {
        method: "GET",
        headers: { range },
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
      });
    } catch (error: unknown) {
      throw toTransportError(window, error);
    }

    const { statusCode } = data;
    if (!successCodes.includes(statusCode)) {
      await data.body.dump();
      throw new TransportError(
        window,
        `received status code ${statusCode} from server`,
        { statusCode, retryable: retryCodes.includes(statusCode) }
      );
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await data.body.arrayBuffer());
    } catch (error: unknown) {
      throw toTransportError(window, error);
    }
    if (body.length !== window.length) {
      throw new LengthMismatchError(window, body.length);
    }
    return body;
  }
}
