import { fetch } from 'undici';
import type { BaseLogger } from 'pino';
import { RetriesExhaustedError, retryWithBackoff, type BackoffOptions } from '@marketlake/shared';

import { MarketlakeError, PermanentFetchError, TransientFetchError } from '../errors';
import type { SubRequest } from '../requests/expansion';
import type { ProviderClient, RawPayload } from './types';

export const NO_DATA_STATUS = 472;
const NO_DATA_MESSAGE = 'No data for the specified timeframe';
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/** Aborts `primary` when `external` aborts; the returned function detaches the listener. */
export function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => {};
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => {};
  }
  const onAbort = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', onAbort, { once: true });
  return () => {
    external.removeEventListener('abort', onAbort);
  };
}

export interface HttpProviderOptions {
  timeoutMs: number;
  maxAttempts: number;
  backoff: BackoffOptions;
  logger: BaseLogger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Fetches sub-requests over HTTP. Transient failures are retried with
 * exponential backoff; everything that reaches the caller as an error is a
 * PermanentFetchError.
 */
export class HttpProviderClient implements ProviderClient {
  private readonly options: HttpProviderOptions;

  constructor(options: HttpProviderOptions) {
    this.options = options;
  }

  async fetch(subRequest: SubRequest, signal?: AbortSignal): Promise<RawPayload> {
    const { logger } = this.options;
    try {
      return await retryWithBackoff((attempt) => this.attempt(subRequest, attempt, signal), {
        maxAttempts: this.options.maxAttempts,
        backoff: this.options.backoff,
        sleep: this.options.sleep,
        shouldRetry: (error) => error instanceof TransientFetchError,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.warn(
            {
              subRequestId: subRequest.id,
              attempt,
              delayMs,
              err: error instanceof Error ? error.message : String(error)
            },
            'Transient provider failure; retrying'
          );
        }
      });
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        const last = error.lastError;
        throw new PermanentFetchError(
          `Gave up on ${subRequest.url} after ${error.attempts} attempts: ${last instanceof Error ? last.message : String(last)}`,
          'retries_exhausted',
          last instanceof TransientFetchError ? last.statusCode : null
        );
      }
      throw error;
    }
  }

  private async attempt(subRequest: SubRequest, attempt: number, external?: AbortSignal): Promise<RawPayload> {
    const controller = new AbortController();
    const detach = combineSignals(controller, external);
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error('Provider request timed out'));
    }, this.options.timeoutMs);

    try {
      const response = await fetch(subRequest.url, {
        method: 'GET',
        headers: { ...subRequest.headers },
        signal: controller.signal
      });
      const body = await response.text();
      const contentType = response.headers.get('content-type');

      this.options.logger.debug(
        { subRequestId: subRequest.id, status: response.status, attempt, bytes: body.length },
        'Provider responded'
      );

      const noData =
        response.status === NO_DATA_STATUS ||
        (response.status === 404 && subRequest.leg === 'earnings') ||
        (!response.ok && body.includes(NO_DATA_MESSAGE));
      if (noData) {
        return { subRequest, format: subRequest.format, contentType, body: '', noData: true };
      }

      if (response.ok) {
        return { subRequest, format: subRequest.format, contentType, body, noData: false };
      }

      const message = `Provider answered ${response.status} for ${subRequest.url}`;
      if (isTransientStatus(response.status)) {
        throw new TransientFetchError(message, response.status);
      }
      throw new PermanentFetchError(message, 'http_status', response.status);
    } catch (error) {
      if (error instanceof MarketlakeError) {
        throw error;
      }
      if (timedOut) {
        throw new PermanentFetchError(
          `Request to ${subRequest.url} timed out after ${this.options.timeoutMs}ms`,
          'timeout'
        );
      }
      if (external?.aborted) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransientFetchError(`Network error for ${subRequest.url}: ${reason}`);
    } finally {
      clearTimeout(timeout);
      detach();
    }
  }
}
