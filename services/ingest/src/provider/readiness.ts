import { fetch } from 'undici';
import type { BaseLogger } from 'pino';

import type { ReadinessCheck } from './types';

export interface ReadinessProbeOptions {
  thetaBaseUrl: string;
  symbol: string;
  timeoutMs: number;
  logger: BaseLogger;
}

/**
 * The local data terminal must be running and logged in before any fetch.
 * Any HTTP answer counts as ready; only a failed connection does not.
 */
export class ReadinessProbe implements ReadinessCheck {
  private readonly options: ReadinessProbeOptions;

  constructor(options: ReadinessProbeOptions) {
    this.options = options;
  }

  get url(): string {
    const params = new URLSearchParams({ root: this.options.symbol });
    return `${this.options.thetaBaseUrl}/list/dates/stock/quote?${params.toString()}`;
  }

  async isReady(): Promise<boolean> {
    try {
      const response = await fetch(this.url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
      await response.body?.cancel();
      return true;
    } catch (error) {
      this.options.logger.debug(
        { url: this.url, err: error instanceof Error ? error.message : String(error) },
        'Data terminal is not reachable'
      );
      return false;
    }
  }
}
