/**
 * HTTP client for communicating with the weather service
 */

import type { HttpResponse } from './types.js';
import { ForecastError, MalformedResponseError } from './errors.js';
import { handleHttpError, handleNetworkError } from './error-handler.js';
import { logger } from './logger.js';
import { getRunId } from './request-context.js';

/**
 * Transport used by the client; matches the global fetch
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Identifying User-Agent; the weather service requires one */
  userAgent: string;
  /** Timeout per request in milliseconds (default: 10000) */
  timeout?: number;
  /** Transport override, mainly for tests */
  fetchImpl?: FetchLike;
}

/**
 * JSON-over-HTTP client scoped to one CLI run
 */
export class HttpClient {
  private readonly userAgent: string;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: HttpClientConfig) {
    this.userAgent = config.userAgent;
    this.timeout = config.timeout || 10000;
    this.fetchImpl = config.fetchImpl || ((url, init) => fetch(url, init));

    logger.debug('HttpClient initialized', {
      userAgent: this.userAgent,
      timeout: this.timeout,
    });
  }

  /**
   * GET a URL and parse the body as JSON; callers validate the shape
   *
   * @param url - Absolute URL
   * @returns Parsed body with status and headers
   * @throws UpstreamHttpError on non-2xx, NetworkError on transport failure or
   *   timeout, MalformedResponseError when the body is not JSON
   */
  async getJson(url: string): Promise<HttpResponse<unknown>> {
    const runId = getRunId();
    const timeout = this.timeout;
    const startTime = Date.now();

    logger.debug('Upstream request starting', { runId, url });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/geo+json',
        },
        signal: controller.signal,
      });

      logger.logUpstreamCall(url, response.status, Date.now() - startTime, runId);

      if (!response.ok) {
        throw handleHttpError(
          response.status,
          response.statusText,
          url,
          response.headers,
          runId
        );
      }

      const text = await response.text();
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch {
        throw new MalformedResponseError(
          `The weather service returned a body that is not JSON (${url}).`,
          { upstreamUrl: url, runId }
        );
      }

      return {
        data,
        status: response.status,
        headers: response.headers,
      };
    } catch (error) {
      // Already mapped above
      if (error instanceof ForecastError) {
        throw error;
      }

      const latency = Date.now() - startTime;

      if (error instanceof Error) {
        logger.warn('Upstream request failed', {
          runId,
          url,
          error: error.message,
          latency,
        });

        if (error.name === 'AbortError') {
          throw handleNetworkError(
            new Error(`Request timeout after ${timeout}ms`),
            url,
            runId
          );
        }

        throw handleNetworkError(error, url, runId);
      }

      throw handleNetworkError(new Error(String(error)), url, runId);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
