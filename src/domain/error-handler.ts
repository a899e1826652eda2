/**
 * Error handling and mapping for the weather service client
 */

import { NetworkError, UpstreamHttpError } from './errors.js';
import { logger } from './logger.js';

/**
 * Whether a failed HTTP status is worth retrying later
 *
 * @param status - HTTP status code from upstream
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Build the user-facing message for an HTTP failure
 *
 * @param status - HTTP status code
 * @param statusText - HTTP status text
 */
export function describeHttpStatus(status: number, statusText: string): string {
  if (status === 404) {
    return 'The weather service has no forecast for this location (404 Not Found). It only covers the United States.';
  }
  if (status === 403) {
    return 'The weather service refused the request (403 Forbidden). Check NWS_USER_AGENT.';
  }
  if (status === 429) {
    return 'Rate limit exceeded at the weather service. Please try again later.';
  }
  if (status >= 500) {
    return `The weather service is currently unavailable (HTTP ${status}).`;
  }
  const suffix = statusText ? ` ${statusText}` : '';
  return `The weather service returned HTTP ${status}${suffix}.`;
}

/**
 * Handle a non-2xx response and create the matching error
 *
 * @param status - HTTP status code
 * @param statusText - HTTP status text
 * @param url - Requested URL
 * @param headers - Response headers (for Retry-After)
 * @param runId - Optional run ID for tracking
 */
export function handleHttpError(
  status: number,
  statusText: string,
  url: string,
  headers?: Headers,
  runId?: string
): UpstreamHttpError {
  const retryable = isRetryableStatus(status);
  const details: { upstreamUrl: string; runId?: string; retryAfterSeconds?: number } = {
    upstreamUrl: url,
  };

  if (runId) {
    details.runId = runId;
  }

  if (status === 429 && headers) {
    const retryAfter = headers.get('Retry-After');
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        details.retryAfterSeconds = seconds;
      }
    }
  }

  logger.warn('HTTP error from weather service', {
    status,
    statusText,
    url,
    runId,
  });

  return new UpstreamHttpError(
    status,
    describeHttpStatus(status, statusText),
    retryable,
    details
  );
}

/**
 * Handle network errors (connection refused, timeout, etc.)
 *
 * @param error - Underlying error
 * @param url - Requested URL
 * @param runId - Optional run ID for tracking
 */
export function handleNetworkError(
  error: Error,
  url: string,
  runId?: string
): NetworkError {
  logger.warn('Network error calling weather service', {
    error: error.message,
    url,
    runId,
  });

  return new NetworkError(
    `Unable to reach the weather service: ${error.message}`,
    {
      upstreamUrl: url,
      runId,
      networkError: error.message,
    }
  );
}
