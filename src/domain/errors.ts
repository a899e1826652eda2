/**
 * Error taxonomy for the forecast pipeline
 */

import type { ErrorCode, ErrorDetails, NotFoundReason } from './types.js';

/**
 * Base class for every failure the pipeline reports to the user
 */
export class ForecastError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: ErrorDetails;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean,
    details?: ErrorDetails
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
    this.details = details;
  }
}

/**
 * The postal code could not be resolved to coordinates
 */
export class InvalidLocationError extends ForecastError {
  readonly postalCode: string;
  readonly reason: NotFoundReason;

  constructor(postalCode: string, reason: NotFoundReason) {
    const message =
      reason === 'empty_input'
        ? 'No ZIP code was provided.'
        : `No valid geographic information found for ZIP code: ${postalCode}`;
    super('INVALID_LOCATION', message, false, { postalCode, reason });
    this.postalCode = postalCode;
    this.reason = reason;
  }
}

/**
 * Transport-level failure: timeout, DNS, connection refused
 */
export class NetworkError extends ForecastError {
  constructor(message: string, details?: ErrorDetails) {
    super('NETWORK_ERROR', message, true, details);
  }
}

/**
 * Non-2xx response from the weather service
 */
export class UpstreamHttpError extends ForecastError {
  readonly status: number;

  constructor(
    status: number,
    message: string,
    retryable: boolean,
    details?: ErrorDetails
  ) {
    super('UPSTREAM_HTTP_ERROR', message, retryable, {
      ...details,
      upstreamStatus: status,
    });
    this.status = status;
  }
}

/**
 * Response body that is not JSON or lacks the expected fields
 */
export class MalformedResponseError extends ForecastError {
  constructor(message: string, details?: ErrorDetails) {
    super('MALFORMED_RESPONSE', message, false, details);
  }
}
