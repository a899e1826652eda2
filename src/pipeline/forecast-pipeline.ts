/**
 * Forecast pipeline: postal code -> coordinates -> forecast periods
 *
 * One instance serves one run and walks
 * AWAITING_INPUT -> RESOLVING_LOCATION -> FETCHING_FORECAST -> DONE,
 * or ends in FAILED. Errors are rethrown to the caller untouched.
 */

import { buildSourceMetadata } from '../domain/attribution.js';
import { InvalidLocationError } from '../domain/errors.js';
import { logger } from '../domain/logger.js';
import type { NwsClient } from '../domain/nws-client.js';
import { generateRunId, getRunId, runWithContext } from '../domain/request-context.js';
import type { ForecastReport, GeoLocation, PipelineState } from '../domain/types.js';
import type { Geocoder } from '../postal/geocoder.js';

export const FORECAST_PRODUCT = 'Gridpoint Forecast';

export interface PipelineDeps {
  geocoder: Geocoder;
  client: NwsClient;
}

export interface PipelineOptions {
  /** Number of periods to keep, from the first (default: 1) */
  periods?: number;
  onTransition?: (from: PipelineState, to: PipelineState) => void;
}

export class ForecastPipeline {
  private current: PipelineState = 'AWAITING_INPUT';
  private resolved?: GeoLocation;
  private readonly periodCount: number;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions = {}
  ) {
    this.periodCount = Math.max(1, options.periods ?? 1);
  }

  get state(): PipelineState {
    return this.current;
  }

  /**
   * Location once resolved; still set when the forecast step fails
   */
  get location(): GeoLocation | undefined {
    return this.resolved;
  }

  private transition(to: PipelineState): void {
    const from = this.current;
    this.current = to;
    logger.logTransition(from, to, getRunId());
    this.options.onTransition?.(from, to);
  }

  /**
   * Run the pipeline for one postal code
   *
   * @throws InvalidLocationError, NetworkError, UpstreamHttpError or MalformedResponseError
   */
  async run(postalCode: string): Promise<ForecastReport> {
    if (this.current !== 'AWAITING_INPUT') {
      throw new Error(`ForecastPipeline already used (state: ${this.current})`);
    }

    const runId = generateRunId();
    return runWithContext({ runId, postalCode, startTime: Date.now() }, () =>
      this.execute(postalCode)
    );
  }

  private async execute(postalCode: string): Promise<ForecastReport> {
    this.transition('RESOLVING_LOCATION');
    const lookup = this.deps.geocoder.resolve(postalCode);

    if (lookup.kind === 'not_found') {
      this.transition('FAILED');
      throw new InvalidLocationError(lookup.postalCode, lookup.reason);
    }

    const { location } = lookup;
    this.resolved = location;
    logger.info('Location resolved', {
      runId: getRunId(),
      postalCode: location.postalCode,
      latitude: location.latitude,
      longitude: location.longitude,
    });

    this.transition('FETCHING_FORECAST');
    try {
      const periods = await this.deps.client.getForecastPeriods(
        location.latitude,
        location.longitude,
        this.periodCount
      );
      this.transition('DONE');

      return {
        location,
        periods,
        source: buildSourceMetadata(FORECAST_PRODUCT),
      };
    } catch (error) {
      this.transition('FAILED');
      throw error;
    }
  }
}
