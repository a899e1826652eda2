/**
 * Zod schemas for the weather service (api.weather.gov) responses
 *
 * Only the fields the client reads are declared; everything else in the
 * GeoJSON bodies is stripped.
 */

import { z } from 'zod';

/**
 * Body of GET /points/{lat},{lon}
 */
export const PointsResponseSchema = z.object({
  properties: z.object({
    forecast: z.string().url().describe('Forecast endpoint for this grid cell'),
    gridId: z.string().optional(),
    gridX: z.number().int().optional(),
    gridY: z.number().int().optional(),
    relativeLocation: z
      .object({
        properties: z.object({
          city: z.string(),
          state: z.string(),
        }),
      })
      .optional(),
  }),
});

/**
 * Quantitative value as the service encodes it ({ unitCode, value })
 */
const QuantitativeValueSchema = z.object({
  unitCode: z.string().optional(),
  value: z.number().nullable(),
});

export const ForecastPeriodSchema = z.object({
  number: z.number().int(),
  name: z.string(),
  temperature: z.number(),
  temperatureUnit: z.string(),
  probabilityOfPrecipitation: QuantitativeValueSchema.nullable().optional(),
  windSpeed: z.string().default('N/A'),
  windDirection: z.string().default('N/A'),
  shortForecast: z.string(),
});

export type RawForecastPeriod = z.infer<typeof ForecastPeriodSchema>;

/**
 * Body of the forecast URL returned by the points lookup
 */
export const ForecastResponseSchema = z.object({
  properties: z.object({
    periods: z.array(ForecastPeriodSchema),
  }),
});

/**
 * Summarise zod issues as "path: message" pairs
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
