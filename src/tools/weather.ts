/**
 * Weather tools: get_weather and get_forecast
 *
 * Readings come from a WeatherSource. The default source draws plausible
 * values from a random number generator; tests inject a seeded or fixed one.
 */

import { z } from 'zod';
import type { ToolRegistry } from './registry.js';
import { type StructuredLogger, createSilentLogger } from '../observability/logger.js';

// =============================================================================
// Schemas
// =============================================================================

export const MAX_FORECAST_DAYS = 7;
export const DEFAULT_FORECAST_DAYS = 3;

export const GetWeatherInputSchema = z.object({
  location: z.string().min(1).describe('City name to get weather for'),
});

export const GetForecastInputSchema = z.object({
  location: z.string().min(1).describe('City name for forecast'),
  days: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_FORECAST_DAYS)
    .describe(`Number of days to forecast (1-${MAX_FORECAST_DAYS})`),
});

export const WeatherSchema = z.object({
  location: z.string(),
  temperature: z.number().int(),
  condition: z.string(),
  humidity: z.number().int(),
  wind_speed: z.number().int(),
});

export const ForecastDaySchema = z.object({
  day: z.number().int(),
  high: z.number().int(),
  low: z.number().int(),
  condition: z.string(),
  precipitation_chance: z.number().int(),
});

export const ForecastSchema = z.object({
  items: z.array(ForecastDaySchema),
});

export type Weather = z.infer<typeof WeatherSchema>;
export type ForecastDay = z.infer<typeof ForecastDaySchema>;
export type Forecast = z.infer<typeof ForecastSchema>;

// =============================================================================
// Weather Source
// =============================================================================

/**
 * Where readings come from. Throwing (or rejecting) surfaces to the caller
 * as a failed tool execution.
 */
export interface WeatherSource {
  current(location: string, signal: AbortSignal): Promise<Weather> | Weather;
  forecast(location: string, days: number, signal: AbortSignal): Promise<ForecastDay[]> | ForecastDay[];
}

/** Returns a float in [0, 1), like Math.random */
export type RandomFn = () => number;

const CURRENT_CONDITIONS = ['Sunny', 'Cloudy', 'Rainy', 'Partly Cloudy'] as const;
const FORECAST_CONDITIONS = ['Sunny', 'Cloudy', 'Rainy', 'Stormy'] as const;

/**
 * Inclusive on both ends.
 */
function randomInt(rng: RandomFn, min: number, max: number): number {
  const value = min + Math.floor(rng() * (max - min + 1));
  return Math.min(max, Math.max(min, value));
}

function pick<T>(rng: RandomFn, items: readonly [T, ...T[]]): T {
  return items[Math.floor(rng() * items.length)] ?? items[0];
}

export class RandomWeatherSource implements WeatherSource {
  constructor(private readonly rng: RandomFn = Math.random) {}

  current(location: string): Weather {
    return {
      location,
      temperature: randomInt(this.rng, 15, 30),
      condition: pick(this.rng, CURRENT_CONDITIONS),
      humidity: randomInt(this.rng, 40, 80),
      wind_speed: randomInt(this.rng, 5, 25),
    };
  }

  forecast(_location: string, days: number): ForecastDay[] {
    return Array.from({ length: days }, (_, index) => ({
      day: index + 1,
      high: randomInt(this.rng, 20, 35),
      low: randomInt(this.rng, 10, 20),
      condition: pick(this.rng, FORECAST_CONDITIONS),
      precipitation_chance: randomInt(this.rng, 0, 100),
    }));
  }
}

// =============================================================================
// Registration
// =============================================================================

export interface WeatherToolsOptions {
  source?: WeatherSource;
  logger?: StructuredLogger;
}

/**
 * Register get_weather and get_forecast on `registry`.
 */
export function registerWeatherTools(registry: ToolRegistry, options: WeatherToolsOptions = {}): void {
  const source = options.source ?? new RandomWeatherSource();
  const logger = options.logger ?? createSilentLogger();

  registry.register(
    {
      name: 'get_weather',
      title: 'Current Weather',
      description: 'Get current weather for a specified location',
      inputSchema: GetWeatherInputSchema,
      outputSchema: WeatherSchema,
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    async ({ location }, { signal }) => {
      logger.info('Handling get_weather request', { location });
      const weather = await source.current(location, signal);
      logger.debug('Generated weather response', { weather });
      return weather;
    }
  );

  registry.register(
    {
      name: 'get_forecast',
      title: 'Weather Forecast',
      description: 'Get weather forecast for the specified location and number of days',
      inputSchema: GetForecastInputSchema,
      outputSchema: ForecastSchema,
      annotations: { readOnlyHint: true, openWorldHint: true },
    },
    async ({ location, days }, { signal }) => {
      const effectiveDays = Math.min(days, MAX_FORECAST_DAYS);
      logger.info('Handling get_forecast request', {
        location,
        requestedDays: days,
        effectiveDays,
      });
      const items = await source.forecast(location, effectiveDays, signal);
      return { items };
    }
  );
}
