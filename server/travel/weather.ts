/**
 * Open-Meteo Weather Client for Cox's Bazar
 *
 * Every lookup degrades instead of failing: when Open-Meteo is unreachable,
 * slow or returns something unexpected, the fetch yields `null` and callers
 * fill in defaults (30°C max, 25°C min).
 */

import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { createTimedSignal, describeFetchFailure } from '../utils/abort.js';
import { errorMessage } from '../oauth/errors.js';
import { addDays, isoDate } from './itinerary.js';
import { describeWeatherCode } from './weather-codes.js';

export const LOCATION_NAME = "Cox's Bazar, Bangladesh";
export const LATITUDE = 21.4272;
export const LONGITUDE = 92.0058;
export const TIMEZONE = 'Asia/Dhaka';
export const OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';

export const DEFAULT_MAX_TEMP = 30;
export const DEFAULT_MIN_TEMP = 25;
const DEFAULT_WIND_SPEED = 10;

const numberSeries = z.array(z.number().nullable()).optional();

const openMeteoSchema = z.object({
  daily: z
    .object({
      time: z.array(z.string()).optional(),
      temperature_2m_max: numberSeries,
      temperature_2m_min: numberSeries,
      precipitation_sum: numberSeries,
      weathercode: numberSeries,
      windspeed_10m_max: numberSeries,
      sunrise: z.array(z.string()).optional(),
      sunset: z.array(z.string()).optional(),
    })
    .optional(),
  current: z
    .object({
      temperature_2m: z.number().optional(),
      weathercode: z.number().optional(),
      windspeed_10m: z.number().optional(),
    })
    .optional(),
});

export type OpenMeteoResponse = z.infer<typeof openMeteoSchema>;

export interface DailyForecast {
  day: number;
  date: string;
  weather: string;
  tempMin: number;
  tempMax: number;
  tempAvg: number;
  precipitation: number;
  windspeed: number;
  sunrise: string;
  sunset: string;
}

export interface WeatherForecast {
  location: string;
  startDate: string;
  timezone: string;
  /** False when Open-Meteo could not be used and every value is a default */
  live: boolean;
  forecast: DailyForecast[];
}

export interface WeatherClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function at(series: Array<number | null> | undefined, index: number): number | undefined {
  const value = series?.[index];
  return value === null || value === undefined ? undefined : value;
}

function average(values: number[], fallback: number): number {
  if (values.length === 0) {
    return fallback;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** `2025-01-15T06:32` -> `06:32` */
function clockTime(value: string | undefined): string {
  if (!value) {
    return 'N/A';
  }
  const index = value.indexOf('T');
  return index === -1 ? value : value.slice(index + 1);
}

export class WeatherClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WeatherClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? OPEN_METEO_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(start: Date, days: number, fields: { daily?: string[]; current?: string[] }): string {
    const params = new URLSearchParams({
      latitude: String(LATITUDE),
      longitude: String(LONGITUDE),
    });
    if (fields.daily?.length) {
      params.set('daily', fields.daily.join(','));
    }
    if (fields.current?.length) {
      params.set('current', fields.current.join(','));
    }
    params.set('timezone', TIMEZONE);
    params.set('start_date', isoDate(start));
    params.set('end_date', isoDate(addDays(start, days - 1)));
    return `${this.baseUrl}?${params.toString()}`;
  }

  /**
   * One Open-Meteo request
   * @returns the parsed body, or null on any failure
   */
  async fetchForecast(
    start: Date,
    days: number,
    fields: { daily?: string[]; current?: string[] },
  ): Promise<OpenMeteoResponse | null> {
    const url = this.buildUrl(start, days, fields);
    const timed = createTimedSignal(this.timeoutMs);
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { headers: { Accept: 'application/json' }, signal: timed.signal });
      } catch (err) {
        logger.warn('Weather API unreachable', { reason: describeFetchFailure(err, timed.signal) });
        return null;
      }

      if (!response.ok) {
        logger.warn('Weather API error', { status: response.status, statusText: response.statusText });
        return null;
      }

      const parsed = openMeteoSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn('Weather API returned an unexpected body', { issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (err) {
      logger.warn('Weather API response could not be read', { error: errorMessage(err) });
      return null;
    } finally {
      timed.dispose();
    }
  }

  /**
   * Daily maximum temperatures, exactly `days` entries
   */
  async getTemperatureForecast(start: Date, days: number): Promise<number[]> {
    const data = await this.fetchForecast(start, days, { daily: ['temperature_2m_max'] });
    const maxTemps = (data?.daily?.temperature_2m_max ?? []).filter((value): value is number => value !== null);

    const temperatures: number[] = [];
    for (let i = 0; i < days; i++) {
      const value = maxTemps[i] ?? maxTemps[maxTemps.length - 1] ?? DEFAULT_MAX_TEMP;
      temperatures.push(round1(value));
    }
    return temperatures;
  }

  /**
   * Per-day forecast for an itinerary
   */
  async getWeatherForecast(start: Date, days: number): Promise<WeatherForecast> {
    const data = await this.fetchForecast(start, days, {
      daily: [
        'temperature_2m_max',
        'temperature_2m_min',
        'precipitation_sum',
        'weathercode',
        'windspeed_10m_max',
        'sunrise',
        'sunset',
      ],
    });
    const daily = data?.daily;

    const forecast: DailyForecast[] = [];
    for (let i = 0; i < days; i++) {
      const tempMax = round1(at(daily?.temperature_2m_max, i) ?? DEFAULT_MAX_TEMP);
      const tempMin = round1(at(daily?.temperature_2m_min, i) ?? DEFAULT_MIN_TEMP);
      const code = at(daily?.weathercode, i);
      forecast.push({
        day: i + 1,
        date: daily?.time?.[i] ?? isoDate(addDays(start, i)),
        weather: code === undefined ? 'Unknown' : describeWeatherCode(code),
        tempMin,
        tempMax,
        tempAvg: round1((tempMin + tempMax) / 2),
        precipitation: round1(at(daily?.precipitation_sum, i) ?? 0),
        windspeed: round1(at(daily?.windspeed_10m_max, i) ?? DEFAULT_WIND_SPEED),
        sunrise: clockTime(daily?.sunrise?.[i]),
        sunset: clockTime(daily?.sunset?.[i]),
      });
    }

    return {
      location: LOCATION_NAME,
      startDate: isoDate(start),
      timezone: TIMEZONE,
      live: data !== null,
      forecast,
    };
  }

  /**
   * Body of `weather://coxsbazar/current`
   */
  async getCurrentReport(today: Date): Promise<Record<string, unknown>> {
    const data = await this.fetchForecast(today, 1, {
      daily: ['temperature_2m_max', 'temperature_2m_min', 'precipitation_sum', 'weathercode'],
      current: ['temperature_2m', 'weathercode', 'windspeed_10m'],
    });

    if (!data) {
      return {
        location: LOCATION_NAME,
        date: isoDate(today),
        error: 'Unable to fetch weather data',
        current: { temperature: DEFAULT_MAX_TEMP, conditions: 'Unknown' },
        today_forecast: { max_temperature: DEFAULT_MAX_TEMP, min_temperature: DEFAULT_MIN_TEMP },
      };
    }

    const current = data.current;
    return {
      location: LOCATION_NAME,
      coordinates: { latitude: LATITUDE, longitude: LONGITUDE },
      date: isoDate(today),
      current: {
        temperature: round1(current?.temperature_2m ?? DEFAULT_MAX_TEMP),
        conditions: describeWeatherCode(current?.weathercode ?? 0),
        wind_speed: round1(current?.windspeed_10m ?? 0),
      },
      today_forecast: {
        max_temperature: round1(at(data.daily?.temperature_2m_max, 0) ?? DEFAULT_MAX_TEMP),
        min_temperature: round1(at(data.daily?.temperature_2m_min, 0) ?? DEFAULT_MIN_TEMP),
        precipitation: round1(at(data.daily?.precipitation_sum, 0) ?? 0),
      },
    };
  }

  /**
   * Body of `weather://coxsbazar/forecast` (7 days)
   */
  async getForecastReport(today: Date, days = 7): Promise<Record<string, unknown>> {
    const data = await this.fetchForecast(today, days, {
      daily: ['temperature_2m_max', 'temperature_2m_min', 'precipitation_sum', 'weathercode', 'windspeed_10m_max'],
    });

    if (!data) {
      const dates = Array.from({ length: days }, (_, i) => isoDate(addDays(today, i)));
      return {
        location: LOCATION_NAME,
        forecast_period: `${dates[0]} to ${dates[dates.length - 1]}`,
        error: 'Unable to fetch complete weather data',
        forecast: dates.map((date) => ({
          date,
          max_temp: DEFAULT_MAX_TEMP,
          min_temp: DEFAULT_MIN_TEMP,
          precipitation: 0,
          conditions: 'Unknown',
          max_wind_speed: DEFAULT_WIND_SPEED,
        })),
      };
    }

    const daily = data.daily;
    const dates = (daily?.time ?? []).slice(0, days);
    return {
      location: LOCATION_NAME,
      coordinates: { latitude: LATITUDE, longitude: LONGITUDE },
      forecast_period: dates.length > 0 ? `${dates[0]} to ${dates[dates.length - 1]}` : 'Unknown',
      forecast: dates.map((date, i) => ({
        date,
        max_temp: round1(at(daily?.temperature_2m_max, i) ?? DEFAULT_MAX_TEMP),
        min_temp: round1(at(daily?.temperature_2m_min, i) ?? DEFAULT_MIN_TEMP),
        precipitation: round1(at(daily?.precipitation_sum, i) ?? 0),
        conditions: describeWeatherCode(at(daily?.weathercode, i) ?? 0),
        max_wind_speed: round1(at(daily?.windspeed_10m_max, i) ?? DEFAULT_WIND_SPEED),
      })),
    };
  }

  /**
   * Body of `weather://coxsbazar/temperature-summary` (3 days)
   */
  async getTemperatureSummary(today: Date, days = 3): Promise<Record<string, unknown>> {
    const data = await this.fetchForecast(today, days, { daily: ['temperature_2m_max', 'temperature_2m_min'] });

    if (!data) {
      return {
        location: LOCATION_NAME,
        summary: 'Temperature forecast unavailable',
        temperatures: Array.from({ length: days }, (_, i) => ({
          day: i + 1,
          max: DEFAULT_MAX_TEMP,
          min: DEFAULT_MIN_TEMP,
        })),
      };
    }

    const daily = data.daily;
    const temperatures = (daily?.time ?? []).slice(0, days).map((date, i) => ({
      date,
      day: i + 1,
      max_temp: round1(at(daily?.temperature_2m_max, i) ?? DEFAULT_MAX_TEMP),
      min_temp: round1(at(daily?.temperature_2m_min, i) ?? DEFAULT_MIN_TEMP),
    }));

    return {
      location: LOCATION_NAME,
      period: `Next ${days} days`,
      average_max: round1(average(temperatures.map((t) => t.max_temp), DEFAULT_MAX_TEMP)),
      average_min: round1(average(temperatures.map((t) => t.min_temp), DEFAULT_MIN_TEMP)),
      daily_temperatures: temperatures,
    };
  }
}
