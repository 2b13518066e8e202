import axios from 'axios';
import console from 'console';
import { z } from 'zod';
import type { ForecastRecord } from '../models';
import { FetchError, describeError } from './errors';

export const DEFAULT_QWEATHER_HOST = 'devapi.qweather.com';

export interface FetchForecastOptions {
  locationId: string;
  apiKey: string;
  apiHost?: string;
  now?: () => Date;
}

// QWeather reports every numeric field as a string
const QWeatherDaySchema = z.object({
  fxDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  tempMax: z.string(),
  tempMin: z.string(),
  iconDay: z.string(),
  textDay: z.string().optional(),
  humidity: z.string().optional(),
  pop: z.string().optional(),
  precip: z.string().optional(),
  windScaleDay: z.string().optional(),
  windDirDay: z.string().optional(),
});

const QWeatherResponseSchema = z.object({
  code: z.string(),
  daily: z.array(QWeatherDaySchema).optional(),
});

type QWeatherDay = z.infer<typeof QWeatherDaySchema>;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

function requiredNumber(value: string | undefined, field: string): number {
  const parsed = isBlank(value) ? NaN : Number(value);
  if (!isFinite(parsed)) {
    throw new FetchError(`Malformed forecast: ${field} is not a number (${String(value)})`);
  }
  return parsed;
}

export function toForecastRecord(day: QWeatherDay, fetchedAt: Date): ForecastRecord {
  const humidity = isBlank(day.humidity) ? NaN : Number(day.humidity);
  // pop may be absent or an empty string
  const pop = isBlank(day.pop) ? day.precip : day.pop;
  return {
    date: day.fxDate,
    high_temp: requiredNumber(day.tempMax, 'tempMax'),
    low_temp: requiredNumber(day.tempMin, 'tempMin'),
    precipitation_probability: requiredNumber(pop, 'pop'),
    condition_code: day.iconDay,
    fetched_at: fetchedAt.toISOString(),
    ...(day.textDay !== undefined ? { condition_text: day.textDay } : {}),
    ...(isFinite(humidity) ? { humidity } : {}),
    ...(day.windScaleDay !== undefined ? { wind_scale: day.windScaleDay } : {}),
    ...(day.windDirDay !== undefined ? { wind_dir: day.windDirDay } : {}),
  };
}

/**
 * Fetches the 3-day forecast for one location and returns tomorrow's entry.
 * One attempt only; the daily trigger is the retry.
 */
export async function fetchTomorrowForecast(options: FetchForecastOptions): Promise<ForecastRecord> {
  const { locationId, apiKey, apiHost = DEFAULT_QWEATHER_HOST, now = () => new Date() } = options;
  const url = `https://${apiHost}/v7/weather/3d`;

  let data: unknown;
  try {
    const res = await axios.get<unknown>(url, {
      params: { location: locationId, key: apiKey },
      timeout: 10_000,
    });
    data = res.data;
  } catch (err) {
    throw new FetchError(`Weather request failed: ${describeError(err)}`, { cause: err });
  }

  const parsed = QWeatherResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new FetchError('Malformed forecast response', { cause: parsed.error });
  }
  if (parsed.data.code !== '200') {
    throw new FetchError(`Weather API returned code ${parsed.data.code}`);
  }

  const tomorrow = parsed.data.daily?.[1];
  if (!tomorrow) {
    throw new FetchError('Malformed forecast response: no entry for tomorrow');
  }

  const record = toForecastRecord(tomorrow, now());
  console.info({ forecast: record });
  return record;
}
