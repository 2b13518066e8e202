import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockedGet } = vi.hoisted(() => ({
  mockedGet: vi.fn<(url: string, config?: unknown) => Promise<{ data: unknown }>>(),
}));

vi.mock('axios', () => ({
  default: {
    get: mockedGet,
    isAxiosError: (err: unknown) =>
      typeof err === 'object' && err !== null && 'isAxiosError' in err,
  },
}));

import { FetchError } from './errors';
import { fetchTomorrowForecast } from './fetchWeatherData';

const NOW = new Date('2026-03-09T10:15:00.000Z');
const OPTIONS = { locationId: '101190101', apiKey: 'test-key', now: () => NOW };

function qweatherDay(fxDate: string, overrides: Record<string, string> = {}) {
  return {
    fxDate,
    tempMax: '24',
    tempMin: '11',
    iconDay: '101',
    textDay: 'Cloudy',
    humidity: '58',
    pop: '40',
    precip: '0.0',
    windScaleDay: '1-3',
    windDirDay: 'SE',
    ...overrides,
  };
}

function respond(data: unknown) {
  mockedGet.mockResolvedValueOnce({ data });
}

describe('fetchTomorrowForecast', () => {
  beforeEach(() => {
    mockedGet.mockReset();
  });

  it('normalizes the second daily entry into a forecast record', async () => {
    respond({
      code: '200',
      daily: [qweatherDay('2026-03-09'), qweatherDay('2026-03-10'), qweatherDay('2026-03-11')],
    });

    const record = await fetchTomorrowForecast(OPTIONS);

    expect(record).toEqual({
      date: '2026-03-10',
      high_temp: 24,
      low_temp: 11,
      precipitation_probability: 40,
      condition_code: '101',
      fetched_at: '2026-03-09T10:15:00.000Z',
      condition_text: 'Cloudy',
      humidity: 58,
      wind_scale: '1-3',
      wind_dir: 'SE',
    });
    expect(mockedGet).toHaveBeenCalledWith('https://devapi.qweather.com/v7/weather/3d', {
      params: { location: '101190101', key: 'test-key' },
      timeout: 10_000,
    });
  });

  it('uses the configured API host', async () => {
    respond({ code: '200', daily: [qweatherDay('2026-03-09'), qweatherDay('2026-03-10')] });

    await fetchTomorrowForecast({ ...OPTIONS, apiHost: 'abc123.re.qweatherapi.com' });

    expect(mockedGet.mock.calls[0][0]).toBe('https://abc123.re.qweatherapi.com/v7/weather/3d');
  });

  it('falls back to the precipitation amount when no probability is given', async () => {
    const { pop: _pop, ...withoutPop } = qweatherDay('2026-03-10', { precip: '2.5' });
    respond({ code: '200', daily: [qweatherDay('2026-03-09'), withoutPop] });

    const record = await fetchTomorrowForecast(OPTIONS);

    expect(record.precipitation_probability).toBe(2.5);
  });

  it('falls back to the precipitation amount when the probability is blank', async () => {
    respond({
      code: '200',
      daily: [qweatherDay('2026-03-09'), qweatherDay('2026-03-10', { pop: '', precip: '1.2' })],
    });

    const record = await fetchTomorrowForecast(OPTIONS);

    expect(record.precipitation_probability).toBe(1.2);
  });

  it('rejects an API status code other than 200', async () => {
    respond({ code: '401' });

    await expect(fetchTomorrowForecast(OPTIONS)).rejects.toThrow('Weather API returned code 401');
  });

  it('rejects a payload without an entry for tomorrow', async () => {
    respond({ code: '200', daily: [qweatherDay('2026-03-09')] });

    await expect(fetchTomorrowForecast(OPTIONS)).rejects.toThrow(
      'Malformed forecast response: no entry for tomorrow',
    );
  });

  it('rejects a payload missing a required field', async () => {
    const { tempMax: _tempMax, ...withoutMax } = qweatherDay('2026-03-10');
    respond({ code: '200', daily: [qweatherDay('2026-03-09'), withoutMax] });

    await expect(fetchTomorrowForecast(OPTIONS)).rejects.toBeInstanceOf(FetchError);
  });

  it('rejects non-numeric temperatures', async () => {
    respond({
      code: '200',
      daily: [qweatherDay('2026-03-09'), qweatherDay('2026-03-10', { tempMin: 'n/a' })],
    });

    await expect(fetchTomorrowForecast(OPTIONS)).rejects.toThrow(
      'Malformed forecast: tempMin is not a number (n/a)',
    );
  });

  it('wraps HTTP failures with the response status', async () => {
    mockedGet.mockRejectedValueOnce({
      isAxiosError: true,
      message: 'Request failed with status code 403',
      response: { status: 403 },
    });

    await expect(fetchTomorrowForecast(OPTIONS)).rejects.toThrow(
      'Weather request failed: HTTP 403: Request failed with status code 403',
    );
  });

  it('wraps network errors', async () => {
    mockedGet.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND'));

    const err = await fetchTomorrowForecast(OPTIONS).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toHaveProperty('message', 'Weather request failed: getaddrinfo ENOTFOUND');
  });
});
