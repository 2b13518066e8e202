const DAY_MS = 24 * 60 * 60 * 1000;

export function unixToDate(unixtime: number): string {
  const date = new Date(unixtime);
  return date.toISOString().slice(0, 10);
}

export function isoDateToUnix(isoString: string): number {
  const date = new Date(`${isoString}T00:00:00Z`);
  if (isNaN(date.getTime())) {
    throw new Error(`Invalid ISO date string: ${isoString}`);
  }
  return date.getTime();
}

/** Moves a YYYY-MM-DD calendar day by whole days, independent of local time. */
export function shiftDate(isoDate: string, days: number): string {
  return unixToDate(isoDateToUnix(isoDate) + days * DAY_MS);
}

function zonedParts(date: Date, timeZone: string): Record<string, string> {
  const parts = new Intl.DateTimeFormat('en-GB', {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone,
  }).formatToParts(date);
  return Object.fromEntries(parts.map((p) => [p.type, p.value]));
}

export function hourInTimeZone(date: Date, timeZone: string): number {
  return Number(zonedParts(date, timeZone).hour);
}

/** e.g. "2026-01-15 10:30" as seen in the given timezone */
export function formatTimestamp(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}`;
}

export function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && isFinite(value);
}

export function mean(values: number[]): number {
  if (values.length === 0) throw new Error('mean of an empty list');
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation; needs at least two values. */
export function stdev(values: number[]): number {
  if (values.length < 2) throw new Error('stdev needs at least two values');
  const avg = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

// QWeather icon codes: 3xx rain, 4xx snow
export function isRainCode(code: string): boolean {
  return /^3\d\d$/.test(code);
}

export function isSnowCode(code: string): boolean {
  return /^4\d\d$/.test(code);
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function formatNumber(value: number, locale: string, signed = false): string {
  return new Intl.NumberFormat(locale, {
    minimumFractionDigits: 1,
    maximumFractionDigits: 1,
    signDisplay: signed ? 'exceptZero' : 'auto',
  }).format(value);
}
