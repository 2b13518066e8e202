import type { ForecastRecord, WeatherHistory } from '../models';
import { shiftDate } from './weatherUtils';

export function emptyHistory(): WeatherHistory {
  return { records: [] };
}

function byDate(a: ForecastRecord, b: ForecastRecord): number {
  return a.date < b.date ? -1 : a.date > b.date ? 1 : 0;
}

/**
 * Inserts `record`, replacing any entry for the same date, and returns a new
 * history sorted ascending by date. The input is left untouched.
 */
export function appendRecord(history: WeatherHistory, record: ForecastRecord): WeatherHistory {
  const records = history.records.filter((r) => r.date !== record.date);
  records.push(record);
  records.sort(byDate);
  return { records };
}

/** Drops every record dated before `referenceDate - retentionDays`. */
export function pruneHistory(
  history: WeatherHistory,
  retentionDays: number,
  referenceDate: string,
): WeatherHistory {
  const cutoff = shiftDate(referenceDate, -retentionDays);
  return { records: history.records.filter((r) => r.date >= cutoff) };
}

export function latestDate(history: WeatherHistory): string | undefined {
  return history.records.reduce<string | undefined>(
    (latest, r) => (latest === undefined || r.date > latest ? r.date : latest),
    undefined,
  );
}

/** The last `days` records strictly before `date`, oldest first. */
export function recordsBefore(
  records: ForecastRecord[],
  date: string,
  days: number,
): ForecastRecord[] {
  const preceding = records.filter((r) => r.date < date).sort(byDate);
  return days > 0 ? preceding.slice(-days) : [];
}
