import console from 'console';
import type { AppConfig } from '../config/env';
import { analyzeTrend } from '../lib/analyzeTrend';
import { DataStore } from '../lib/dataStore';
import { describeError } from '../lib/errors';
import { fetchTomorrowForecast } from '../lib/fetchWeatherData';
import { appendRecord, latestDate, pruneHistory } from '../lib/history';
import { sendNotification } from '../lib/notify';
import { formatFailureReport, formatReport, type Report } from '../lib/report';
import { hourInTimeZone } from '../lib/weatherUtils';

export interface HandlerResult {
  status: number;
  body?: string;
}

export interface HandlerDeps {
  fetchForecast: typeof fetchTomorrowForecast;
  notify: typeof sendNotification;
  store: DataStore;
  now: () => Date;
}

function withinExecutionWindow(config: AppConfig, now: Date): boolean {
  const { executionWindow } = config;
  if (!executionWindow) return true;
  const hour = hourInTimeZone(now, config.timeZone);
  return executionWindow.startHour <= hour && hour < executionWindow.endHour;
}

export async function handler(
  config: AppConfig,
  deps: Partial<HandlerDeps> = {},
): Promise<HandlerResult> {
  const now = deps.now ?? (() => new Date());
  const fetchForecast = deps.fetchForecast ?? fetchTomorrowForecast;
  const notify = deps.notify ?? sendNotification;
  const store = deps.store ?? new DataStore({ dataDir: config.dataDir, now });

  const recordFailure = async (message: string): Promise<void> => {
    try {
      await store.recordRun('Failure', message);
    } catch (err) {
      console.error('Could not update the run record:', err);
    }
  };

  if (!withinExecutionWindow(config, now())) {
    console.warn('Outside the execution window, skipping run');
    return { status: 200, body: 'skipped' };
  }

  // Fetch, analyze and persist. Any failure here aborts before notifying.
  let report: Report;
  try {
    const record = await fetchForecast({
      locationId: config.locationId,
      apiKey: config.apiKey,
      ...(config.apiHost !== undefined ? { apiHost: config.apiHost } : {}),
      now,
    });

    const history = await store.loadHistory();
    console.info(`Loaded ${history.records.length} history records`);

    const analysis = analyzeTrend(history.records, record, config.thresholds, {
      analysisDays: config.analysisDays,
      locale: config.locale,
    });
    console.info({ category: analysis.category, metrics: analysis.metrics });

    report = formatReport(record, analysis, {
      locationName: config.locationName,
      locale: config.locale,
      timeZone: config.timeZone,
      generatedAt: now(),
    });

    const appended = appendRecord(history, record);
    const reference = latestDate(appended) ?? record.date;
    await store.saveHistory(pruneHistory(appended, config.retentionDays, reference));
  } catch (err) {
    const message = describeError(err);
    console.error('Failure in weather handler:', err);
    await recordFailure(message);

    if (config.notifyOnFailure) {
      const alert = formatFailureReport(message, {
        locale: config.locale,
        timeZone: config.timeZone,
        generatedAt: now(),
      });
      try {
        await notify(alert.title, alert.body, config.sendkey);
      } catch (alertErr) {
        console.error('Could not send the failure alert:', alertErr);
      }
    }
    return { status: 500, body: message };
  }

  // History is saved; a delivery failure marks the run failed but keeps the data.
  try {
    await notify(report.title, report.body, config.sendkey);
  } catch (err) {
    const message = describeError(err);
    console.error('Notification failed after history was saved:', err);
    await recordFailure(message);
    return { status: 500, body: message };
  }

  try {
    await store.recordRun('Success');
  } catch (err) {
    console.error('Could not update the run record:', err);
    return { status: 500, body: describeError(err) };
  }

  console.info('Weather run completed');
  return { status: 200 };
}
