import { readFileSync } from 'fs';
import process from 'process';
import console from 'console';
import { z } from 'zod';
import type { AnalysisThresholds } from '../models';
import { ConfigError } from '../lib/errors';

const secret = (name: string) =>
  z
    .string()
    .min(1, `${name} is missing`)
    .refine((value) => !value.startsWith('YOUR_'), `${name} is still a placeholder`);

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

function isLocale(value: string): boolean {
  try {
    return Intl.NumberFormat.supportedLocalesOf([value]).length > 0;
  } catch {
    return false;
  }
}

const ConfigSchema = z.object({
  qweather: z.object({
    api_key: secret('QWEATHER_API_KEY'),
    location_id: z.string().min(1),
    api_host: z.string().min(1).optional(),
  }),
  serverchan: z.object({
    sendkey: secret('SERVERCHAN_SENDKEY'),
  }),
  location_name: z.string().min(1, 'location_name is missing'),
  settings: z
    .object({
      analysis_days: z.number().int().positive().default(7),
      data_retention_days: z.number().int().positive().default(30),
      data_dir: z.string().default('data'),
      locale: z.string().refine(isLocale, 'unsupported locale').default('zh-CN'),
      timezone: z.string().refine(isTimeZone, 'unknown time zone').default('Asia/Shanghai'),
      notify_on_failure: z.boolean().default(true),
      execution_window: z
        .object({
          start_hour: z.number().int().min(0).max(23),
          end_hour: z.number().int().min(1).max(24),
        })
        .refine((w) => w.start_hour < w.end_hour, 'start_hour must be before end_hour')
        .optional(),
    })
    .default({}),
  analysis: z
    .object({
      temp_alert_threshold: z.number().default(3),
      temp_change_threshold: z.number().default(1.5),
      hot_warning_temp: z.number().default(35),
      cold_warning_temp: z.number().default(5),
      temp_range_threshold: z.number().default(10),
      rain_warning_probability: z.number().default(70),
      sudden_change_threshold: z.number().default(8),
    })
    .default({}),
});

export interface ExecutionWindow {
  startHour: number;
  endHour: number;
}

export interface AppConfig {
  apiKey: string;
  locationId: string;
  apiHost?: string;
  sendkey: string;
  locationName: string;
  analysisDays: number;
  retentionDays: number;
  dataDir: string;
  locale: string;
  timeZone: string;
  notifyOnFailure: boolean;
  executionWindow?: ExecutionWindow;
  thresholds: AnalysisThresholds;
}

export type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Secrets from the environment win over the checked-in document
function applyEnvOverrides(doc: Record<string, unknown>, env: Env): Record<string, unknown> {
  const section = (key: string): Record<string, unknown> => {
    const value = doc[key];
    return isRecord(value) ? { ...value } : {};
  };
  const qweather = section('qweather');
  const serverchan = section('serverchan');

  if (env.QWEATHER_API_KEY) {
    qweather.api_key = env.QWEATHER_API_KEY;
    console.info('Using QWEATHER_API_KEY from the environment');
  }
  if (env.QWEATHER_LOCATION_ID) {
    qweather.location_id = env.QWEATHER_LOCATION_ID;
  }
  if (env.SERVERCHAN_SENDKEY) {
    serverchan.sendkey = env.SERVERCHAN_SENDKEY;
    console.info('Using SERVERCHAN_SENDKEY from the environment');
  }
  return { ...doc, qweather, serverchan };
}

export function parseConfig(doc: unknown, env: Env = process.env): AppConfig {
  if (!isRecord(doc)) {
    throw new ConfigError('Configuration must be a JSON object');
  }
  const parsed = ConfigSchema.safeParse(applyEnvOverrides(doc, env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`, { cause: parsed.error });
  }

  const { qweather, serverchan, location_name, settings, analysis } = parsed.data;
  const executionWindow = settings.execution_window && {
    startHour: settings.execution_window.start_hour,
    endHour: settings.execution_window.end_hour,
  };
  return {
    apiKey: qweather.api_key,
    locationId: qweather.location_id,
    ...(qweather.api_host !== undefined ? { apiHost: qweather.api_host } : {}),
    sendkey: serverchan.sendkey,
    locationName: location_name,
    analysisDays: settings.analysis_days,
    retentionDays: settings.data_retention_days,
    dataDir: settings.data_dir,
    locale: settings.locale,
    timeZone: settings.timezone,
    notifyOnFailure: settings.notify_on_failure,
    ...(executionWindow ? { executionWindow } : {}),
    thresholds: {
      tempAlertThreshold: analysis.temp_alert_threshold,
      tempChangeThreshold: analysis.temp_change_threshold,
      hotWarningTemp: analysis.hot_warning_temp,
      coldWarningTemp: analysis.cold_warning_temp,
      tempRangeThreshold: analysis.temp_range_threshold,
      rainWarningProbability: analysis.rain_warning_probability,
      suddenChangeThreshold: analysis.sudden_change_threshold,
    },
  };
}

/** Reads the static configuration document once, at startup. */
export function loadConfig(
  configFile = process.env.WEATHER_BOT_CONFIG ?? 'config.json',
  env: Env = process.env,
): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configFile, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Could not read configuration file ${configFile}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${configFile} is not valid JSON`, { cause: err });
  }
  return parseConfig(doc, env);
}
