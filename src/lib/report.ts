import type { AnalysisResult, ComfortLevel, ForecastRecord } from '../models';
import { fillTemplate, getMessages, type ReportMessages } from './messages';
import {
  formatNumber,
  formatTimestamp,
  isFiniteNumber,
  isRainCode,
  isSnowCode,
} from './weatherUtils';

export interface ReportOptions {
  locationName: string;
  locale: string;
  timeZone: string;
  generatedAt: Date;
}

export interface Report {
  title: string;
  body: string;
}

const WIDE_RANGE = 12;
const MODERATE_RANGE = 8;
const HEAVY_RAIN_PROBABILITY = 70;
const COLD_MORNING = 10;
const HOT_DAY = 30;

/** What to wear for the coldest part of the day. */
export function morningClothing(lowTemp: number, texts: ReportMessages): string {
  const band = texts.clothing.find((entry) => lowTemp < entry.below);
  return band ? band.text : texts.clothingDefault;
}

/**
 * Dresses for the low, then adds a midday tip when the day-night range is
 * 8°C or more. From 12°C up the advice is to dress in layers.
 */
export function clothingAdvice(
  lowTemp: number,
  highTemp: number | null,
  texts: ReportMessages,
  locale: string,
): string {
  const morning = morningClothing(lowTemp, texts);
  if (!isFiniteNumber(highTemp)) return morning;

  const range = highTemp - lowTemp;
  const tips = texts.clothingRange;
  let frame: string;
  let tip: string;
  if (range >= WIDE_RANGE) {
    frame = tips.wide;
    tip = highTemp >= 20 ? tips.wideWarm : highTemp >= 15 ? tips.wideMild : tips.wideCool;
  } else if (range >= MODERATE_RANGE) {
    frame = tips.moderate;
    tip = highTemp >= 20 ? tips.moderateWarm : tips.moderateCool;
  } else {
    return morning;
  }

  return fillTemplate(frame, {
    MORNING: morning,
    TEMP_RANGE: formatNumber(range, locale),
    MIDDAY_TIP: fillTemplate(tip, { HIGH_TEMP: formatNumber(highTemp, locale) }),
  });
}

export function activityAdvice(
  record: ForecastRecord,
  comfort: ComfortLevel | null,
  texts: ReportMessages,
): string {
  const precip = record.precipitation_probability;
  if (isFiniteNumber(precip) && precip > HEAVY_RAIN_PROBABILITY) return texts.activity.heavyRain;
  if (isRainCode(record.condition_code) || isSnowCode(record.condition_code)) {
    return texts.activity.wet;
  }
  return comfort ? texts.activity[comfort] : texts.activity.default;
}

export function healthAdvice(
  record: ForecastRecord,
  analysis: AnalysisResult,
  texts: ReportMessages,
): string {
  const { high_temp: high, low_temp: low } = record;
  const delta = analysis.metrics.temp_delta;
  const alertDirection = analysis.category === 'Alert' && isFiniteNumber(delta) ? delta : 0;
  const tips: string[] = [];

  if (analysis.category === 'Falling' || alertDirection < 0) {
    tips.push(texts.health.falling);
  } else if (analysis.category === 'Rising' || alertDirection > 0) {
    tips.push(texts.health.rising);
  }
  if (isFiniteNumber(high) && isFiniteNumber(low) && high - low > WIDE_RANGE) {
    tips.push(texts.health.wideRange);
  }
  if (isFiniteNumber(low) && low < COLD_MORNING) {
    tips.push(texts.health.coldMorning);
  }
  if (isFiniteNumber(high) && high > HOT_DAY) {
    tips.push(texts.health.hot);
  }
  return tips.length > 0 ? tips.join(texts.health.separator) : texts.health.none;
}

function optionalNumber(value: number | null | undefined, locale: string): string | undefined {
  return isFiniteNumber(value) ? formatNumber(value, locale) : undefined;
}

export function formatReport(
  record: ForecastRecord,
  analysis: AnalysisResult,
  options: ReportOptions,
): Report {
  const { locationName, locale, timeZone, generatedAt } = options;
  const texts = getMessages(locale);

  const windParts = [record.wind_dir, record.wind_scale].filter(Boolean);
  const warnings =
    analysis.warnings.length > 0
      ? [texts.warningsHeading, ...analysis.warnings.map((w) => `- ${w}`)].join('\n')
      : undefined;

  const { metrics } = analysis;
  const rainyDays = metrics.recent_rainy_days;

  const body = fillTemplate(texts.report, {
    LOCATION: locationName,
    DATE: record.date,
    CONDITION: record.condition_text ?? record.condition_code,
    HIGH_TEMP: optionalNumber(record.high_temp, locale),
    LOW_TEMP: optionalNumber(record.low_temp, locale),
    PRECIP_PROBABILITY: optionalNumber(record.precipitation_probability, locale),
    HUMIDITY: record.humidity !== undefined ? String(record.humidity) : undefined,
    WIND_INFO: windParts.length > 0 ? windParts.join(' ') : undefined,
    SUMMARY: analysis.trend_summary,
    TEMP_RANGE: optionalNumber(metrics.temp_range, locale),
    AVG_RANGE: optionalNumber(metrics.avg_temp_range, locale),
    VOLATILITY: analysis.volatility ? texts.volatility[analysis.volatility] : undefined,
    TEMP_STD: optionalNumber(metrics.temp_std, locale),
    PRECIP_BAND: analysis.precipitation_band
      ? texts.precipitationBands[analysis.precipitation_band]
      : undefined,
    RAINY_DAYS: isFiniteNumber(rainyDays) ? String(rainyDays) : undefined,
    APPARENT_TEMP: optionalNumber(metrics.apparent_temp, locale),
    COMFORT_LEVEL: analysis.comfort_level ? texts.comfortLevels[analysis.comfort_level] : undefined,
    WARNINGS: warnings,
    CLOTHING: isFiniteNumber(record.low_temp)
      ? clothingAdvice(record.low_temp, record.high_temp, texts, locale)
      : undefined,
    ACTIVITY: activityAdvice(record, analysis.comfort_level, texts),
    HEALTH: healthAdvice(record, analysis, texts),
    GENERATED_AT: formatTimestamp(generatedAt, timeZone),
  });

  return {
    title: fillTemplate(texts.title, { LOCATION: locationName, DATE: record.date }),
    body,
  };
}

export function formatFailureReport(
  message: string,
  options: Pick<ReportOptions, 'locale' | 'timeZone' | 'generatedAt'>,
): Report {
  const texts = getMessages(options.locale);
  return {
    title: texts.failureTitle,
    body: fillTemplate(texts.failureBody, {
      GENERATED_AT: formatTimestamp(options.generatedAt, options.timeZone),
      ERROR_MESSAGE: message,
    }),
  };
}
