import console from 'console';
import type {
  AnalysisResult,
  AnalysisThresholds,
  ComfortLevel,
  ForecastRecord,
  PrecipitationBand,
  TrendCategory,
} from '../models';
import { recordsBefore } from './history';
import { fillTemplate, getMessages, type ReportMessages } from './messages';
import { formatNumber, isFiniteNumber, isRainCode, mean, round1, stdev } from './weatherUtils';

export interface AnalyzeOptions {
  analysisDays: number;
  locale: string;
}

const MIN_WINDOW_VALUES = 2;
const HIGH_VOLATILITY_STDEV = 5;
const RAINY_DAY_PROBABILITY = 50;

export function classifyTrend(tempDelta: number, thresholds: AnalysisThresholds): TrendCategory {
  if (Math.abs(tempDelta) > thresholds.tempAlertThreshold) return 'Alert';
  if (tempDelta > thresholds.tempChangeThreshold) return 'Rising';
  if (tempDelta < -thresholds.tempChangeThreshold) return 'Falling';
  return 'Stable';
}

/** Humidity only counts above 25°C; a missing humidity is taken as 50%. */
export function apparentTemperature(high: number, humidity: number | undefined): number {
  return high > 25 ? high + ((humidity ?? 50) - 50) * 0.1 : high;
}

export function comfortLevel(apparent: number): ComfortLevel {
  if (apparent >= 18 && apparent <= 26) return 'Comfortable';
  if ((apparent >= 15 && apparent < 18) || (apparent > 26 && apparent <= 30)) return 'Mild';
  if (apparent < 15) return 'Cool';
  return 'Hot';
}

export function precipitationBand(probability: number): PrecipitationBand {
  if (probability > 70) return 'LikelyRain';
  if (probability > 40) return 'PossibleRain';
  return 'Dry';
}

function isRainyDay(record: ForecastRecord): boolean {
  const precip = record.precipitation_probability;
  return isRainCode(record.condition_code) || (isFiniteNumber(precip) && precip > RAINY_DAY_PROBABILITY);
}

interface DayFacts {
  metrics: Record<string, number>;
  comfort_level: ComfortLevel | null;
  precipitation_band: PrecipitationBand | null;
}

// Ratings that need only tomorrow's record and a count over the window
function describeDay(today: ForecastRecord, comparison: ForecastRecord[]): DayFacts {
  const { high_temp: high, low_temp: low, precipitation_probability: precip } = today;
  const metrics: Record<string, number> = {
    recent_rainy_days: comparison.filter(isRainyDay).length,
  };
  let comfort: ComfortLevel | null = null;
  if (isFiniteNumber(high)) {
    const apparent = apparentTemperature(high, today.humidity);
    metrics.apparent_temp = round1(apparent);
    comfort = comfortLevel(apparent);
  }
  if (isFiniteNumber(high) && isFiniteNumber(low)) {
    metrics.temp_range = round1(high - low);
  }
  return {
    metrics,
    comfort_level: comfort,
    precipitation_band: isFiniteNumber(precip) ? precipitationBand(precip) : null,
  };
}

function validValues(
  records: ForecastRecord[],
  pick: (r: ForecastRecord) => number | null,
): number[] {
  return records.map(pick).filter(isFiniteNumber);
}

function collectWarnings(
  today: ForecastRecord,
  previous: ForecastRecord | undefined,
  thresholds: AnalysisThresholds,
  texts: ReportMessages,
  locale: string,
): string[] {
  const warnings: string[] = [];
  const { high_temp: high, low_temp: low, precipitation_probability: precip } = today;
  const fmt = (value: number, signed = false) => formatNumber(value, locale, signed);

  if (isFiniteNumber(high) && high >= thresholds.hotWarningTemp) {
    warnings.push(fillTemplate(texts.warnings.hot, { HIGH_TEMP: fmt(high) }));
  }
  if (isFiniteNumber(low) && low <= thresholds.coldWarningTemp) {
    warnings.push(fillTemplate(texts.warnings.cold, { LOW_TEMP: fmt(low) }));
  }
  if (isFiniteNumber(high) && isFiniteNumber(low) && high - low > thresholds.tempRangeThreshold) {
    warnings.push(fillTemplate(texts.warnings.range, { TEMP_RANGE: fmt(high - low) }));
  }
  if (isFiniteNumber(precip) && precip > thresholds.rainWarningProbability) {
    warnings.push(fillTemplate(texts.warnings.rain, { PRECIP_PROBABILITY: fmt(precip) }));
  }
  const previousHigh = previous?.high_temp;
  if (isFiniteNumber(high) && isFiniteNumber(previousHigh)) {
    const change = high - previousHigh;
    if (Math.abs(change) > thresholds.suddenChangeThreshold) {
      warnings.push(fillTemplate(texts.warnings.sudden, { SUDDEN_DELTA: fmt(change, true) }));
    }
  }
  return warnings;
}

/**
 * Compares `today` against the records that precede it in `history`.
 *
 * Only the last `analysisDays` records dated before `today.date` form the
 * comparison window; missing values are left out of the averages. With fewer
 * than two usable highs the result is `InsufficientData`, never an error.
 * Comfort, precipitation band and the rainy-day count need no averages and are
 * filled in either way.
 */
export function analyzeTrend(
  history: ForecastRecord[],
  today: ForecastRecord,
  thresholds: AnalysisThresholds,
  options: AnalyzeOptions,
): AnalysisResult {
  const { analysisDays, locale } = options;
  const texts = getMessages(locale);
  const comparison = recordsBefore(history, today.date, analysisDays);
  const previous = comparison[comparison.length - 1];
  const warnings = collectWarnings(today, previous, thresholds, texts, locale);
  const fmt = (value: number, signed = false) => formatNumber(value, locale, signed);

  const day = describeDay(today, comparison);

  const highs = validValues(comparison, (r) => r.high_temp);
  if (highs.length < MIN_WINDOW_VALUES || !isFiniteNumber(today.high_temp)) {
    console.warn(`Trend analysis skipped: ${highs.length} usable days in the window`);
    return {
      trend_summary: fillTemplate(texts.insufficient, { VALID_DAYS: String(highs.length) }),
      category: 'InsufficientData',
      metrics: { window_days: highs.length, ...day.metrics },
      warnings,
      comfort_level: day.comfort_level,
      precipitation_band: day.precipitation_band,
      volatility: null,
    };
  }

  const avgHigh = mean(highs);
  const tempDelta = today.high_temp - avgHigh;
  const category = classifyTrend(tempDelta, thresholds);
  const spread = stdev(highs);

  const metrics: Record<string, number> = {
    window_days: highs.length,
    avg_high_temp: round1(avgHigh),
    temp_delta: round1(tempDelta),
    temp_std: round1(spread),
  };
  const values: Record<string, string | undefined> = {
    CATEGORY: texts.categories[category],
    WINDOW_DAYS: String(highs.length),
    AVG_HIGH: fmt(avgHigh),
    TEMP_DELTA: fmt(tempDelta, true),
    AVG_LOW: undefined,
    LOW_DELTA: undefined,
    AVG_PRECIP: undefined,
    PRECIP_DELTA: undefined,
  };

  const lows = validValues(comparison, (r) => r.low_temp);
  if (lows.length > 0 && isFiniteNumber(today.low_temp)) {
    const avgLow = mean(lows);
    metrics.avg_low_temp = round1(avgLow);
    metrics.low_temp_delta = round1(today.low_temp - avgLow);
    values.AVG_LOW = fmt(avgLow);
    values.LOW_DELTA = fmt(today.low_temp - avgLow, true);
  }

  const precips = validValues(comparison, (r) => r.precipitation_probability);
  if (precips.length > 0 && isFiniteNumber(today.precipitation_probability)) {
    const avgPrecip = mean(precips);
    metrics.avg_precipitation_probability = round1(avgPrecip);
    metrics.precip_delta = round1(today.precipitation_probability - avgPrecip);
    values.AVG_PRECIP = fmt(avgPrecip);
    values.PRECIP_DELTA = fmt(today.precipitation_probability - avgPrecip, true);
  }

  const ranges = comparison.flatMap((r) =>
    isFiniteNumber(r.high_temp) && isFiniteNumber(r.low_temp) ? [r.high_temp - r.low_temp] : [],
  );
  if (ranges.length > 0 && isFiniteNumber(today.low_temp)) {
    const avgRange = mean(ranges);
    metrics.avg_temp_range = round1(avgRange);
    metrics.range_delta = round1(today.high_temp - today.low_temp - avgRange);
  }

  return {
    trend_summary: fillTemplate(texts.summary, values),
    category,
    metrics: { ...metrics, ...day.metrics },
    warnings,
    comfort_level: day.comfort_level,
    precipitation_band: day.precipitation_band,
    volatility: spread > HIGH_VOLATILITY_STDEV ? 'High' : 'Normal',
  };
}
