import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');

export const ForecastRecordSchema = z
  .object({
    date: isoDate,
    high_temp: z.number().nullable(),
    low_temp: z.number().nullable(),
    precipitation_probability: z.number().nullable(),
    condition_code: z.string(),
    fetched_at: z.string(),

    // Descriptive extras; humidity feeds the apparent temperature
    condition_text: z.string().optional(),
    humidity: z.number().optional(),
    wind_scale: z.string().optional(),
    wind_dir: z.string().optional(),
  })
  .strict();

export type ForecastRecord = z.infer<typeof ForecastRecordSchema>;

export const WeatherHistorySchema = z
  .object({
    records: z.array(ForecastRecordSchema),
  })
  .strict()
  .superRefine((history, ctx) => {
    const seen = new Set<string>();
    history.records.forEach((record, index) => {
      if (seen.has(record.date)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['records', index, 'date'],
          message: `duplicate record for ${record.date}`,
        });
      }
      seen.add(record.date);
    });
  });

export type WeatherHistory = z.infer<typeof WeatherHistorySchema>;

export const RUN_STATUSES = ['Success', 'Failure'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const RunRecordSchema = z
  .object({
    last_run_timestamp: z.string(),
    last_run_status: z.enum(RUN_STATUSES),
    last_error: z.string().optional(),
  })
  .strict();

export type RunRecord = z.infer<typeof RunRecordSchema>;

export type TrendCategory = 'Stable' | 'Rising' | 'Falling' | 'Alert' | 'InsufficientData';

export type ComfortLevel = 'Comfortable' | 'Mild' | 'Cool' | 'Hot';
export type PrecipitationBand = 'Dry' | 'PossibleRain' | 'LikelyRain';
export type Volatility = 'High' | 'Normal';

export interface AnalysisResult {
  trend_summary: string;
  category: TrendCategory;
  metrics: Record<string, number>;
  warnings: string[];
  // null when tomorrow's values or the window do not allow a rating
  comfort_level: ComfortLevel | null;
  precipitation_band: PrecipitationBand | null;
  volatility: Volatility | null;
}

export interface AnalysisThresholds {
  tempAlertThreshold: number;
  tempChangeThreshold: number;
  hotWarningTemp: number;
  coldWarningTemp: number;
  tempRangeThreshold: number;
  rainWarningProbability: number;
  suddenChangeThreshold: number;
}

export interface NotifyResult {
  ok: true;
  pushId?: string;
}
