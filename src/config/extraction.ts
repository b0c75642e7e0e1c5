import type { ExtractionOptions } from '../services/invoiceExtraction';
import { DEFAULT_EXTRACTION_OPTIONS } from '../services/invoiceExtraction';
import type { AppConfig } from './env';

type ExtractionEnv = Pick<
  AppConfig,
  'METER_POINT_ID_LENGTH' | 'KWH_MIN' | 'KWH_MAX' | 'PREVIOUS_PERIOD_WINDOW_CHARS' | 'CURRENT_READING_POLICY'
>;

export function extractionOptionsFromConfig(env: ExtractionEnv): ExtractionOptions {
  return {
    meterPointIdLength: env.METER_POINT_ID_LENGTH,
    kwhRange: { min: env.KWH_MIN, max: env.KWH_MAX },
    previousPeriodWindowChars: env.PREVIOUS_PERIOD_WINDOW_CHARS,
    previousPeriodKeywords: DEFAULT_EXTRACTION_OPTIONS.previousPeriodKeywords,
    currentReadingPolicy: env.CURRENT_READING_POLICY,
  };
}
