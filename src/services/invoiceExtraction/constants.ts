import { KWH_RANGE_DEFAULT } from '../../utils/numberParsing';
import type { ExtractionOptions } from './types';

export const METER_POINT_ID_LENGTH_DEFAULT = 33;
export const METER_POINT_COUNTRY_PREFIX = 'AT';

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  meterPointIdLength: METER_POINT_ID_LENGTH_DEFAULT,
  kwhRange: KWH_RANGE_DEFAULT,
  previousPeriodWindowChars: 50,
  previousPeriodKeywords: ['vorperiode', 'previous'],
  currentReadingPolicy: 'max',
};

// Regex source fragments. Longer alternatives first so the label consumes "zählpunktnummer" whole.
export const METER_ID_LABEL_SOURCE =
  '(?:zählpunktnummer|zählpunkt|zp-nr|zp\\s*nr|zählernummer|metering\\s*point)';

export const CURRENT_QUALIFIER_SOURCE = '(?:aktuell|current)';

export const CONSUMPTION_LABEL_SOURCE = '(?:gesamtverbrauch|energieverbrauch|verbrauch|strom)';

export const STREET_SUFFIX_WORDS = ['straße', 'strasse', 'platz', 'weg', 'gasse', 'allee', 'ring'] as const;

export function resolveExtractionOptions(overrides?: Partial<ExtractionOptions>): ExtractionOptions {
  const d = DEFAULT_EXTRACTION_OPTIONS;
  return {
    meterPointIdLength: overrides?.meterPointIdLength ?? d.meterPointIdLength,
    kwhRange: overrides?.kwhRange ?? d.kwhRange,
    previousPeriodWindowChars: overrides?.previousPeriodWindowChars ?? d.previousPeriodWindowChars,
    previousPeriodKeywords: overrides?.previousPeriodKeywords ?? d.previousPeriodKeywords,
    currentReadingPolicy: overrides?.currentReadingPolicy ?? d.currentReadingPolicy,
  };
}
