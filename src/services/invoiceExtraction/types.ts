import type { NumericRange } from '../../utils/numberParsing';

export type ExtractedInvoiceData = {
  /** Name, street + number and postal code + city joined by ", " (name is optional). */
  address?: string;
  /** Zählpunktnummer; exactly `meterPointIdLength` characters when present. */
  meterPointId?: string;
  /** Current-period consumption with one fractional digit, e.g. "2573.1". */
  currentConsumptionKwh?: string;
};

export type CurrentReadingPolicy = 'max' | 'first';

export type ExtractionOptions = {
  meterPointIdLength: number;
  kwhRange: NumericRange;
  /** Characters inspected on each side of a kWh match for previous-period keywords. */
  previousPeriodWindowChars: number;
  previousPeriodKeywords: readonly string[];
  /**
   * Which "aktuell"-qualified reading wins when OCR yields several.
   * 'max' keeps the largest one; it is a heuristic for duplicated fragments, not a billing rule.
   */
  currentReadingPolicy: CurrentReadingPolicy;
};

export type AddressTier = 'postal-anchored' | 'street-then-postal' | 'single-line';

export type MeterIdTier =
  | 'labeled-grouped'
  | 'labeled-contiguous'
  | 'prefixed-grouped'
  | 'prefixed-contiguous'
  | 'generic';

export type ConsumptionTier = 'current-qualified' | 'unit-fallback';

export type ExtractionDiagnostics = {
  address: AddressTier | null;
  meterPointId: MeterIdTier | null;
  currentConsumptionKwh: ConsumptionTier | null;
};

export type ExtractionResult = {
  data: ExtractedInvoiceData;
  diagnostics: ExtractionDiagnostics;
};
