import { formatKwh } from '../../utils/numberParsing';
import { matchAddress } from './addressLocator';
import { matchMeterId } from './meterIdLocator';
import { matchConsumption } from './consumptionLocator';
import { resolveExtractionOptions } from './constants';
import type { ExtractedInvoiceData, ExtractionOptions, ExtractionResult } from './types';

/**
 * Runs the three locators over the same text. They share nothing, so any subset
 * of fields may come back; an absent field means "no confident match".
 */
export function extractInvoiceDataWithDiagnostics(
  text: string,
  options?: Partial<ExtractionOptions>
): ExtractionResult {
  const opts = resolveExtractionOptions(options);
  const address = matchAddress(text);
  const meterPointId = matchMeterId(text, opts.meterPointIdLength);
  const consumption = matchConsumption(text, opts);

  const data: ExtractedInvoiceData = {};
  if (address) data.address = address.value;
  if (meterPointId) data.meterPointId = meterPointId.value;
  if (consumption) data.currentConsumptionKwh = formatKwh(consumption.value.value);

  return {
    data,
    diagnostics: {
      address: address?.tier ?? null,
      meterPointId: meterPointId?.tier ?? null,
      currentConsumptionKwh: consumption?.tier ?? null,
    },
  };
}

export function extractInvoiceData(text: string, options?: Partial<ExtractionOptions>): ExtractedInvoiceData {
  return extractInvoiceDataWithDiagnostics(text, options).data;
}
