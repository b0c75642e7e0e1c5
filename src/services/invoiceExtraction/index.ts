export type {
  ExtractedInvoiceData,
  ExtractionDiagnostics,
  ExtractionOptions,
  ExtractionResult,
  CurrentReadingPolicy,
} from './types';
export { extractInvoiceData, extractInvoiceDataWithDiagnostics } from './extractInvoiceData';
export { locateAddress } from './addressLocator';
export { locateMeterId, isPlausibleMeterPointId } from './meterIdLocator';
export { locateConsumptionKwh } from './consumptionLocator';
export { DEFAULT_EXTRACTION_OPTIONS, resolveExtractionOptions } from './constants';
export { resolveLlmExtraction, parseLlmReply } from './llmReply';
export type { LlmResolution, LlmReplyParse, LlmFallbackReason, ExtractionSource } from './llmReply';
