import { z } from 'zod';
import { formatKwh, parseKwhValue } from '../../utils/numberParsing';
import { extractInvoiceDataWithDiagnostics } from './extractInvoiceData';
import { isPlausibleMeterPointId } from './meterIdLocator';
import { resolveExtractionOptions } from './constants';
import type { ExtractedInvoiceData, ExtractionDiagnostics, ExtractionOptions } from './types';

/**
 * Shape the LLM extractor is prompted to answer with. Field names follow the prompt,
 * not our record, so they are mapped below.
 */
export const LlmReplySchema = z.object({
  address: z.string().nullish(),
  zaehlpunktnummer: z.string().nullish(),
  kwh_aktuell: z.union([z.number(), z.string()]).nullish(),
});

export type LlmReply = z.infer<typeof LlmReplySchema>;

export type ExtractionSource = 'llm' | 'heuristic';

export type LlmFallbackReason =
  | 'NO_REPLY'
  | 'NO_JSON_OBJECT'
  | 'INVALID_JSON'
  | 'SCHEMA_MISMATCH'
  | 'NO_USABLE_FIELDS';

export type LlmReplyParse =
  | { ok: true; data: ExtractedInvoiceData }
  | { ok: false; reason: LlmFallbackReason };

export type LlmResolution =
  | { source: 'llm'; data: ExtractedInvoiceData }
  | {
      source: 'heuristic';
      data: ExtractedInvoiceData;
      diagnostics: ExtractionDiagnostics;
      /** Set when a reply was given but could not be used. */
      fallbackReason?: LlmFallbackReason;
    };

// Models like to wrap JSON in prose or ```json fences; take the outermost object.
function sliceJsonObject(reply: string): string | null {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  return reply.slice(start, end + 1);
}

function toRecord(reply: LlmReply, opts: ExtractionOptions): ExtractedInvoiceData {
  const data: ExtractedInvoiceData = {};

  const address = reply.address?.trim();
  if (address) data.address = address;

  const meterPointId = reply.zaehlpunktnummer?.replace(/\s+/g, '');
  if (meterPointId && isPlausibleMeterPointId(meterPointId, opts.meterPointIdLength)) {
    data.meterPointId = meterPointId;
  }

  if (reply.kwh_aktuell !== null && reply.kwh_aktuell !== undefined) {
    const kwh = parseKwhValue(reply.kwh_aktuell, opts.kwhRange);
    if (kwh !== null) data.currentConsumptionKwh = formatKwh(kwh);
  }

  return data;
}

export function parseLlmReply(reply: string | null | undefined, options?: Partial<ExtractionOptions>): LlmReplyParse {
  if (!reply || !reply.trim()) return { ok: false, reason: 'NO_REPLY' };

  const json = sliceJsonObject(reply);
  if (json === null) return { ok: false, reason: 'NO_JSON_OBJECT' };

  let decoded: unknown;
  try {
    decoded = JSON.parse(json);
  } catch {
    return { ok: false, reason: 'INVALID_JSON' };
  }

  const parsed = LlmReplySchema.safeParse(decoded);
  if (!parsed.success) return { ok: false, reason: 'SCHEMA_MISMATCH' };

  const data = toRecord(parsed.data, resolveExtractionOptions(options));
  if (Object.keys(data).length === 0) return { ok: false, reason: 'NO_USABLE_FIELDS' };

  return { ok: true, data };
}

/**
 * Either the LLM reply is used as a whole, or the heuristic result replaces it as a whole.
 * Fields are never merged across the two sources.
 */
export function resolveLlmExtraction(
  text: string,
  reply?: string | null,
  options?: Partial<ExtractionOptions>
): LlmResolution {
  const parsed = parseLlmReply(reply, options);
  if (parsed.ok) return { source: 'llm', data: parsed.data };

  const { data, diagnostics } = extractInvoiceDataWithDiagnostics(text, options);
  if (parsed.reason === 'NO_REPLY') return { source: 'heuristic', data, diagnostics };
  return { source: 'heuristic', data, diagnostics, fallbackReason: parsed.reason };
}
