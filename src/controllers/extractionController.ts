import type { FastifyRequest, FastifyReply } from 'fastify';
import { resolveLlmExtraction, type LlmResolution } from '../services/invoiceExtraction';
import { extractionOptionsFromConfig } from '../config/extraction';
import { config } from '../config/env';
import type { ExtractionRequestType, ExtractionResponseType } from '../dtos/extractionDtos';

const extractionOptions = extractionOptionsFromConfig(config);

export function toExtractionResponse(resolution: LlmResolution): ExtractionResponseType {
  const { data } = resolution;
  const body: ExtractionResponseType = {
    data: {
      address: data.address ?? null,
      meterPointId: data.meterPointId ?? null,
      currentConsumptionKwh: data.currentConsumptionKwh ?? null,
    },
    source: resolution.source,
    diagnostics: resolution.source === 'heuristic' ? resolution.diagnostics : null,
  };
  if (resolution.source === 'heuristic' && resolution.fallbackReason) {
    body.fallbackReason = resolution.fallbackReason;
  }
  return body;
}

export const extractionController = {
  async extract(request: FastifyRequest<{ Body: ExtractionRequestType }>, reply: FastifyReply) {
    const { text, llmReply } = request.body;

    const resolution = resolveLlmExtraction(text, llmReply, extractionOptions);
    const body = toExtractionResponse(resolution);

    // Field values are customer data; log presence and tiers only.
    request.log.info({
      msg: 'Invoice fields extracted',
      source: body.source,
      fallbackReason: body.fallbackReason,
      textLength: text.length,
      found: {
        address: body.data.address !== null,
        meterPointId: body.data.meterPointId !== null,
        currentConsumptionKwh: body.data.currentConsumptionKwh !== null,
      },
      tiers: body.diagnostics,
    });

    return reply.send(body);
  },
};
