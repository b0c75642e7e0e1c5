import z from 'zod';

export function buildExtractionRequest(maxTextLength: number) {
  return z.object({
    // OCR output; may be empty
    text: z.string().max(maxTextLength),
    // Raw reply of an upstream LLM extractor, if the caller ran one
    llmReply: z.string().max(maxTextLength).optional(),
  });
}

export type ExtractionRequestType = z.infer<ReturnType<typeof buildExtractionRequest>>;

const TierName = z.string().nullable();

export const ExtractionResponse = z.object({
  data: z.object({
    address: z.string().nullable(),
    meterPointId: z.string().nullable(),
    currentConsumptionKwh: z.string().nullable(),
  }),
  source: z.enum(['llm', 'heuristic']),
  fallbackReason: z.string().optional(),
  diagnostics: z
    .object({
      address: TierName,
      meterPointId: TierName,
      currentConsumptionKwh: TierName,
    })
    .nullable(),
});

export type ExtractionResponseType = z.infer<typeof ExtractionResponse>;
