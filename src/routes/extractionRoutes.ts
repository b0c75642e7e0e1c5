import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { extractionController } from '../controllers/extractionController';
import { buildExtractionRequest } from '../dtos/extractionDtos';
import { config } from '../config/env';

export default async function extractionRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  // POST /extractions
  app.post(
    '/',
    {
      schema: {
        body: buildExtractionRequest(config.MAX_TEXT_LENGTH),
      },
    },
    extractionController.extract
  );
}
