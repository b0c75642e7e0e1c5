import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { ZodError } from 'zod';
import * as Sentry from '@sentry/node';
import extractionRoutes from './routes/extractionRoutes';
import { config } from './config/env';

// Request-body size cap in bytes; text is UTF-8 so umlauts may take two bytes each.
function bodyLimitFor(maxTextLength: number) {
  return Math.max(1024 * 1024, maxTextLength * 4);
}

export function buildApp(): FastifyInstance {
  const app = Fastify({
    trustProxy: true,
    bodyLimit: bodyLimitFor(config.MAX_TEXT_LENGTH),
    logger: {
      level: config.LOG_LEVEL,
      transport:
        config.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
      redact: ['req.headers.authorization', 'req.headers.cookie', 'body.text', 'body.llmReply'],
    },
  });

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
  });

  // Rate Limiting
  if (config.ENABLE_RATE_LIMIT === 'true') {
    app.register(rateLimit, {
      max: config.RATE_LIMIT_MAX,
      timeWindow: '1 minute',
    });
  }

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register CORS
  if (config.NODE_ENV !== 'production') {
    app.register(cors, {
      origin: config.CORS_ORIGIN ? [config.CORS_ORIGIN] : ['http://localhost:3000'],
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  } else {
    app.register(cors, {
      origin: config.CORS_ORIGIN ? [config.CORS_ORIGIN] : false,
    });
  }

  // Register Routes
  app.register(extractionRoutes, { prefix: '/extractions' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (error.validation || error instanceof ZodError) {
      request.log.warn({ msg: 'Request validation failed', url: request.url });
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.validation ?? (error instanceof ZodError ? error.issues : undefined),
        },
      });
    }

    if (statusCode >= 500) {
      request.log.error(error);
      Sentry.withScope((scope) => {
        scope.setContext('request', {
          method: request.method,
          url: request.url,
        });
        scope.setTag('error_code', error.code || 'INTERNAL_ERROR');
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    } else {
      request.log.warn({ msg: error.message, code: error.code, statusCode });
    }

    return reply.status(statusCode).send({
      error: {
        code: error.code || 'INTERNAL_ERROR',
        message: statusCode >= 500 ? 'Something went wrong' : error.message,
      },
    });
  });

  return app;
}
