import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(4001),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Infrastructure
  ENABLE_RATE_LIMIT: z.string().optional().default('true'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  CORS_ORIGIN: z.string().url().optional(),
  SENTRY_DSN: z.string().url().optional(),

  // Request limits
  MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(200000),

  // Extraction tunables (Austrian defaults)
  METER_POINT_ID_LENGTH: z.coerce.number().int().min(3).default(33),
  KWH_MIN: z.coerce.number().default(1),
  KWH_MAX: z.coerce.number().default(100000),
  PREVIOUS_PERIOD_WINDOW_CHARS: z.coerce.number().int().min(0).default(50),
  CURRENT_READING_POLICY: z.enum(['max', 'first']).default('max'),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

const baseConfig = parsed.data;

if (baseConfig.KWH_MIN >= baseConfig.KWH_MAX) {
  console.error('❌ Invalid environment variables: KWH_MIN must be lower than KWH_MAX');
  process.exit(1);
}

export const config = baseConfig;
