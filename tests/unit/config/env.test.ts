import { describe, it, expect } from 'vitest';
import { config, envSchema } from '../../../src/config/env';
import { extractionOptionsFromConfig } from '../../../src/config/extraction';

describe('Env Config', () => {
  it('should have loaded config with defaults', () => {
    expect(config.PORT).toBeDefined();
    expect(config.NODE_ENV).toBe('test');
    expect(config.ENABLE_RATE_LIMIT).toBe('false');
  });

  it('applies extraction defaults', () => {
    const parsed = envSchema.parse({});
    expect(parsed.METER_POINT_ID_LENGTH).toBe(33);
    expect(parsed.KWH_MIN).toBe(1);
    expect(parsed.KWH_MAX).toBe(100000);
    expect(parsed.PREVIOUS_PERIOD_WINDOW_CHARS).toBe(50);
    expect(parsed.CURRENT_READING_POLICY).toBe('max');
  });

  it('coerces numeric overrides from strings', () => {
    const parsed = envSchema.parse({ METER_POINT_ID_LENGTH: '18', KWH_MAX: '500000' });
    expect(parsed.METER_POINT_ID_LENGTH).toBe(18);
    expect(parsed.KWH_MAX).toBe(500000);
  });

  it('rejects an unknown reading policy', () => {
    expect(envSchema.safeParse({ CURRENT_READING_POLICY: 'last' }).success).toBe(false);
  });
});

describe('extractionOptionsFromConfig', () => {
  it('maps env settings onto extraction options', () => {
    const options = extractionOptionsFromConfig({
      METER_POINT_ID_LENGTH: 18,
      KWH_MIN: 0,
      KWH_MAX: 500000,
      PREVIOUS_PERIOD_WINDOW_CHARS: 80,
      CURRENT_READING_POLICY: 'first',
    });
    expect(options).toEqual({
      meterPointIdLength: 18,
      kwhRange: { min: 0, max: 500000 },
      previousPeriodWindowChars: 80,
      previousPeriodKeywords: ['vorperiode', 'previous'],
      currentReadingPolicy: 'first',
    });
  });
});
