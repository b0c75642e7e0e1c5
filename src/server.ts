import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';

// Initialize Sentry before anything else
const sentryEnabled = initSentry();

const start = async () => {
  const app = buildApp();

  let isShuttingDown = false;

  const handleShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    app.log.info(`Received ${signal}, starting graceful shutdown...`);

    const timeout = setTimeout(() => {
      app.log.error('Force shutdown due to timeout');
      process.exit(1);
    }, 10000);

    try {
      await app.close();
      clearTimeout(timeout);
      app.log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      app.log.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  try {
    app.log.info(
      {
        event: 'extraction.config',
        meterPointIdLength: config.METER_POINT_ID_LENGTH,
        kwhRange: [config.KWH_MIN, config.KWH_MAX],
        previousPeriodWindowChars: config.PREVIOUS_PERIOD_WINDOW_CHARS,
        currentReadingPolicy: config.CURRENT_READING_POLICY,
        sentry: sentryEnabled,
      },
      'Extraction settings loaded'
    );

    await app.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
