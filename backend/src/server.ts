import { buildApp } from './app.js';
import { env } from './config/env.js';

async function bootstrap(): Promise<void> {
  const app = buildApp();
  console.log(`[BOOT] Narrative provider: ${env.NARRATIVE_PROVIDER}, forecast: ${env.FORECAST_MODEL}/${env.FORECAST_MODE}`);

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down');
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error(err);
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

bootstrap().catch((err: unknown) => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
