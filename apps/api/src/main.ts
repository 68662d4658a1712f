import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { applyGlobalConfiguration } from './app.setup';
import { scribeConfig } from './config/scribe.config';
import type { ScribeConfig } from './config/scribe.config';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const config = app.get<ScribeConfig>(scribeConfig.KEY);

  // ── Global Pipes ──────────────────────────────────────
  applyGlobalConfiguration(app);

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: config.http.corsOrigin,
    credentials: true,
  });

  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  await app.listen(config.http.port);

  logger.log(`Scribe API running on http://localhost:${config.http.port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
