import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { CorsIoAdapter, corsOriginFromEnv } from './cors-io.adapter';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({ origin: corsOriginFromEnv(configService) });
  app.useWebSocketAdapter(new CorsIoAdapter(app));

  // ── Shutdown ──────────────────────────────────────────
  // Drains active stage runs and clears eviction timers on SIGTERM/SIGINT.
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = Number(configService.get<string>('API_PORT', '7000'));
  await app.listen(port);

  logger.log(`🧳 Baggage tracker API running on http://localhost:${port}`);
  logger.log(`📡 Task status socket.io namespace: ws://localhost:${port}/tasks`);
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  new Logger('Bootstrap').error(`Failed to start: ${message}`);
  process.exit(1);
});
