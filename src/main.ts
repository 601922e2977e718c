import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  const port = process.env.PORT ?? 8000;
  const frontendUrl = process.env.FRONTEND_URL || 'http://localhost:3000';

  app.enableCors({
    origin: frontendUrl,
    methods: 'GET,POST,OPTIONS',
    allowedHeaders: 'Content-Type, Authorization',
  });
  app.enableShutdownHooks();

  await app.listen(port, '0.0.0.0');
  logger.log(`Scraper API listening on http://localhost:${port}`);
  logger.log(`CORS enabled for: ${frontendUrl}`);
}

bootstrap().catch((error) => {
  new Logger('Bootstrap').error(`Failed to start: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
