import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { WEBHOOK_ROUTE } from './webhook/webhook.controller.js';
import { WebhookExceptionFilter } from './webhook/webhook-exception.filter.js';

const API_PREFIX = 'api';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // Telegram webhook URL: https://<host>/api/telegram
  app.setGlobalPrefix(API_PREFIX);
  // Unparseable bodies on the webhook still get 200 { error }
  app.useGlobalFilters(new WebhookExceptionFilter(app.getHttpAdapter(), `/${API_PREFIX}/${WEBHOOK_ROUTE}`));

  // SIGTERM → OnApplicationShutdown (cancels the timer jobs)
  app.enableShutdownHooks();

  const port = process.env.PORT ?? 3000;
  await app.listen(port, '0.0.0.0');
  Logger.log(`Server running on port ${port}`, 'Bootstrap');
}

bootstrap().catch((err) => {
  Logger.error('Failed to start', err instanceof Error ? err.stack : err, 'Bootstrap');
  process.exit(1);
});
