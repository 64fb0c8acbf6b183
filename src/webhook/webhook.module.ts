import { Module } from '@nestjs/common';
import { WebhookController } from './webhook.controller.js';
import { WebhookService } from './webhook.service.js';
import { MessageRouterService } from './message-router.service.js';

@Module({
  controllers: [WebhookController],
  providers: [WebhookService, MessageRouterService],
})
export class WebhookModule {}
