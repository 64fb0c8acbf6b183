/**
 * Telegram webhook: POST /api/telegram (anonymous)
 * Register with setWebhook → https://<host>/api/telegram
 */

import { Body, Controller, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { WebhookService, type WebhookAck } from './webhook.service.js';
import { describeError } from '../common/result.js';

export const WEBHOOK_ROUTE = 'telegram';

@Controller(WEBHOOK_ROUTE)
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(private readonly webhookService: WebhookService) {}

  /** Always 200, even on failure, so Telegram does not retry. */
  @Post()
  @HttpCode(HttpStatus.OK)
  async receive(@Body() body: unknown): Promise<WebhookAck> {
    this.logger.log('🤖 Telegram webhook triggered');
    try {
      return await this.webhookService.handleUpdate(body);
    } catch (err) {
      this.logger.error('Unhandled error in Telegram webhook', err);
      return { error: describeError(err) };
    }
  }
}
