/**
 * POST /api/telegram handling.
 *
 * 1. parse the update (no chat id / no text → no-op)
 * 2. append to user_messages (best-effort)
 * 3. route → exactly one sendMessage attempt
 *
 * The caller always answers HTTP 200 so that Telegram does not redeliver
 * the update and the user does not get the same reply twice.
 */

import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { PlansRepository } from '../plans/plans.repository.js';
import { TelegramService } from '../telegram/telegram.service.js';
import { describeError } from '../common/result.js';
import { GENERIC_ERROR_TEXT } from '../messages/message-templates.js';
import { MessageRouterService } from './message-router.service.js';
import { TelegramUpdateDto } from './dto/telegram-update.dto.js';

export interface IncomingMessage {
  chatId: string;
  text: string;
}

export type WebhookAck = 'OK' | { error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns null for anything that is not a text message with a chat id. */
export function parseIncomingMessage(body: unknown): IncomingMessage | null {
  if (!isRecord(body)) return null;

  const update = plainToInstance(TelegramUpdateDto, body);
  if (validateSync(update).length > 0) return null;

  const message = update.message;
  if (!message || !message.text) return null;

  return { chatId: String(message.chat.id), text: message.text };
}

@Injectable()
export class WebhookService {
  private readonly logger = new Logger(WebhookService.name);

  constructor(
    private readonly plansRepository: PlansRepository,
    private readonly telegramService: TelegramService,
    private readonly messageRouter: MessageRouterService,
  ) {}

  async handleUpdate(body: unknown): Promise<WebhookAck> {
    let chatId: string | undefined;

    try {
      this.logger.log(`Received: ${JSON.stringify(body)}`);

      const incoming = parseIncomingMessage(body);
      if (!incoming) {
        this.logger.log('No text message in webhook');
        return 'OK';
      }
      chatId = incoming.chatId;
      this.logger.log(`📩 Chat ID: ${incoming.chatId}, Message: ${incoming.text}`);

      const saved = await this.plansRepository.saveUserMessage({
        chatId: incoming.chatId,
        message: incoming.text,
        timestamp: new Date(),
      });
      if (!saved.ok) {
        this.logger.error(`Error saving message: ${saved.error}`);
      }

      const reply = await this.messageRouter.route(incoming.chatId, incoming.text);

      const sent = await this.telegramService.sendMessage(reply, incoming.chatId);
      if (sent.ok) {
        this.logger.log(`✅ Response sent successfully to ${incoming.chatId}`);
      } else {
        this.logger.error(`❌ Failed to send response to ${incoming.chatId}`);
      }

      return 'OK';
    } catch (err) {
      this.logger.error('❌ Error in Telegram webhook', err instanceof Error ? err.stack : err);

      if (chatId) {
        // best-effort; sendMessage already logs its own failure
        await this.telegramService.sendMessage(GENERIC_ERROR_TEXT, chatId);
      }
      return { error: describeError(err) };
    }
  }
}
