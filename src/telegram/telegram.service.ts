/**
 * Outbound delivery through the Telegram Bot API.
 * https://core.telegram.org/bots/api#sendmessage
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { attempt, type Result } from '../common/result.js';

const TELEGRAM_API_BASE = 'https://api.telegram.org';

@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);

  constructor(private readonly config: ConfigService) {}

  /** TELEGRAM_CHAT_ID: recipient of keep-alive reports. */
  get defaultChatId(): string {
    return this.config.get<string>('TELEGRAM_CHAT_ID') ?? '';
  }

  /**
   * Sends Markdown text. Succeeds only on HTTP 200.
   * Without `chatId` the message goes to TELEGRAM_CHAT_ID.
   */
  async sendMessage(text: string, chatId?: string): Promise<Result<void>> {
    const token = this.config.get<string>('TELEGRAM_BOT_TOKEN') ?? '';
    const targetChatId = chatId || this.defaultChatId;

    const result = await attempt(async () => {
      const res = await fetch(`${TELEGRAM_API_BASE}/bot${token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: targetChatId,
          text,
          parse_mode: 'Markdown',
        }),
      });

      if (res.status !== 200) {
        const body = await res.text();
        throw new Error(`sendMessage failed: ${res.status} ${body}`);
      }
    });

    if (!result.ok) {
      this.logger.error(`Error sending Telegram message to ${targetChatId}: ${result.error}`);
    }
    return result;
  }
}
