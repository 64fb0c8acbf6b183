/**
 * Subset of the Telegram Update object this service reads.
 * https://core.telegram.org/bots/api#update
 *
 * Validated inside WebhookService rather than by a ValidationPipe:
 * an unexpected shape is a silent no-op, never a 400 (Telegram would retry).
 */

import { IsDefined, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export class TelegramChatDto {
  @IsNotEmpty()
  id!: number | string;
}

export class TelegramMessageDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => TelegramChatDto)
  chat!: TelegramChatDto;

  @IsOptional()
  @IsString()
  text?: string;
}

export class TelegramUpdateDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => TelegramMessageDto)
  message?: TelegramMessageDto;
}
