/**
 * Global filter: on the webhook route every error, including a body the JSON
 * parser rejects before the controller runs, is answered with 200 { error }.
 * Other routes keep Nest's default error responses.
 */

import { Catch, HttpStatus, Logger, type ArgumentsHost, type HttpServer } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { describeError } from '../common/result.js';

@Catch()
export class WebhookExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(WebhookExceptionFilter.name);

  constructor(
    private readonly httpServer: HttpServer,
    private readonly webhookPath: string,
  ) {
    super(httpServer);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const url = this.httpServer.getRequestUrl?.(http.getRequest()) ?? '';
    if (host.getType() !== 'http' || url.split('?')[0] !== this.webhookPath) {
      super.catch(exception, host);
      return;
    }

    const error = describeError(exception);
    this.logger.error(`Telegram webhook rejected before handling: ${error}`);
    this.httpServer.reply(http.getResponse(), { error }, HttpStatus.OK);
  }
}
