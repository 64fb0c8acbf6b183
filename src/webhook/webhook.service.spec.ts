import { Test } from '@nestjs/testing';
import { PlansRepository } from '../plans/plans.repository.js';
import { TelegramService } from '../telegram/telegram.service.js';
import { GENERIC_ERROR_TEXT } from '../messages/message-templates.js';
import { MessageRouterService } from './message-router.service.js';
import { WebhookService, parseIncomingMessage } from './webhook.service.js';

function update(message: unknown): Record<string, unknown> {
  return { update_id: 10, message };
}

describe('parseIncomingMessage', () => {
  it('reads chat id and text from a message update', () => {
    const body = update({
      message_id: 5,
      from: { id: 1001, is_bot: false, first_name: 'Lan' },
      chat: { id: 1001, type: 'private' },
      date: 1767225600,
      text: '/plan',
    });

    expect(parseIncomingMessage(body)).toEqual({ chatId: '1001', text: '/plan' });
  });

  it.each([
    ['a non-object body', 'hello'],
    ['an array body', [1, 2]],
    ['an update without message', { update_id: 1, edited_message: { chat: { id: 1 }, text: 'x' } }],
    ['a message without text', update({ chat: { id: 1 }, sticker: { file_id: 'f' } })],
    ['a message with empty text', update({ chat: { id: 1 }, text: '' })],
    ['a message without chat', update({ text: 'hi' })],
    ['a chat without id', update({ chat: { type: 'private' }, text: 'hi' })],
    ['a non-string text', update({ chat: { id: 1 }, text: 42 })],
  ])('ignores %s', (_label, body) => {
    expect(parseIncomingMessage(body)).toBeNull();
  });
});

describe('WebhookService', () => {
  let service: WebhookService;
  const plans = { saveUserMessage: jest.fn() };
  const telegram = { sendMessage: jest.fn() };
  const router = { route: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    plans.saveUserMessage.mockResolvedValue({ ok: true, value: 'msg-1' });
    telegram.sendMessage.mockResolvedValue({ ok: true, value: undefined });
    router.route.mockResolvedValue('reply');

    const moduleRef = await Test.createTestingModule({
      providers: [
        WebhookService,
        { provide: PlansRepository, useValue: plans },
        { provide: TelegramService, useValue: telegram },
        { provide: MessageRouterService, useValue: router },
      ],
    }).compile();

    service = moduleRef.get(WebhookService);
  });

  it('acknowledges a payload without text and sends nothing', async () => {
    await expect(service.handleUpdate({ update_id: 1 })).resolves.toBe('OK');

    expect(plans.saveUserMessage).not.toHaveBeenCalled();
    expect(router.route).not.toHaveBeenCalled();
    expect(telegram.sendMessage).not.toHaveBeenCalled();
  });

  it('logs the message, routes it and sends one reply', async () => {
    const ack = await service.handleUpdate(update({ chat: { id: 1001 }, text: 'xin chào' }));

    expect(ack).toBe('OK');
    expect(plans.saveUserMessage).toHaveBeenCalledWith({
      chatId: '1001',
      message: 'xin chào',
      timestamp: expect.any(Date),
    });
    expect(router.route).toHaveBeenCalledWith('1001', 'xin chào');
    expect(telegram.sendMessage).toHaveBeenCalledTimes(1);
    expect(telegram.sendMessage).toHaveBeenCalledWith('reply', '1001');
  });

  it('still replies when the message log write fails', async () => {
    plans.saveUserMessage.mockResolvedValue({ ok: false, error: 'PERMISSION_DENIED' });

    await expect(service.handleUpdate(update({ chat: { id: 7 }, text: '/start' }))).resolves.toBe('OK');
    expect(telegram.sendMessage).toHaveBeenCalledWith('reply', '7');
  });

  it('acknowledges even when the send fails', async () => {
    telegram.sendMessage.mockResolvedValue({ ok: false, error: 'sendMessage failed: 403' });

    await expect(service.handleUpdate(update({ chat: { id: 7 }, text: 'hi' }))).resolves.toBe('OK');
    expect(telegram.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('reports an unexpected failure as an error body and apologises', async () => {
    router.route.mockRejectedValue(new Error('router exploded'));

    const ack = await service.handleUpdate(update({ chat: { id: 7 }, text: 'hi' }));

    expect(ack).toEqual({ error: 'router exploded' });
    expect(telegram.sendMessage).toHaveBeenCalledTimes(1);
    expect(telegram.sendMessage).toHaveBeenCalledWith(GENERIC_ERROR_TEXT, '7');
  });
});
