import { Test } from '@nestjs/testing';
import type { INestApplication } from '@nestjs/common';
import { WEBHOOK_ROUTE, WebhookController } from './webhook.controller.js';
import { WebhookExceptionFilter } from './webhook-exception.filter.js';
import { WebhookService } from './webhook.service.js';

describe('POST /api/telegram over HTTP', () => {
  let app: INestApplication;
  let baseUrl: string;
  const webhookService = { handleUpdate: jest.fn() };

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [WebhookController],
      providers: [{ provide: WebhookService, useValue: webhookService }],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    app.setGlobalPrefix('api');
    app.useGlobalFilters(new WebhookExceptionFilter(app.getHttpAdapter(), `/api/${WEBHOOK_ROUTE}`));
    await app.listen(0, '127.0.0.1');
    baseUrl = await app.getUrl();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    webhookService.handleUpdate.mockReset();
    webhookService.handleUpdate.mockResolvedValue('OK');
  });

  function post(path: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('acknowledges a well-formed update', async () => {
    const res = await post('/api/telegram', '{"update_id":1}');

    expect(res.status).toBe(200);
    await expect(res.text()).resolves.toBe('OK');
    expect(webhookService.handleUpdate).toHaveBeenCalledWith({ update_id: 1 });
  });

  it('answers 200 with an error body for truncated JSON', async () => {
    const res = await post('/api/telegram', '{"update_id": 1, "message": {');

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ error: expect.any(String) });
    expect(webhookService.handleUpdate).not.toHaveBeenCalled();
  });

  it('answers 200 with an error body for a JSON null body', async () => {
    const res = await post('/api/telegram', 'null');

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ error: expect.any(String) });
    expect(webhookService.handleUpdate).not.toHaveBeenCalled();
  });

  it('leaves other routes on the default error handling', async () => {
    const res = await post('/api/unknown', '{');

    expect(res.status).toBe(400);
  });
});
