import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { GeminiService, buildAssistantPrompt } from './gemini.service.js';

const mockGenerateContent = jest.fn();
const mockEmbedContent = jest.fn();

jest.mock('@google/genai', () => ({
  GoogleGenAI: jest.fn().mockImplementation(() => ({
    models: { generateContent: mockGenerateContent, embedContent: mockEmbedContent },
  })),
}));

describe('GeminiService', () => {
  let service: GeminiService;

  beforeEach(async () => {
    mockGenerateContent.mockReset();
    mockEmbedContent.mockReset();
    jest.mocked(GoogleGenAI).mockClear();

    const env: Record<string, string> = { GEMINI_API_KEY: 'test-key' };
    const moduleRef = await Test.createTestingModule({
      providers: [
        GeminiService,
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
      ],
    }).compile();

    service = moduleRef.get(GeminiService);
  });

  it('creates the SDK client lazily, once', async () => {
    expect(GoogleGenAI).not.toHaveBeenCalled();
    mockGenerateContent.mockResolvedValue({ text: 'OK' });

    await service.generate('ping');
    await service.generate('ping');

    expect(GoogleGenAI).toHaveBeenCalledTimes(1);
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
  });

  it('sends the assistant prompt with the default model', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'Tuyệt vời!' });

    const result = await service.generateReply('Tôi muốn học Python', '- ghi chú');

    expect(result).toEqual({ ok: true, value: 'Tuyệt vời!' });
    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      contents: buildAssistantPrompt('Tôi muốn học Python', '- ghi chú'),
    });
  });

  it('reports SDK errors as a failed result', async () => {
    mockGenerateContent.mockRejectedValue(new Error('429 quota'));

    await expect(service.generateReply('hi', '')).resolves.toEqual({ ok: false, error: '429 quota' });
  });

  it('treats an empty answer as a failure', async () => {
    mockGenerateContent.mockResolvedValue({ text: undefined });

    const result = await service.generate('hi');

    expect(result).toEqual({ ok: false, error: 'Gemini returned an empty response' });
  });

  it('returns the first embedding vector', async () => {
    mockEmbedContent.mockResolvedValue({ embeddings: [{ values: [0.1, 0.2] }] });

    await expect(service.embed('query')).resolves.toEqual({ ok: true, value: [0.1, 0.2] });
    expect(mockEmbedContent).toHaveBeenCalledWith({ model: 'text-embedding-004', contents: 'query' });
  });

  it('fails when no embedding comes back', async () => {
    mockEmbedContent.mockResolvedValue({ embeddings: [] });

    await expect(service.embed('query')).resolves.toEqual({ ok: false, error: 'Gemini returned no embedding' });
  });
});

describe('buildAssistantPrompt', () => {
  it('embeds the context block and the user message', () => {
    const prompt = buildAssistantPrompt('xin chào', '');
    expect(prompt).toContain('Ngữ cảnh từ tài liệu đã lưu:\n\n\nTin nhắn người dùng: xin chào');
  });
});
