/**
 * Google Gemini API: chat replies and query embeddings.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { attempt, type Result } from '../common/result.js';

const DEFAULT_MODEL = 'gemini-2.0-flash';
const DEFAULT_EMBEDDING_MODEL = 'text-embedding-004';

export function buildAssistantPrompt(userMessage: string, context: string): string {
  return `Bạn là AI Planning Assistant - trợ lý lập kế hoạch thông minh.

Nhiệm vụ: Giúp người dùng với mục tiêu và kế hoạch của họ.

Ngữ cảnh từ tài liệu đã lưu:
${context}

Tin nhắn người dùng: ${userMessage}

Hãy trả lời ngắn gọn, hữu ích bằng tiếng Việt. Nếu người dùng đưa ra mục tiêu, hãy:
1. Xác nhận mục tiêu
2. Đề xuất các bước thực hiện
3. Khuyến khích họ`;
}

@Injectable()
export class GeminiService {
  private readonly logger = new Logger(GeminiService.name);
  private readonly model: string;
  private readonly embeddingModel: string;
  private client?: GoogleGenAI;

  constructor(private readonly config: ConfigService) {
    this.model = this.config.get<string>('GEMINI_MODEL') || DEFAULT_MODEL;
    this.embeddingModel = this.config.get<string>('GEMINI_EMBEDDING_MODEL') || DEFAULT_EMBEDDING_MODEL;
  }

  // The SDK rejects an empty key at construction, so defer until the first call.
  private get ai(): GoogleGenAI {
    if (!this.client) {
      const apiKey = this.config.get<string>('GEMINI_API_KEY') ?? '';
      this.client = new GoogleGenAI({ apiKey });
    }
    return this.client;
  }

  /** Planning-assistant reply; `context` is "" when retrieval found nothing. */
  async generateReply(userMessage: string, context: string): Promise<Result<string>> {
    const result = await this.generate(buildAssistantPrompt(userMessage, context));
    if (!result.ok) {
      this.logger.error(`Error generating AI response: ${result.error}`);
    }
    return result;
  }

  /** Raw prompt → text. An empty answer counts as a failure. */
  generate(prompt: string): Promise<Result<string>> {
    return attempt(async () => {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: prompt,
      });
      const text = response.text;
      if (!text) {
        throw new Error('Gemini returned an empty response');
      }
      return text;
    });
  }

  async embed(text: string): Promise<Result<number[]>> {
    const result = await attempt(async () => {
      const response = await this.ai.models.embedContent({
        model: this.embeddingModel,
        contents: text,
      });
      const values = response.embeddings?.[0]?.values;
      if (!values || values.length === 0) {
        throw new Error('Gemini returned no embedding');
      }
      return values;
    });
    if (!result.ok) {
      this.logger.error(`Error creating embedding: ${result.error}`);
    }
    return result;
  }
}
