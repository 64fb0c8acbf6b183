/**
 * Decides the reply for one inbound chat message.
 *
 * - "/start" "/help" "/plan" → fixed or Firestore-backed texts
 * - any other "/..."          → unknown-command text
 * - free text                 → Supabase retrieval + Gemini reply
 *
 * Never throws for collaborator failures; each one has a fixed fallback text.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PlansRepository } from '../plans/plans.repository.js';
import { GeminiService } from '../google/gemini.service.js';
import { VectorSearchService } from '../supabase/vector-search.service.js';
import {
  AI_APOLOGY_TEXT,
  HELP_TEXT,
  NO_PLANS_TEXT,
  PLAN_FETCH_ERROR_TEXT,
  START_TEXT,
  UNKNOWN_COMMAND_TEXT,
  renderApprovedPlanList,
  renderDocumentContext,
} from '../messages/message-templates.js';

/** /plan shows at most this many approved plans. */
export const PLAN_LIST_LIMIT = 5;

/** Retrieval settings for free-text messages. */
export const RETRIEVAL_THRESHOLD = 0.3;
export const RETRIEVAL_COUNT = 2;

/**
 * "/plan@my_bot extra" → "/plan". Returns null for non-command text.
 */
export function parseCommand(text: string): string | null {
  if (!text.startsWith('/')) return null;
  const word = text.trim().split(/\s+/, 1)[0] ?? '';
  const at = word.indexOf('@');
  return at === -1 ? word : word.slice(0, at);
}

@Injectable()
export class MessageRouterService {
  private readonly logger = new Logger(MessageRouterService.name);

  constructor(
    private readonly plansRepository: PlansRepository,
    private readonly geminiService: GeminiService,
    private readonly vectorSearchService: VectorSearchService,
  ) {}

  async route(chatId: string, text: string): Promise<string> {
    const command = parseCommand(text);
    if (command === null) {
      return this.answerFreeText(text);
    }

    switch (command) {
      case '/start':
        return START_TEXT;
      case '/help':
        return HELP_TEXT;
      case '/plan':
        return this.renderPlans(chatId);
      default:
        return UNKNOWN_COMMAND_TEXT;
    }
  }

  private async renderPlans(chatId: string): Promise<string> {
    const plans = await this.plansRepository.findRecentApprovedPlans(chatId, PLAN_LIST_LIMIT);
    if (!plans.ok) {
      this.logger.error(`Error fetching plans for ${chatId}: ${plans.error}`);
      return PLAN_FETCH_ERROR_TEXT;
    }
    if (plans.value.length === 0) {
      return NO_PLANS_TEXT;
    }
    return renderApprovedPlanList(plans.value);
  }

  private async answerFreeText(text: string): Promise<string> {
    this.logger.log('Processing regular message with RAG');

    const matches = await this.vectorSearchService.searchDocuments(text, {
      threshold: RETRIEVAL_THRESHOLD,
      count: RETRIEVAL_COUNT,
    });

    let context = '';
    if (matches.ok && matches.value.length > 0) {
      this.logger.log(`Found ${matches.value.length} RAG results`);
      context = renderDocumentContext(matches.value.map((doc) => doc.content));
    } else {
      this.logger.log(matches.ok ? 'No RAG results found' : 'RAG unavailable, answering without context');
    }

    const reply = await this.geminiService.generateReply(text, context);
    return reply.ok ? reply.value : AI_APOLOGY_TEXT;
  }
}
