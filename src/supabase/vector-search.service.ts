/**
 * Similarity search over saved notes in Supabase (pgvector).
 *
 * Table:  documents (id, content, embedding, ...)
 * RPC:    match_documents(query_embedding, match_threshold, match_count)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { GeminiService } from '../google/gemini.service.js';
import { attempt, fail, type Result } from '../common/result.js';
import type { DocumentMatch, DocumentSearchOptions } from '../types/document-match.types.js';

export const DOCUMENTS_TABLE = 'documents';
export const MATCH_DOCUMENTS_RPC = 'match_documents';

function isDocumentMatch(row: unknown): row is DocumentMatch {
  return (
    typeof row === 'object' &&
    row !== null &&
    'content' in row &&
    typeof row.content === 'string'
  );
}

@Injectable()
export class VectorSearchService {
  private readonly logger = new Logger(VectorSearchService.name);
  private client?: SupabaseClient;

  constructor(
    private readonly config: ConfigService,
    private readonly geminiService: GeminiService,
  ) {}

  // createClient throws on an empty URL; build on first use so that
  // a missing setting surfaces as a call error.
  private getClient(): SupabaseClient {
    if (!this.client) {
      const url = this.config.get<string>('SUPABASE_URL') ?? '';
      const key = this.config.get<string>('SUPABASE_KEY') ?? '';
      this.client = createClient(url, key, { auth: { persistSession: false } });
    }
    return this.client;
  }

  async searchDocuments(
    query: string,
    options: DocumentSearchOptions,
  ): Promise<Result<DocumentMatch[]>> {
    const embedding = await this.geminiService.embed(query);
    if (!embedding.ok) {
      return fail(`embedding failed: ${embedding.error}`);
    }

    const result = await attempt(async () => {
      const { data, error } = await this.getClient().rpc(MATCH_DOCUMENTS_RPC, {
        query_embedding: embedding.value,
        match_threshold: options.threshold,
        match_count: options.count,
      });
      if (error) {
        throw new Error(error.message);
      }
      const rows: unknown[] = Array.isArray(data) ? data : [];
      return rows.filter(isDocumentMatch);
    });

    if (!result.ok) {
      this.logger.error(`Error searching RAG: ${result.error}`);
    }
    return result;
  }

  /** Reads one row id from the documents table; returns the row count. */
  ping(): Promise<Result<number>> {
    return attempt(async () => {
      const { data, error } = await this.getClient().from(DOCUMENTS_TABLE).select('id').limit(1);
      if (error) {
        throw new Error(error.message);
      }
      return data ? data.length : 0;
    });
  }
}
