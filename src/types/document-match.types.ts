/**
 * Row returned by the Supabase match_documents RPC.
 */
export interface DocumentMatch {
  id?: number | string;
  content: string;
  similarity?: number;
}

export interface DocumentSearchOptions {
  threshold: number;
  count: number;
}
