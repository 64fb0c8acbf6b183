/**
 * Firestore user_messages/{auto-id}, append-only
 */
export interface UserMessage {
  chatId: string;
  message: string;
  timestamp: Date;
}
