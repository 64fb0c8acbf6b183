/**
 * Firestore user_profile/{docId}
 */

/** Slots used when a profile has no reminder_times of its own. */
export const DEFAULT_REMINDER_TIMES: readonly string[] = ['06:00', '12:00', '18:00', '21:00'];

/** Placeholder profile created during onboarding; never notified. */
export const SENTINEL_CHAT_ID = 'temp';

export interface UserProfile {
  id: string;
  chatId: string | null;
  reminderTimes: readonly string[]; // "HH:00"
}
