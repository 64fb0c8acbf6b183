/**
 * Reports returned by the scheduled jobs.
 */

export interface FailedRecipient {
  chatId: string;
  reason: string;
}

export interface NotificationBatchReport {
  job: 'weekly-planner' | 'daily-reminder';
  totalUsers: number;
  notified: string[];
  skipped: string[];
  failed: FailedRecipient[];
  /** Set when the user listing itself failed and no user was processed. */
  batchError?: string;
}

export type HealthProbeStep = 'firestore' | 'supabase' | 'gemini';

/** `notificationSent`: whether the summary (ok) or the alert (error) reached Telegram. */
export type HealthReport =
  | { status: 'ok'; notificationSent: boolean }
  | { status: 'error'; failedStep: HealthProbeStep; error: string; notificationSent: boolean };
