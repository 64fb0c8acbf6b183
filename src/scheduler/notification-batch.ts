import { SENTINEL_CHAT_ID, type UserProfile } from '../types/user-profile.types.js';
import type { FailedRecipient, NotificationBatchReport } from '../types/notification.types.js';

/** Profiles without a usable chat id are never notified. */
export function recipientChatId(profile: UserProfile): string | null {
  if (!profile.chatId || profile.chatId === SENTINEL_CHAT_ID) return null;
  return profile.chatId;
}

/**
 * Per-user outcome of one scheduled run. A failure for one user is recorded
 * and the run moves on to the next user.
 */
export class NotificationBatch {
  private readonly notified: string[] = [];
  private readonly skipped: string[] = [];
  private readonly failed: FailedRecipient[] = [];

  constructor(
    private readonly job: NotificationBatchReport['job'],
    private readonly totalUsers: number,
  ) {}

  markNotified(chatId: string): void {
    this.notified.push(chatId);
  }

  /** `id` is the chat id, or the profile document id when there is none. */
  markSkipped(id: string): void {
    this.skipped.push(id);
  }

  markFailed(chatId: string, reason: string): void {
    this.failed.push({ chatId, reason });
  }

  report(): NotificationBatchReport {
    return {
      job: this.job,
      totalUsers: this.totalUsers,
      notified: [...this.notified],
      skipped: [...this.skipped],
      failed: [...this.failed],
    };
  }

  static aborted(job: NotificationBatchReport['job'], error: string): NotificationBatchReport {
    return { job, totalUsers: 0, notified: [], skipped: [], failed: [], batchError: error };
  }
}
