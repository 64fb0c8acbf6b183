/**
 * Data access for user profiles, plans and the inbound message log.
 *
 * Every method returns a Result; callers decide the fallback
 * (empty list, error text, skip the user, ...).
 */

import { Injectable, Logger } from '@nestjs/common';
import { FirestoreService, COLLECTIONS } from '../firestore/firestore.service.js';
import { attempt, type Result } from '../common/result.js';
import type { ApprovedPlan, PendingPlan } from '../types/plan.types.js';
import type { UserProfile } from '../types/user-profile.types.js';
import type { UserMessage } from '../types/user-message.types.js';
import { toApprovedPlan, toPendingPlan, toUserProfile } from './plan.mapper.js';

/**
 * chat_id values to match: Telegram ids arrive here as strings, but documents
 * written by other tools may hold the number.
 */
export function chatIdVariants(chatId: string): Array<string | number> {
  const numeric = Number(chatId);
  return /^-?\d+$/.test(chatId) && Number.isSafeInteger(numeric) ? [chatId, numeric] : [chatId];
}

function byCreatedAtDesc(a: ApprovedPlan, b: ApprovedPlan): number {
  if (a.createdAt && b.createdAt) return b.createdAt.getTime() - a.createdAt.getTime();
  if (a.createdAt) return -1;
  if (b.createdAt) return 1;
  return 0;
}

@Injectable()
export class PlansRepository {
  private readonly logger = new Logger(PlansRepository.name);

  constructor(private readonly firestoreService: FirestoreService) {}

  // ────────────────────────────────────────────
  // user_profile
  // ────────────────────────────────────────────
  listUserProfiles(): Promise<Result<UserProfile[]>> {
    return attempt(async () => {
      const snap = await this.firestoreService.collection(COLLECTIONS.userProfile).get();
      return snap.docs.map((doc) => toUserProfile(doc.id, doc.data()));
    });
  }

  // ────────────────────────────────────────────
  // approved_plans
  // ────────────────────────────────────────────

  /** Newest first, for /plan. Plans without created_at come last. */
  findRecentApprovedPlans(chatId: string, limit: number): Promise<Result<ApprovedPlan[]>> {
    return attempt(async () => {
      const plans = await this.approvedPlansFor(chatId);
      return plans.sort(byCreatedAtDesc).slice(0, limit);
    });
  }

  /** Approved plans whose status is anything but "completed" (a missing status counts as active). */
  findActiveApprovedPlans(chatId: string, limit: number): Promise<Result<ApprovedPlan[]>> {
    return attempt(async () => {
      const plans = await this.approvedPlansFor(chatId);
      return plans.filter((plan) => plan.status !== 'completed').slice(0, limit);
    });
  }

  // Single-field query only: an inequality or orderBy in Firestore drops
  // documents missing that field, and would need a composite index.
  private async approvedPlansFor(chatId: string): Promise<ApprovedPlan[]> {
    const snap = await this.firestoreService
      .collection(COLLECTIONS.approvedPlans)
      .where('chat_id', 'in', chatIdVariants(chatId))
      .get();
    return snap.docs.map((doc) => toApprovedPlan(doc.id, doc.data()));
  }

  // ────────────────────────────────────────────
  // pending_plans
  // ────────────────────────────────────────────
  findPendingPlans(chatId: string, limit: number): Promise<Result<PendingPlan[]>> {
    return attempt(async () => {
      const snap = await this.firestoreService
        .collection(COLLECTIONS.pendingPlans)
        .where('chat_id', 'in', chatIdVariants(chatId))
        .get();
      return snap.docs
        .filter((doc) => doc.data().status === 'pending')
        .slice(0, limit)
        .map((doc) => toPendingPlan(doc.id, doc.data()));
    });
  }

  // ────────────────────────────────────────────
  // user_messages
  // ────────────────────────────────────────────
  async saveUserMessage(entry: UserMessage): Promise<Result<string>> {
    const result = await attempt(async () => {
      const ref = await this.firestoreService.collection(COLLECTIONS.userMessages).add({
        chat_id: entry.chatId,
        message: entry.message,
        timestamp: entry.timestamp,
      });
      return ref.id;
    });
    if (result.ok) {
      this.logger.log(`Saved message from ${entry.chatId}`);
    }
    return result;
  }

  /** Liveness round trip against the database. */
  ping(): Promise<Result<number>> {
    return attempt(() => this.firestoreService.ping());
  }
}
