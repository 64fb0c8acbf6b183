/**
 * Firestore document data → domain types.
 * Documents are written by other tools, so every field is treated as untrusted.
 */

import { Timestamp, type DocumentData } from 'firebase-admin/firestore';
import type { ApprovedPlan, PendingPlan } from '../types/plan.types.js';
import { DEFAULT_REMINDER_TIMES, type UserProfile } from '../types/user-profile.types.js';

function asText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function asDate(value: unknown): Date | null {
  if (value instanceof Timestamp) return value.toDate();
  if (value instanceof Date) return value;
  return null;
}

export function toPendingPlan(id: string, data: DocumentData): PendingPlan {
  return {
    id,
    chatId: asText(data.chat_id) ?? '',
    goal: asText(data.goal) ?? 'N/A',
    status: asText(data.status) ?? 'pending',
  };
}

export function toApprovedPlan(id: string, data: DocumentData): ApprovedPlan {
  return {
    id,
    chatId: asText(data.chat_id) ?? '',
    goal: asText(data.goal) ?? 'N/A',
    status: asText(data.status) ?? 'pending',
    createdAt: asDate(data.created_at),
  };
}

export function toUserProfile(id: string, data: DocumentData): UserProfile {
  const times: unknown = data.reminder_times;
  const reminderTimes =
    Array.isArray(times) ? times.filter((t): t is string => typeof t === 'string') : DEFAULT_REMINDER_TIMES;

  return {
    id,
    chatId: asText(data.chat_id) || null,
    reminderTimes,
  };
}
