/**
 * Sunday-morning digest of each user's pending plans.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PlansRepository } from '../plans/plans.repository.js';
import { TelegramService } from '../telegram/telegram.service.js';
import { WEEKLY_NO_PLAN_TEXT, renderWeeklyDigest } from '../messages/message-templates.js';
import type { NotificationBatchReport } from '../types/notification.types.js';
import { NotificationBatch, recipientChatId } from './notification-batch.js';

export const WEEKLY_PENDING_LIMIT = 5;

@Injectable()
export class WeeklyPlannerService {
  private readonly logger = new Logger(WeeklyPlannerService.name);

  constructor(
    private readonly plansRepository: PlansRepository,
    private readonly telegramService: TelegramService,
  ) {}

  async run(): Promise<NotificationBatchReport> {
    this.logger.log('📅 WeeklyPlanner triggered');

    const users = await this.plansRepository.listUserProfiles();
    if (!users.ok) {
      this.logger.error(`❌ Error in WeeklyPlanner: ${users.error}`);
      return NotificationBatch.aborted('weekly-planner', users.error);
    }
    if (users.value.length === 0) {
      this.logger.warn('No users found in user_profile');
    }

    const batch = new NotificationBatch('weekly-planner', users.value.length);

    for (const user of users.value) {
      const chatId = recipientChatId(user);
      if (!chatId) {
        batch.markSkipped(user.chatId ?? user.id);
        continue;
      }

      this.logger.log(`Creating weekly plan for user: ${chatId}`);

      const pending = await this.plansRepository.findPendingPlans(chatId, WEEKLY_PENDING_LIMIT);
      if (!pending.ok) {
        batch.markFailed(chatId, pending.error);
        continue;
      }

      const text =
        pending.value.length === 0 ? WEEKLY_NO_PLAN_TEXT : renderWeeklyDigest(pending.value);

      const sent = await this.telegramService.sendMessage(text, chatId);
      if (!sent.ok) {
        batch.markFailed(chatId, sent.error);
        continue;
      }
      batch.markNotified(chatId);
    }

    const report = batch.report();
    if (report.failed.length > 0) {
      this.logger.warn(
        `WeeklyPlanner failed for ${report.failed.length} user(s): ${report.failed.map((f) => f.chatId).join(', ')}`,
      );
    }
    this.logger.log(`✅ WeeklyPlanner completed for ${report.totalUsers} users`);
    return report;
  }
}
