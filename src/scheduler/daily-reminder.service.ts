/**
 * Reminder at 06:00 / 12:00 / 18:00 / 21:00 local time.
 *
 * A user is reminded only when the current slot is in their reminder_times.
 * Users without active plans get the "start your day" prompt at 06:00 and
 * nothing at the other slots.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PlansRepository } from '../plans/plans.repository.js';
import { TelegramService } from '../telegram/telegram.service.js';
import { formatSlot, localHour } from '../common/local-time.js';
import { MORNING_NO_PLAN_TEXT, renderDailyReminder } from '../messages/message-templates.js';
import type { NotificationBatchReport } from '../types/notification.types.js';
import { NotificationBatch, recipientChatId } from './notification-batch.js';

export const DAILY_ACTIVE_LIMIT = 3;
export const MORNING_HOUR = 6;

@Injectable()
export class DailyReminderService {
  private readonly logger = new Logger(DailyReminderService.name);

  constructor(
    private readonly plansRepository: PlansRepository,
    private readonly telegramService: TelegramService,
  ) {}

  /** `firedAt` is the trigger time; its UTC+7 hour selects the slot. */
  async run(firedAt: Date): Promise<NotificationBatchReport> {
    this.logger.log('⏰ DailyReminder triggered');

    const hour = localHour(firedAt);
    const slot = formatSlot(hour);
    this.logger.log(`Current hour (local): ${hour}`);

    const users = await this.plansRepository.listUserProfiles();
    if (!users.ok) {
      this.logger.error(`❌ Error in DailyReminder: ${users.error}`);
      return NotificationBatch.aborted('daily-reminder', users.error);
    }
    if (users.value.length === 0) {
      this.logger.warn('No users found in user_profile');
    }

    const batch = new NotificationBatch('daily-reminder', users.value.length);

    for (const user of users.value) {
      const chatId = recipientChatId(user);
      if (!chatId || !user.reminderTimes.includes(slot)) {
        batch.markSkipped(chatId ?? user.id);
        continue;
      }

      this.logger.log(`Sending reminder to user: ${chatId} at ${slot}`);

      const plans = await this.plansRepository.findActiveApprovedPlans(chatId, DAILY_ACTIVE_LIMIT);
      if (!plans.ok) {
        batch.markFailed(chatId, plans.error);
        continue;
      }

      let text: string;
      if (plans.value.length > 0) {
        text = renderDailyReminder(hour, plans.value);
      } else if (hour === MORNING_HOUR) {
        text = MORNING_NO_PLAN_TEXT;
      } else {
        // no plans outside the morning slot: stay quiet
        batch.markSkipped(chatId);
        continue;
      }

      const sent = await this.telegramService.sendMessage(text, chatId);
      if (!sent.ok) {
        batch.markFailed(chatId, sent.error);
        continue;
      }
      batch.markNotified(chatId);
      this.logger.log(`✅ Reminder sent to ${chatId}`);
    }

    const report = batch.report();
    this.logger.log(`✅ DailyReminder completed for ${report.totalUsers} users`);
    return report;
  }
}
