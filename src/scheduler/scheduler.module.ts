import { Module } from '@nestjs/common';
import { SchedulerService } from './scheduler.service.js';
import { WeeklyPlannerService } from './weekly-planner.service.js';
import { DailyReminderService } from './daily-reminder.service.js';
import { KeepAliveService } from './keep-alive.service.js';

@Module({
  providers: [SchedulerService, WeeklyPlannerService, DailyReminderService, KeepAliveService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
