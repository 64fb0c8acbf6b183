/**
 * Registers the timer jobs with node-schedule at application start and
 * cancels them on shutdown. Each firing is independent; a failure is
 * logged and the next firing runs as usual.
 */

import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as schedule from 'node-schedule';
import { WeeklyPlannerService } from './weekly-planner.service.js';
import { DailyReminderService } from './daily-reminder.service.js';
import { KeepAliveService } from './keep-alive.service.js';
import { DEFAULT_SCHEDULE_TIMEZONE, SCHEDULES, type ScheduledJobName } from './schedules.js';

@Injectable()
export class SchedulerService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly jobs = new Map<ScheduledJobName, schedule.Job>();

  constructor(
    private readonly config: ConfigService,
    private readonly weeklyPlanner: WeeklyPlannerService,
    private readonly dailyReminder: DailyReminderService,
    private readonly keepAlive: KeepAliveService,
  ) {}

  onApplicationBootstrap(): void {
    if (this.config.get<string>('SCHEDULER_ENABLED') === 'false') {
      this.logger.warn('SCHEDULER_ENABLED=false: timer jobs are not registered');
      return;
    }

    const tz = this.config.get<string>('SCHEDULE_TIMEZONE') || DEFAULT_SCHEDULE_TIMEZONE;

    this.register('weeklyPlanner', tz, () => this.weeklyPlanner.run());
    this.register('dailyReminder', tz, (firedAt) => this.dailyReminder.run(firedAt));
    this.register('keepAlive', tz, () => this.keepAlive.run());
  }

  async onApplicationShutdown(): Promise<void> {
    for (const job of this.jobs.values()) {
      job.cancel();
    }
    this.jobs.clear();
    await schedule.gracefulShutdown();
  }

  /** Next planned firing per job (ISO); null when the job is not registered. */
  nextInvocations(): Record<ScheduledJobName, string | null> {
    const next = (name: ScheduledJobName): string | null =>
      this.jobs.get(name)?.nextInvocation()?.toISOString() ?? null;
    return {
      weeklyPlanner: next('weeklyPlanner'),
      dailyReminder: next('dailyReminder'),
      keepAlive: next('keepAlive'),
    };
  }

  private register(
    name: ScheduledJobName,
    tz: string,
    task: (firedAt: Date) => Promise<unknown>,
  ): void {
    const job = schedule.scheduleJob(name, { rule: SCHEDULES[name], tz }, (fireDate: Date) => {
      void this.execute(name, () => task(fireDate));
    });

    if (!job) {
      this.logger.error(`Failed to schedule ${name} (${SCHEDULES[name]}, ${tz})`);
      return;
    }
    this.jobs.set(name, job);
    this.logger.log(`Scheduled ${name}: "${SCHEDULES[name]}" (${tz})`);
  }

  private async execute(name: ScheduledJobName, task: () => Promise<unknown>): Promise<void> {
    try {
      const outcome = await task();
      this.logger.log(`${name} finished: ${JSON.stringify(outcome)}`);
    } catch (err) {
      this.logger.error(`❌ Error in ${name}`, err instanceof Error ? err.stack : err);
    }
  }
}
