/**
 * Cron rules (minute hour day-of-month month day-of-week),
 * evaluated in SCHEDULE_TIMEZONE.
 */

export const DEFAULT_SCHEDULE_TIMEZONE = 'Asia/Ho_Chi_Minh';

export const SCHEDULES = {
  /** Sunday 09:00 */
  weeklyPlanner: '0 9 * * 0',
  /** 06:00, 12:00, 18:00, 21:00 */
  dailyReminder: '0 6,12,18,21 * * *',
  /** 00:00 every 5th day of the month */
  keepAlive: '0 0 */5 * *',
} as const;

export type ScheduledJobName = keyof typeof SCHEDULES;
