/**
 * GET /api/health: process liveness for the hosting platform.
 * Touches no back end; the keep-alive job does that on its own schedule.
 */

import { Controller, Get } from '@nestjs/common';
import { SchedulerService } from '../scheduler/scheduler.service.js';

export interface HealthResponse {
  status: 'ok';
  uptimeSeconds: number;
  nextRuns: ReturnType<SchedulerService['nextInvocations']>;
}

@Controller('health')
export class HealthController {
  constructor(private readonly schedulerService: SchedulerService) {}

  @Get()
  health(): HealthResponse {
    return {
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      nextRuns: this.schedulerService.nextInvocations(),
    };
  }
}
