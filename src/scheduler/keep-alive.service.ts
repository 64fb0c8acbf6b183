/**
 * Periodic round trip to every back end so that free-tier projects
 * (Supabase in particular) are not paused for inactivity.
 *
 * Probes run in order and stop at the first failure.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PlansRepository } from '../plans/plans.repository.js';
import { VectorSearchService } from '../supabase/vector-search.service.js';
import { GeminiService } from '../google/gemini.service.js';
import { TelegramService } from '../telegram/telegram.service.js';
import { ok, type Result } from '../common/result.js';
import { SYSTEMS_OPERATIONAL_TEXT, renderKeepAliveError } from '../messages/message-templates.js';
import type { HealthProbeStep, HealthReport } from '../types/notification.types.js';

const GEMINI_PING_PROMPT = "Say 'OK' in one word";

interface Probe {
  step: HealthProbeStep;
  run: () => Promise<Result<string>>;
}

@Injectable()
export class KeepAliveService {
  private readonly logger = new Logger(KeepAliveService.name);

  constructor(
    private readonly plansRepository: PlansRepository,
    private readonly vectorSearchService: VectorSearchService,
    private readonly geminiService: GeminiService,
    private readonly telegramService: TelegramService,
  ) {}

  private probes(): Probe[] {
    return [
      {
        step: 'firestore',
        run: async () => {
          const r = await this.plansRepository.ping();
          return r.ok ? ok(`${r.value} collections`) : r;
        },
      },
      {
        step: 'supabase',
        run: async () => {
          const r = await this.vectorSearchService.ping();
          return r.ok ? ok(`${r.value} records`) : r;
        },
      },
      {
        step: 'gemini',
        run: async () => {
          const r = await this.geminiService.generate(GEMINI_PING_PROMPT);
          return r.ok ? ok(r.value.slice(0, 20)) : r;
        },
      },
    ];
  }

  async run(): Promise<HealthReport> {
    this.logger.log('🔄 KeepAlive triggered');

    for (const probe of this.probes()) {
      const result = await probe.run();
      if (!result.ok) {
        this.logger.error(`❌ Error in KeepAlive (${probe.step}): ${result.error}`);
        const alert = await this.telegramService.sendMessage(renderKeepAliveError(result.error));
        return { status: 'error', failedStep: probe.step, error: result.error, notificationSent: alert.ok };
      }
      this.logger.log(`✅ ${probe.step} ping: ${result.value}`);
    }

    const sent = await this.telegramService.sendMessage(SYSTEMS_OPERATIONAL_TEXT);
    this.logger.log('✅ KeepAlive completed successfully');
    return { status: 'ok', notificationSent: sent.ok };
  }
}
