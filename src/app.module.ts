import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PlansModule } from './plans/plans.module.js';
import { GoogleModule } from './google/google.module.js';
import { SupabaseModule } from './supabase/supabase.module.js';
import { TelegramModule } from './telegram/telegram.module.js';
import { WebhookModule } from './webhook/webhook.module.js';
import { SchedulerModule } from './scheduler/scheduler.module.js';
import { HealthModule } from './health/health.module.js';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }), // reads .env
    PlansModule,
    GoogleModule,
    SupabaseModule,
    TelegramModule,
    WebhookModule,
    SchedulerModule,
    HealthModule,
  ],
})
export class AppModule {}
