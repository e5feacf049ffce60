import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AllConfigType } from '../config/config.type';
import { loadGroundPolicy } from './domain/policy/ground-policy';
import { systemClock } from './domain/types/clock.type';
import { PricingPolicyService } from './domain/services/pricing-policy.service';
import { RequestNormalizerService } from './domain/services/request-normalizer.service';
import { ConflictDetectorService } from './application/services/conflict-detector.service';
import { LedgerQueryService } from './application/services/ledger-query.service';
import { MessageHandlerService } from './application/services/message-handler.service';
import { ReservationCommitterService } from './application/services/reservation-committer.service';
import { GoogleCalendarStore } from './infrastructure/calendar/google-calendar.store';
import { GeminiExtractor } from './infrastructure/extraction/gemini.extractor';
import { GroundController } from './infrastructure/http/ground.controller';
import { GoogleSheetsLedgerStore } from './infrastructure/ledger/google-sheets.ledger-store';
import { SqliteLedgerStore } from './infrastructure/ledger/sqlite.ledger-store';
import { LockManagerService } from './infrastructure/locking/lock-manager.service';
import { LoggerService } from './infrastructure/logging/logger.service';
import { MetricsService } from './infrastructure/metrics/metrics.service';
import { DiscordNotificationSink } from './infrastructure/notifications/discord-notification.sink';
import { LedgerRowEntity } from './infrastructure/persistence/ledger-row.entity';
import {
  CALENDAR_STORE,
  CLOCK,
  EXTRACTOR,
  GROUND_POLICY,
  LEDGER_STORE,
  NOTIFICATION_SINK,
} from './tokens';

@Module({
  imports: [
    TypeOrmModule.forFeature([LedgerRowEntity]),
    ThrottlerModule.forRoot([
      {
        ttl: 60000,
        limit: process.env.NODE_ENV === 'test' ? 10000 : 100, // Overridden per route by @Throttle
      },
    ]),
  ],
  controllers: [GroundController],
  providers: [
    // Shared values
    {
      provide: GROUND_POLICY,
      useFactory: (
        configService: ConfigService<AllConfigType>,
        logger: LoggerService,
      ) => {
        const path = configService.getOrThrow('ground.policyPath', {
          infer: true,
        });
        const { policy, source } = loadGroundPolicy(path);
        logger.log({ op: 'load_policy', outcome: source, path });
        return policy;
      },
      inject: [ConfigService, LoggerService],
    },
    {
      provide: CLOCK,
      useValue: systemClock,
    },
    // Domain services
    PricingPolicyService,
    RequestNormalizerService,
    // Infrastructure services
    LockManagerService,
    LoggerService,
    MetricsService,
    // Ports (provide tokens, use implementations)
    {
      provide: CALENDAR_STORE,
      useClass: GoogleCalendarStore,
    },
    {
      provide: LEDGER_STORE,
      useFactory: (
        configService: ConfigService<AllConfigType>,
        repository: Repository<LedgerRowEntity>,
      ) =>
        configService.getOrThrow('ground.ledgerDriver', { infer: true }) ===
        'sheets'
          ? new GoogleSheetsLedgerStore(configService)
          : new SqliteLedgerStore(repository),
      inject: [ConfigService, getRepositoryToken(LedgerRowEntity)],
    },
    {
      provide: NOTIFICATION_SINK,
      useClass: DiscordNotificationSink,
    },
    {
      provide: EXTRACTOR,
      useClass: GeminiExtractor,
    },
    // Application services
    ConflictDetectorService,
    ReservationCommitterService,
    LedgerQueryService,
    MessageHandlerService,
    // Rate limiting
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class GroundModule {}
