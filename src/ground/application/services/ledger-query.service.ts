import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { formatInTimeZone } from 'date-fns-tz';
import { DATA_ROWS, LedgerStore } from '../../ports/ledger-store.interface';
import { NotificationSink } from '../../ports/notification-sink.interface';
import {
  CLOCK,
  GROUND_POLICY,
  LEDGER_STORE,
  NOTIFICATION_SINK,
} from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import { ExternalStoreError } from '../../domain/errors/reservation.errors';
import { decodeLedgerRow } from '../../domain/ledger/ledger-row.codec';
import { BookingRecord } from '../../domain/types/booking-record.type';
import { BookingStatus } from '../../domain/types/booking-status.enum';
import { Clock } from '../../domain/types/clock.type';
import { MonthlySummary } from '../../domain/types/monthly-summary.type';
import { Result, err, ok } from '../../domain/types/result.type';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { AllConfigType } from '../../../config/config.type';
import { withTimeout } from '../utils/with-timeout.util';

export interface DailySummary {
  date: string;
  records: BookingRecord[];
  totalFee: number;
}

@Injectable()
export class LedgerQueryService {
  private readonly timeoutMs: number;

  constructor(
    @Inject(LEDGER_STORE)
    private readonly ledgerStore: LedgerStore,
    @Inject(NOTIFICATION_SINK)
    private readonly notificationSink: NotificationSink,
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly logger: LoggerService,
    private readonly metricsService: MetricsService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.timeoutMs = configService.getOrThrow('ground.externalCallTimeoutMs', {
      infer: true,
    });
  }

  /** Today's date in the ground's timezone, as stored in the ledger. */
  today(): string {
    return formatInTimeZone(this.clock.now(), this.policy.timezone, 'yyyy-MM-dd');
  }

  async listToday(): Promise<Result<BookingRecord[], ExternalStoreError>> {
    const rows = await this.readRecords();
    if (!rows.ok) {
      return rows;
    }

    const today = this.today();
    const records = rows.value
      .filter(
        (r) => r.date === today && r.status !== BookingStatus.CANCELLED,
      )
      // HH:MM sorts correctly as a string
      .sort((a, b) =>
        a.startTime < b.startTime ? -1 : a.startTime > b.startTime ? 1 : 0,
      );

    return ok(records);
  }

  async monthlySummary(
    year: number,
    month: number,
  ): Promise<Result<MonthlySummary, ExternalStoreError>> {
    const rows = await this.readRecords();
    if (!rows.ok) {
      return rows;
    }

    const prefix = `${year}-${String(month).padStart(2, '0')}-`;
    const summary: MonthlySummary = {
      year,
      month,
      count: 0,
      cancelledCount: 0,
      totalFee: 0,
    };

    for (const record of rows.value) {
      if (!record.date.startsWith(prefix)) {
        continue;
      }
      if (record.status === BookingStatus.CANCELLED) {
        summary.cancelledCount++;
        continue;
      }
      summary.count++;
      if (record.totalFee === null) {
        this.logger.warn('Ledger row has a malformed fee, left out of the total', {
          reservationId: record.reservationId,
          date: record.date,
        });
        continue;
      }
      summary.totalFee += record.totalFee;
    }

    return ok(summary);
  }

  /** Posts today's bookings and their fee total to the notification sink. */
  async sendDailySummary(): Promise<Result<DailySummary, ExternalStoreError>> {
    const listed = await this.listToday();
    if (!listed.ok) {
      return listed;
    }

    const summary: DailySummary = {
      date: this.today(),
      records: listed.value,
      totalFee: listed.value.reduce((sum, r) => sum + (r.totalFee ?? 0), 0),
    };

    try {
      await withTimeout(
        this.notificationSink.send({ type: 'daily_summary', ...summary }),
        this.timeoutMs,
        'notification.send',
      );
    } catch (error) {
      this.metricsService.recordStoreFailure('notification');
      this.logger.error('Daily summary notification failed', error, {
        date: summary.date,
      });
      return err(new ExternalStoreError('notification', 'send', error));
    }

    return ok(summary);
  }

  private async readRecords(): Promise<
    Result<BookingRecord[], ExternalStoreError>
  > {
    try {
      const rows = await withTimeout(
        this.ledgerStore.readRows(DATA_ROWS),
        this.timeoutMs,
        'ledger.readRows',
      );
      return ok(
        rows
          .filter((cells) => cells.some((cell) => cell.trim() !== ''))
          .map(decodeLedgerRow),
      );
    } catch (error) {
      this.metricsService.recordStoreFailure('ledger');
      this.logger.error('Ledger read failed', error);
      return err(new ExternalStoreError('ledger', 'readRows', error));
    }
  }
}
