import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { formatInTimeZone } from 'date-fns-tz';
import { randomUUID } from 'crypto';
import { CalendarStore } from '../../ports/calendar-store.interface';
import { LedgerStore } from '../../ports/ledger-store.interface';
import { NotificationSink } from '../../ports/notification-sink.interface';
import {
  CALENDAR_STORE,
  CLOCK,
  GROUND_POLICY,
  LEDGER_STORE,
  NOTIFICATION_SINK,
} from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import {
  CommitFailure,
  CompensationOutcome,
  ConflictRejection,
  ExternalStoreError,
  ValidationError,
} from '../../domain/errors/reservation.errors';
import {
  DAY_TYPE_LABELS,
  LEDGER_COLUMNS,
  encodeLedgerRow,
} from '../../domain/ledger/ledger-row.codec';
import { BookingRecord } from '../../domain/types/booking-record.type';
import { BookingStatus } from '../../domain/types/booking-status.enum';
import { Clock } from '../../domain/types/clock.type';
import {
  CommitStateName,
  Confirmation,
} from '../../domain/types/confirmation.type';
import { FeeBreakdown } from '../../domain/types/fee-breakdown.type';
import { NewCalendarEvent } from '../../domain/types/calendar-event.type';
import { NotificationMessage } from '../../domain/types/notification-message.type';
import { ReservationCandidate } from '../../domain/types/reservation-candidate.type';
import { ReservationRequest } from '../../domain/types/reservation-request.type';
import { Result, err, ok } from '../../domain/types/result.type';
import { dayOfWeekLabel } from '../../domain/utils/clock-time.util';
import { PricingPolicyService } from '../../domain/services/pricing-policy.service';
import { RequestNormalizerService } from '../../domain/services/request-normalizer.service';
import {
  LockManagerService,
  LockTimeoutError,
} from '../../infrastructure/locking/lock-manager.service';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { AllConfigType } from '../../../config/config.type';
import { ConflictDetectorService } from './conflict-detector.service';
import { courtLabel, formatYen } from '../messages/reply-text';
import { withTimeout } from '../utils/with-timeout.util';
import { reservationWindow } from '../utils/reservation-window.util';

type Committed = {
  request: ReservationRequest;
  fee: FeeBreakdown;
  calendarEventId: string;
};

type Recorded = Committed & {
  reservationId: string;
  ledgerRowIndex: number;
};

type CommitState =
  | { name: 'Received'; candidate: ReservationCandidate }
  | { name: 'Validated'; request: ReservationRequest }
  | { name: 'ConflictChecked'; request: ReservationRequest }
  | { name: 'Priced'; request: ReservationRequest; fee: FeeBreakdown }
  | ({ name: 'CalendarCommitted' } & Committed)
  | ({ name: 'LedgerCommitted' } & Recorded)
  | ({ name: 'Notified' } & Recorded)
  | ({ name: 'Done' } & Recorded)
  | { name: 'Rejected'; failure: ValidationError | ConflictRejection }
  | { name: 'Failed'; failure: ExternalStoreError };

type TerminalState = Extract<CommitState, { name: 'Done' | 'Rejected' | 'Failed' }>;
type ActiveState = Exclude<CommitState, TerminalState>;

interface CommitSession {
  requestId: string;
  trail: CommitStateName[];
  releaseLock?: () => void;
}

const isTerminal = (state: CommitState): state is TerminalState =>
  state.name === 'Done' || state.name === 'Rejected' || state.name === 'Failed';

/**
 * Runs one reservation through
 * Received -> Validated -> ConflictChecked -> Priced -> CalendarCommitted
 * -> LedgerCommitted -> Notified -> Done, stopping at Rejected (bad input or
 * taken slot) or Failed (calendar or ledger write).
 *
 * Each step only moves the state forward, so compensation lives next to the
 * transition that needs it: a ledger failure deletes the calendar event it
 * would otherwise orphan.
 */
@Injectable()
export class ReservationCommitterService implements OnModuleInit {
  private readonly timeoutMs: number;

  constructor(
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    @Inject(CALENDAR_STORE)
    private readonly calendarStore: CalendarStore,
    @Inject(LEDGER_STORE)
    private readonly ledgerStore: LedgerStore,
    @Inject(NOTIFICATION_SINK)
    private readonly notificationSink: NotificationSink,
    @Inject(CLOCK)
    private readonly clock: Clock,
    private readonly requestNormalizerService: RequestNormalizerService,
    private readonly pricingPolicyService: PricingPolicyService,
    private readonly conflictDetectorService: ConflictDetectorService,
    private readonly lockManagerService: LockManagerService,
    private readonly metricsService: MetricsService,
    private readonly logger: LoggerService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.timeoutMs = configService.getOrThrow('ground.externalCallTimeoutMs', {
      infer: true,
    });
  }

  async onModuleInit(): Promise<void> {
    try {
      await withTimeout(
        this.ledgerStore.ensureHeaderRow(LEDGER_COLUMNS),
        this.timeoutMs,
        'ledger.ensureHeaderRow',
      );
    } catch (error) {
      this.logger.warn('Could not verify ledger header row', { err: error });
    }
  }

  async commit(
    candidate: ReservationCandidate,
  ): Promise<Result<Confirmation, CommitFailure>> {
    const session: CommitSession = { requestId: randomUUID(), trail: [] };
    const startTime = Date.now();

    let state: CommitState = { name: 'Received', candidate };
    try {
      for (;;) {
        if (isTerminal(state)) {
          return this.finish(state, session, startTime);
        }
        session.trail.push(state.name);
        state = await this.advance(state, session);
      }
    } finally {
      this.releaseLock(session);
    }
  }

  private async advance(
    state: ActiveState,
    session: CommitSession,
  ): Promise<CommitState> {
    switch (state.name) {
      case 'Received': {
        const normalized = this.requestNormalizerService.normalize(
          state.candidate,
        );
        if (!normalized.ok) {
          this.metricsService.recordRejection('validation');
          return { name: 'Rejected', failure: normalized.error };
        }
        return { name: 'Validated', request: normalized.value };
      }

      case 'Validated':
        return this.checkConflict(state.request, session);

      case 'ConflictChecked': {
        const { request } = state;
        const fee = this.pricingPolicyService.computeFee(
          request.category,
          request.dayType,
          request.hours,
        );
        return { name: 'Priced', request, fee };
      }

      case 'Priced':
        return this.writeCalendar(state.request, state.fee, session);

      case 'CalendarCommitted':
        return this.writeLedger(state, session);

      case 'LedgerCommitted': {
        const { name: _name, ...recorded } = state;
        await this.notify(
          {
            type: 'reservation_created',
            request: recorded.request,
            fee: recorded.fee,
            reservationId: recorded.reservationId,
            ledgerRowIndex: recorded.ledgerRowIndex,
            sentAt: this.clock.now(),
          },
          session,
        );
        return { ...recorded, name: 'Notified' };
      }

      case 'Notified': {
        const { name: _name, ...recorded } = state;
        return { ...recorded, name: 'Done' };
      }
    }
  }

  /**
   * Holds the court/date lock from here until the calendar write settles, so
   * two requests for the same court cannot both pass the check first.
   */
  private async checkConflict(
    request: ReservationRequest,
    session: CommitSession,
  ): Promise<CommitState> {
    if (this.policy.serializeCommits) {
      try {
        const lock = await this.lockManagerService.acquire(
          `${request.court}|${request.date}`,
          this.policy.lockTimeoutMs,
        );
        session.releaseLock = lock.release;
        this.metricsService.recordLockWaitTime(lock.waitTimeMs);
      } catch (error) {
        if (error instanceof LockTimeoutError) {
          this.metricsService.recordLockTimeout();
          this.metricsService.recordRejection('court_locked');
          return {
            name: 'Rejected',
            failure: new ConflictRejection(request, 'court_locked'),
          };
        }
        throw error;
      }
    }

    const conflict = await this.conflictDetectorService.hasConflict(request);
    if (!conflict) {
      return { name: 'ConflictChecked', request };
    }

    this.releaseLock(session);
    this.metricsService.recordRejection('slot_taken');
    // Turned-away requests are reported too
    await this.notify({ type: 'conflict', request }, session);
    return {
      name: 'Rejected',
      failure: new ConflictRejection(request, 'slot_taken'),
    };
  }

  private async writeCalendar(
    request: ReservationRequest,
    fee: FeeBreakdown,
    session: CommitSession,
  ): Promise<CommitState> {
    try {
      const calendarEventId = await withTimeout(
        this.calendarStore.createEvent(this.buildCalendarEvent(request, fee)),
        this.timeoutMs,
        'calendar.createEvent',
      );
      return { name: 'CalendarCommitted', request, fee, calendarEventId };
    } catch (error) {
      this.metricsService.recordStoreFailure('calendar');
      this.logger.error('Calendar write failed, reservation aborted', error, {
        requestId: session.requestId,
        court: request.court,
        date: request.date,
        startTime: request.startTime,
      });
      return {
        name: 'Failed',
        failure: new ExternalStoreError('calendar', 'createEvent', error),
      };
    } finally {
      this.releaseLock(session);
    }
  }

  private async writeLedger(
    state: Committed,
    session: CommitSession,
  ): Promise<CommitState> {
    const record = this.buildRecord(state);

    try {
      const ledgerRowIndex = await withTimeout(
        this.ledgerStore.appendRow(encodeLedgerRow(record)),
        this.timeoutMs,
        'ledger.appendRow',
      );
      return {
        request: state.request,
        fee: state.fee,
        calendarEventId: state.calendarEventId,
        reservationId: record.reservationId,
        ledgerRowIndex,
        name: 'LedgerCommitted',
      };
    } catch (error) {
      this.metricsService.recordStoreFailure('ledger');
      this.logger.error('Ledger write failed after calendar write', error, {
        requestId: session.requestId,
        reservationId: record.reservationId,
        calendarEventId: state.calendarEventId,
      });
      const compensation = await this.compensateCalendar(
        state.calendarEventId,
        session,
      );
      return {
        name: 'Failed',
        failure: new ExternalStoreError(
          'ledger',
          'appendRow',
          error,
          compensation,
        ),
      };
    }
  }

  private async compensateCalendar(
    calendarEventId: string,
    session: CommitSession,
  ): Promise<CompensationOutcome> {
    try {
      await withTimeout(
        this.calendarStore.deleteEvent(calendarEventId),
        this.timeoutMs,
        'calendar.deleteEvent',
      );
      this.metricsService.recordCompensation('completed');
      return 'completed';
    } catch (error) {
      this.metricsService.recordCompensation('failed');
      this.logger.error(
        'Calendar compensation failed; event is orphaned and needs manual removal',
        error,
        { requestId: session.requestId, calendarEventId },
      );
      return 'failed';
    }
  }

  /** Best effort: a failed notification never undoes or retries anything. */
  private async notify(
    message: NotificationMessage,
    session: CommitSession,
  ): Promise<void> {
    try {
      await withTimeout(
        this.notificationSink.send(message),
        this.timeoutMs,
        'notification.send',
      );
    } catch (error) {
      this.metricsService.recordStoreFailure('notification');
      this.logger.error('Notification failed', error, {
        requestId: session.requestId,
        type: message.type,
      });
    }
  }

  private finish(
    state: TerminalState,
    session: CommitSession,
    startTime: number,
  ): Result<Confirmation, CommitFailure> {
    session.trail.push(state.name);
    const durationMs = Date.now() - startTime;

    if (state.name === 'Done') {
      this.metricsService.recordReservationCommitted();
      this.metricsService.recordCommitTime(durationMs);
      this.logger.log({
        requestId: session.requestId,
        court: state.request.court,
        date: state.request.date,
        reservationId: state.reservationId,
        op: 'commit',
        durationMs,
        outcome: 'done',
      });
      return ok({
        request: state.request,
        fee: state.fee,
        reservationId: state.reservationId,
        ledgerRowIndex: state.ledgerRowIndex,
        calendarEventId: state.calendarEventId,
        trail: [...session.trail],
      });
    }

    this.logger.log({
      requestId: session.requestId,
      op: 'commit',
      durationMs,
      outcome: state.name === 'Rejected' ? state.failure.kind : 'failed',
      detail: state.failure.message,
      trail: session.trail,
    });
    return err(state.failure);
  }

  private releaseLock(session: CommitSession): void {
    session.releaseLock?.();
    session.releaseLock = undefined;
  }

  private buildCalendarEvent(
    request: ReservationRequest,
    fee: FeeBreakdown,
  ): NewCalendarEvent {
    const court = this.policy.courts.find((c) => c.id === request.court);

    return {
      ...reservationWindow(request, this.policy.timezone),
      summary: `[${request.court}] ${request.name}`,
      description: [
        `Name: ${request.name}`,
        `Phone: ${request.phone}`,
        `Court: ${courtLabel(this.policy, request.court)}`,
        `Category: ${fee.categoryLabel}`,
        `Fee: ${formatYen(fee.total)} (${formatYen(fee.ratePerHour)}/h x ${fee.hours}h / ${DAY_TYPE_LABELS[fee.dayType]})`,
        `Payment: ${fee.paymentMethod}`,
        `Notes: ${request.notes}`,
      ].join('\n'),
      colorTag: court?.colorTag ?? '9',
    };
  }

  private buildRecord(state: Committed): BookingRecord {
    const { request, fee, calendarEventId } = state;
    const now = this.clock.now();
    const timezone = this.policy.timezone;
    const suffix = randomUUID().replace(/-/g, '').slice(0, 6).toUpperCase();

    return {
      reservationId: `R${formatInTimeZone(now, timezone, 'yyyyMMddHHmmss')}-${suffix}`,
      receivedAt: formatInTimeZone(now, timezone, 'yyyy-MM-dd HH:mm:ss'),
      date: request.date,
      dayOfWeek: dayOfWeekLabel(request.date),
      startTime: request.startTime,
      endTime: request.endTime,
      court: request.court,
      name: request.name,
      phone: request.phone,
      categoryLabel: fee.categoryLabel,
      hours: fee.hours,
      ratePerHour: fee.ratePerHour,
      totalFee: fee.total,
      dayTypeLabel: DAY_TYPE_LABELS[fee.dayType],
      status: BookingStatus.CONFIRMED,
      calendarEventId,
      notes: request.notes,
    };
  }
}
