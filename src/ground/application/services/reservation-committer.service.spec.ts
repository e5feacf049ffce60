import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ReservationCommitterService } from './reservation-committer.service';
import { ConflictDetectorService } from './conflict-detector.service';
import {
  CALENDAR_STORE,
  CLOCK,
  GROUND_POLICY,
  LEDGER_STORE,
  NOTIFICATION_SINK,
} from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import {
  ConflictRejection,
  ExternalStoreError,
  MissingFieldError,
} from '../../domain/errors/reservation.errors';
import { LEDGER_COLUMNS } from '../../domain/ledger/ledger-row.codec';
import { DayType } from '../../domain/types/day-type.enum';
import { ReservationCandidate } from '../../domain/types/reservation-candidate.type';
import { PricingPolicyService } from '../../domain/services/pricing-policy.service';
import { RequestNormalizerService } from '../../domain/services/request-normalizer.service';
import { LockManagerService } from '../../infrastructure/locking/lock-manager.service';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { InMemoryCalendarStore } from '../../../../test/ground/fakes/in-memory-calendar.store';
import { InMemoryLedgerStore } from '../../../../test/ground/fakes/in-memory-ledger.store';
import { RecordingNotificationSink } from '../../../../test/ground/fakes/recording-notification.sink';
import { FixedClock } from '../../../../test/ground/fakes/fixed-clock';
import { testPolicy } from '../../../../test/ground/support/test-policy';
import { testConfigService } from '../../../../test/ground/support/test-config';

describe('ReservationCommitterService', () => {
  let service: ReservationCommitterService;
  let calendar: InMemoryCalendarStore;
  let ledger: InMemoryLedgerStore;
  let sink: RecordingNotificationSink;
  let metricsService: MetricsService;
  let lockManagerService: LockManagerService;

  // Monday 2026-10-19 10:00 in Tokyo
  const clock = new FixedClock(new Date('2026-10-19T01:00:00Z'));

  // Saturday morning, three hours asked for
  const saturday: ReservationCandidate = {
    date: '2026-10-24',
    startTime: '09:00',
    hours: 3,
    name: 'Taro Tanaka',
    phone: '090-0000-0000',
    category: 'general',
  };

  const build = async (
    options: {
      policy?: GroundPolicy;
      calendar?: InMemoryCalendarStore;
    } = {},
  ) => {
    calendar = options.calendar ?? new InMemoryCalendarStore();
    ledger = new InMemoryLedgerStore();
    sink = new RecordingNotificationSink();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReservationCommitterService,
        ConflictDetectorService,
        RequestNormalizerService,
        PricingPolicyService,
        LockManagerService,
        LoggerService,
        MetricsService,
        { provide: GROUND_POLICY, useValue: options.policy ?? testPolicy() },
        { provide: CALENDAR_STORE, useValue: calendar },
        { provide: LEDGER_STORE, useValue: ledger },
        { provide: NOTIFICATION_SINK, useValue: sink },
        { provide: CLOCK, useValue: clock },
        { provide: ConfigService, useValue: testConfigService(200) },
      ],
    }).compile();

    service = module.get<ReservationCommitterService>(
      ReservationCommitterService,
    );
    metricsService = module.get<MetricsService>(MetricsService);
    lockManagerService = module.get<LockManagerService>(LockManagerService);
  };

  beforeEach(async () => {
    await build();
  });

  describe('happy path', () => {
    it('commits the Saturday scenario across every store', async () => {
      const result = await service.commit(saturday);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const confirmation = result.value;
      expect(confirmation.request).toMatchObject({
        date: '2026-10-24',
        startTime: '09:00',
        endTime: '13:00',
        hours: 4,
        court: 'A',
        dayType: DayType.WEEKEND_OR_HOLIDAY,
      });
      expect(confirmation.fee.ratePerHour).toBe(13000);
      expect(confirmation.fee.total).toBe(52000);
      expect(confirmation.ledgerRowIndex).toBe(2);
      expect(confirmation.calendarEventId).toBe('evt-1');
      expect(confirmation.reservationId).toMatch(/^R20261019100000-[0-9A-F]{6}$/);
      expect(confirmation.trail).toEqual([
        'Received',
        'Validated',
        'ConflictChecked',
        'Priced',
        'CalendarCommitted',
        'LedgerCommitted',
        'Notified',
        'Done',
      ]);
    });

    it('writes the calendar event in the ground timezone', async () => {
      await service.commit(saturday);

      expect(calendar.events).toHaveLength(1);
      const [event] = calendar.events;
      expect(event.summary).toBe('[A] Taro Tanaka');
      expect(event.start).toEqual(new Date('2026-10-24T00:00:00Z'));
      expect(event.end).toEqual(new Date('2026-10-24T04:00:00Z'));
      expect(event.colorTag).toBe('9');
      expect(event.description.split('\n')).toEqual([
        'Name: Taro Tanaka',
        'Phone: 090-0000-0000',
        'Court: Court A',
        'Category: General',
        'Fee: ¥52,000 (¥13,000/h x 4h / Weekend/Holiday)',
        'Payment: Prepaid (invoice)',
        'Notes: ',
      ]);
    });

    it('appends one confirmed ledger row', async () => {
      const result = await service.commit(saturday);

      expect(ledger.rows).toHaveLength(1);
      const [row] = ledger.rows;
      expect(row).toHaveLength(LEDGER_COLUMNS.length);
      expect(row.slice(1)).toEqual([
        '2026-10-19 10:00:00',
        '2026-10-24',
        'Sat',
        '09:00',
        '13:00',
        'A',
        'Taro Tanaka',
        '090-0000-0000',
        'General',
        4,
        13000,
        52000,
        'Weekend/Holiday',
        'confirmed',
        'evt-1',
        '',
      ]);
      expect(result.ok && row[0]).toBe(result.ok && result.value.reservationId);
    });

    it('notifies the operators', async () => {
      const result = await service.commit(saturday);

      expect(sink.sent).toHaveLength(1);
      expect(sink.sent[0]).toMatchObject({
        type: 'reservation_created',
        ledgerRowIndex: 2,
        reservationId: result.ok ? result.value.reservationId : '',
        sentAt: new Date('2026-10-19T01:00:00Z'),
      });
      expect(metricsService.getMetrics().reservations.committed).toBe(1);
    });

    it('does not deduplicate identical submissions', async () => {
      // Calendar index lags, so the second submission passes the check too
      await build({
        calendar: new InMemoryCalendarStore({ eventuallyConsistent: true }),
      });

      const first = await service.commit(saturday);
      const second = await service.commit(saturday);

      expect(first.ok && second.ok).toBe(true);
      expect(ledger.rows).toHaveLength(2);
      expect(calendar.events.map((e) => e.id)).toEqual(['evt-1', 'evt-2']);
      expect(first.ok && second.ok && first.value.reservationId).not.toBe(
        second.ok && second.value.reservationId,
      );
    });

    it('writes the ledger header on startup', async () => {
      await service.onModuleInit();

      expect(ledger.header).toEqual([...LEDGER_COLUMNS]);
    });
  });

  describe('rejections', () => {
    it('rejects incomplete requests before touching any store', async () => {
      const result = await service.commit({ startTime: '09:00' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(MissingFieldError);
      expect(calendar.events).toHaveLength(0);
      expect(ledger.rows).toHaveLength(0);
      expect(sink.sent).toHaveLength(0);
      expect(metricsService.getMetrics().reservations.rejected.validation).toBe(
        1,
      );
    });

    it('rejects a taken slot and tells the operators', async () => {
      calendar.seed({
        summary: '[A] Hanako Sato',
        start: new Date('2026-10-24T01:00:00Z'),
        end: new Date('2026-10-24T03:00:00Z'),
      });

      const result = await service.commit(saturday);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConflictRejection);
      expect(result.error.kind === 'conflict' && result.error.reason).toBe(
        'slot_taken',
      );
      expect(calendar.events).toHaveLength(1);
      expect(ledger.rows).toHaveLength(0);
      expect(sink.sent.map((m) => m.type)).toEqual(['conflict']);
    });

    it('books another court at the same time', async () => {
      calendar.seed({
        summary: '[B] Hanako Sato',
        start: new Date('2026-10-24T01:00:00Z'),
        end: new Date('2026-10-24T03:00:00Z'),
      });

      const result = await service.commit({ ...saturday, court: 'A' });

      expect(result.ok).toBe(true);
    });

    it('rejects as court_locked when the lock cannot be had in time', async () => {
      await build({ policy: testPolicy({ lockTimeoutMs: 20 }) });
      const held = await lockManagerService.acquire('A|2026-10-24');

      const result = await service.commit(saturday);
      held.release();

      expect(!result.ok && result.error.kind === 'conflict' && result.error.reason).toBe(
        'court_locked',
      );
      expect(calendar.events).toHaveLength(0);
      expect(metricsService.getMetrics().locks.timeouts).toBe(1);
    });
  });

  describe('store failures', () => {
    it('fails without a ledger row when the calendar write fails', async () => {
      jest
        .spyOn(calendar, 'createEvent')
        .mockRejectedValueOnce(new Error('quota exceeded'));

      const result = await service.commit(saturday);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ExternalStoreError);
      expect(result.error.kind === 'external_store' && result.error.store).toBe(
        'calendar',
      );
      expect(ledger.rows).toHaveLength(0);
      expect(sink.sent).toHaveLength(0);

      // Lock was released on the way out
      const lock = await lockManagerService.acquire('A|2026-10-24', 20);
      lock.release();
    });

    it('removes the calendar event when the ledger write fails', async () => {
      jest
        .spyOn(ledger, 'appendRow')
        .mockRejectedValueOnce(new Error('sheet unavailable'));

      const result = await service.commit(saturday);

      expect(result.ok).toBe(false);
      if (result.ok || result.error.kind !== 'external_store') {
        throw new Error('expected a store failure');
      }
      expect(result.error.store).toBe('ledger');
      expect(result.error.operation).toBe('appendRow');
      expect(result.error.compensation).toBe('completed');
      expect(calendar.events).toHaveLength(0);
      expect(metricsService.getMetrics().stores.compensations).toEqual({
        completed: 1,
        failed: 0,
      });
    });

    it('reports a compensation that could not be completed', async () => {
      jest
        .spyOn(ledger, 'appendRow')
        .mockRejectedValueOnce(new Error('sheet unavailable'));
      jest
        .spyOn(calendar, 'deleteEvent')
        .mockRejectedValueOnce(new Error('calendar unavailable'));

      const result = await service.commit(saturday);

      expect(!result.ok && result.error.kind === 'external_store' && result.error.compensation).toBe(
        'failed',
      );
      expect(calendar.events).toHaveLength(1);
      expect(metricsService.getMetrics().stores.compensations.failed).toBe(1);
    });

    it('treats a hung ledger as a failed ledger', async () => {
      jest
        .spyOn(ledger, 'appendRow')
        .mockReturnValueOnce(new Promise(() => undefined));

      const result = await service.commit(saturday);

      expect(!result.ok && result.error.kind === 'external_store' && result.error.store).toBe(
        'ledger',
      );
      expect(calendar.events).toHaveLength(0);
    });

    it('still confirms when the notification fails', async () => {
      jest.spyOn(sink, 'send').mockRejectedValueOnce(new Error('webhook 500'));

      const result = await service.commit(saturday);

      expect(result.ok).toBe(true);
      expect(ledger.rows).toHaveLength(1);
      expect(metricsService.getMetrics().stores.failures.notification).toBe(1);
    });
  });

  describe('concurrent submissions for one slot', () => {
    it('lets both through without serialization against a lagging calendar', async () => {
      await build({
        policy: testPolicy({ serializeCommits: false }),
        calendar: new InMemoryCalendarStore({ eventuallyConsistent: true }),
      });

      const [first, second] = await Promise.all([
        service.commit(saturday),
        service.commit(saturday),
      ]);

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(true);
      expect(calendar.events).toHaveLength(2);
      expect(ledger.rows).toHaveLength(2);
    });

    it('turns the race into a conflict when commits are serialized', async () => {
      const [first, second] = await Promise.all([
        service.commit(saturday),
        service.commit(saturday),
      ]);

      expect(first.ok).toBe(true);
      expect(!second.ok && second.error.kind === 'conflict' && second.error.reason).toBe(
        'slot_taken',
      );
      expect(calendar.events).toHaveLength(1);
      expect(ledger.rows).toHaveLength(1);
    });
  });
});
