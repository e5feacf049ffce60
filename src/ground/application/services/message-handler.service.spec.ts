import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { MessageHandlerService } from './message-handler.service';
import { LedgerQueryService } from './ledger-query.service';
import { ReservationCommitterService } from './reservation-committer.service';
import { CLOCK, EXTRACTOR, GROUND_POLICY, NOTIFICATION_SINK } from '../../tokens';
import {
  ConflictRejection,
  ExternalStoreError,
  ExtractionError,
  MissingFieldError,
} from '../../domain/errors/reservation.errors';
import { DayType } from '../../domain/types/day-type.enum';
import { ReservationRequest } from '../../domain/types/reservation-request.type';
import { err, ok } from '../../domain/types/result.type';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';
import { ScriptedExtractor } from '../../../../test/ground/fakes/scripted.extractor';
import { RecordingNotificationSink } from '../../../../test/ground/fakes/recording-notification.sink';
import { FixedClock } from '../../../../test/ground/fakes/fixed-clock';
import { testPolicy } from '../../../../test/ground/support/test-policy';
import { testConfigService } from '../../../../test/ground/support/test-config';

describe('MessageHandlerService', () => {
  let service: MessageHandlerService;
  let extractor: ScriptedExtractor;
  let sink: RecordingNotificationSink;
  let committer: jest.Mocked<Pick<ReservationCommitterService, 'commit'>>;
  let ledgerQuery: jest.Mocked<
    Pick<LedgerQueryService, 'listToday' | 'monthlySummary' | 'today'>
  >;

  const request: ReservationRequest = {
    date: '2026-10-24',
    startTime: '09:00',
    endTime: '13:00',
    hours: 4,
    court: 'A',
    category: 'general',
    dayType: DayType.WEEKEND_OR_HOLIDAY,
    name: 'Taro Tanaka',
    phone: '',
    notes: '',
  };

  beforeEach(async () => {
    extractor = new ScriptedExtractor();
    sink = new RecordingNotificationSink();
    committer = { commit: jest.fn() };
    ledgerQuery = {
      listToday: jest.fn(),
      monthlySummary: jest.fn(),
      today: jest.fn().mockReturnValue('2026-10-19'),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MessageHandlerService,
        LoggerService,
        MetricsService,
        { provide: EXTRACTOR, useValue: extractor },
        { provide: NOTIFICATION_SINK, useValue: sink },
        { provide: GROUND_POLICY, useValue: testPolicy() },
        {
          provide: CLOCK,
          useValue: new FixedClock(new Date('2026-10-19T01:00:00Z')),
        },
        { provide: ReservationCommitterService, useValue: committer },
        { provide: LedgerQueryService, useValue: ledgerQuery },
        { provide: ConfigService, useValue: testConfigService(200) },
      ],
    }).compile();

    service = module.get<MessageHandlerService>(MessageHandlerService);
  });

  describe('commands', () => {
    it('lists today on /list', async () => {
      ledgerQuery.listToday.mockResolvedValue(ok([]));

      await expect(service.handleText(' /LIST ')).resolves.toEqual({
        kind: 'listing',
        text: 'No reservations today (2026-10-19).',
      });
      expect(extractor.inputs).toHaveLength(0);
    });

    it('answers a failed listing with the system error text', async () => {
      ledgerQuery.listToday.mockResolvedValue(
        err(new ExternalStoreError('ledger', 'readRows', new Error('down'))),
      );

      const reply = await service.handleText('/list');

      expect(reply.kind).toBe('failed');
    });

    it('summarizes a month on /summary', async () => {
      ledgerQuery.monthlySummary.mockResolvedValue(
        ok({ year: 2026, month: 9, count: 3, cancelledCount: 1, totalFee: 76000 }),
      );

      const reply = await service.handleText('/summary 2026-09');

      expect(ledgerQuery.monthlySummary).toHaveBeenCalledWith(2026, 9);
      expect(reply).toEqual({
        kind: 'summary',
        text: [
          'Summary for 2026-09',
          'Reservations: 3',
          'Cancelled: 1',
          'Total fees: ¥76,000',
        ].join('\n'),
      });
    });

    it('explains /summary usage on a bad month', async () => {
      await expect(service.handleText('/summary 2026-13')).resolves.toEqual({
        kind: 'help',
        text: 'Usage: /summary YYYY-MM',
      });
      await expect(service.handleText('/summary')).resolves.toEqual({
        kind: 'help',
        text: 'Usage: /summary YYYY-MM',
      });
    });

    it('forwards /cancel to the operators', async () => {
      const reply = await service.handleText('/cancel 2026-10-24 Taro Tanaka');

      expect(reply.kind).toBe('cancel_forwarded');
      expect(sink.sent).toEqual([
        {
          type: 'cancel_request',
          text: '/cancel 2026-10-24 Taro Tanaka',
          sentAt: new Date('2026-10-19T01:00:00Z'),
        },
      ]);
    });

    it('admits a failed cancel forward', async () => {
      jest.spyOn(sink, 'send').mockRejectedValueOnce(new Error('webhook 500'));

      const reply = await service.handleText('/cancel tomorrow');

      expect(reply).toEqual({
        kind: 'failed',
        text: 'A system error occurred. Sorry for the trouble; please contact us directly.',
      });
    });

    it.each(['/help', 'help', 'HELP'])('answers %p with help text', async (text) => {
      const reply = await service.handleText(text);

      expect(reply.kind).toBe('help');
      expect(reply.text.split('\n')[0]).toBe('Test Ground reservations');
    });
  });

  describe('free text', () => {
    it('commits an extracted reservation', async () => {
      extractor.enqueue(
        ok({
          isReservation: true,
          confidence: 0.9,
          candidate: { date: '2026-10-24', startTime: '09:00', name: 'Taro Tanaka' },
        }),
      );
      committer.commit.mockResolvedValue(
        ok({
          request,
          fee: {
            category: 'general',
            categoryLabel: 'General',
            dayType: DayType.WEEKEND_OR_HOLIDAY,
            ratePerHour: 13000,
            hours: 4,
            total: 52000,
            paymentMethod: 'Prepaid (invoice)',
          },
          reservationId: 'R20261019100000-ABC123',
          ledgerRowIndex: 2,
          calendarEventId: 'evt-1',
          trail: [],
        }),
      );

      const reply = await service.handleText('Saturday 9am, Taro Tanaka');

      expect(extractor.inputs).toEqual([
        { kind: 'text', text: 'Saturday 9am, Taro Tanaka' },
      ]);
      expect(committer.commit).toHaveBeenCalledWith({
        date: '2026-10-24',
        startTime: '09:00',
        name: 'Taro Tanaka',
      });
      expect(reply.kind).toBe('confirmed');
      expect(reply.text).toContain('Reservation ID: R20261019100000-ABC123');
    });

    it('answers chit-chat with help text', async () => {
      const reply = await service.handleText('Is the ground muddy today?');

      expect(reply.kind).toBe('help');
      expect(committer.commit).not.toHaveBeenCalled();
    });

    it('treats an extraction failure as not a reservation', async () => {
      extractor.enqueue(err(new ExtractionError('model unavailable')));

      const reply = await service.handleText('Saturday 9am please');

      expect(reply.kind).toBe('help');
      expect(committer.commit).not.toHaveBeenCalled();
    });

    it('gives up on an extractor that never answers', async () => {
      jest
        .spyOn(extractor, 'extract')
        .mockReturnValue(new Promise(() => undefined));

      const reply = await service.handleText('book court A tomorrow 9am');

      expect(reply.kind).toBe('help');
      expect(committer.commit).not.toHaveBeenCalled();
    });

    it('replies with the missing fields', async () => {
      extractor.enqueue(
        ok({ isReservation: true, confidence: 0.6, candidate: { startTime: '09:00' } }),
      );
      committer.commit.mockResolvedValue(
        err(new MissingFieldError(['date', 'name'])),
      );

      const reply = await service.handleText('9am please');

      expect(reply).toEqual({
        kind: 'rejected',
        text: [
          'The following information is missing. Please send it again:',
          '- Date of use',
          '- Name',
        ].join('\n'),
      });
    });

    it('replies with the conflict', async () => {
      extractor.enqueue(ok({ isReservation: true, confidence: 0.9, candidate: {} }));
      committer.commit.mockResolvedValue(
        err(new ConflictRejection(request, 'slot_taken')),
      );

      const reply = await service.handleText('Saturday 9am');

      expect(reply.kind).toBe('rejected');
      expect(reply.text).toBe(
        [
          'Sorry, that slot is already booked:',
          '2026-10-24 09:00-13:00 (A)',
          'Please choose another date or time.',
        ].join('\n'),
      );
    });
  });

  describe('images', () => {
    it('passes the image to the extractor', async () => {
      const data = Buffer.from('fake image bytes');

      const reply = await service.handleImage(data, 'image/png');

      expect(extractor.inputs).toEqual([
        { kind: 'image', data, mimeType: 'image/png' },
      ]);
      expect(reply).toEqual({
        kind: 'unreadable',
        text: 'We could not read reservation details from the image. Please send them as text.',
      });
    });
  });

  describe('replyForCommit', () => {
    it('maps store failures to the system error text', () => {
      const reply = service.replyForCommit(
        err(new ExternalStoreError('calendar', 'createEvent', new Error('x'))),
      );

      expect(reply.kind).toBe('failed');
    });
  });
});
