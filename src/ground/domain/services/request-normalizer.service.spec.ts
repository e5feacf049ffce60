import { Test, TestingModule } from '@nestjs/testing';
import { RequestNormalizerService } from './request-normalizer.service';
import { PricingPolicyService } from './pricing-policy.service';
import { GROUND_POLICY } from '../../tokens';
import { DayType } from '../types/day-type.enum';
import { ReservationCandidate } from '../types/reservation-candidate.type';
import {
  InvalidFieldError,
  MissingFieldError,
} from '../errors/reservation.errors';
import { LoggerService } from '../../infrastructure/logging/logger.service';
import { testPolicy } from '../../../../test/ground/support/test-policy';

describe('RequestNormalizerService', () => {
  let service: RequestNormalizerService;

  // 2026-10-19 is a Monday, 2026-10-24 a Saturday
  const weekday: ReservationCandidate = {
    date: '2026-10-19',
    startTime: '09:00',
    name: 'Taro Tanaka',
    phone: '090-0000-0000',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RequestNormalizerService,
        PricingPolicyService,
        LoggerService,
        { provide: GROUND_POLICY, useValue: testPolicy() },
      ],
    }).compile();

    service = module.get<RequestNormalizerService>(RequestNormalizerService);
  });

  describe('hour rounding', () => {
    it.each([
      [3, 4],
      [1, 2],
      [4, 4],
      [2.5, 4],
    ])('rounds %p hours up to %p', (requested, expected) => {
      expect(service.roundUpToUnit(requested)).toBe(expected);
    });
  });

  it('normalizes a complete weekday request', () => {
    const result = service.normalize({ ...weekday, hours: 3 });

    expect(result).toEqual({
      ok: true,
      value: {
        date: '2026-10-19',
        startTime: '09:00',
        endTime: '13:00',
        hours: 4,
        court: 'A',
        category: 'general',
        dayType: DayType.WEEKDAY,
        name: 'Taro Tanaka',
        phone: '090-0000-0000',
        notes: '',
      },
    });
  });

  it('returns a frozen request', () => {
    const result = service.normalize(weekday);

    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
  });

  it('applies the minimum when no duration is given', () => {
    const result = service.normalize(weekday);

    expect(result.ok && result.value.hours).toBe(2);
    expect(result.ok && result.value.endTime).toBe('11:00');
  });

  it('derives hours from an end time and recomputes the end', () => {
    const result = service.normalize({ ...weekday, endTime: '12:00' });

    expect(result.ok && result.value.hours).toBe(4);
    expect(result.ok && result.value.endTime).toBe('13:00');
  });

  it('accepts single-digit hours in times', () => {
    const result = service.normalize({ ...weekday, startTime: '9:00' });

    expect(result.ok && result.value.startTime).toBe('09:00');
  });

  it('classifies a Saturday as weekend', () => {
    const result = service.normalize({ ...weekday, date: '2026-10-24' });

    expect(result.ok && result.value.dayType).toBe(DayType.WEEKEND_OR_HOLIDAY);
  });

  it('trusts explicit holiday and weekend flags', () => {
    const holiday = service.normalize({ ...weekday, isHoliday: true });
    const notWeekend = service.normalize({
      ...weekday,
      date: '2026-10-24',
      isWeekend: false,
    });

    expect(holiday.ok && holiday.value.dayType).toBe(
      DayType.WEEKEND_OR_HOLIDAY,
    );
    expect(notWeekend.ok && notWeekend.value.dayType).toBe(DayType.WEEKDAY);
  });

  it('reports every missing field at once', () => {
    const result = service.normalize({ startTime: '09:00' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MissingFieldError);
      expect(result.error.kind).toBe('validation');
      expect(result.error.missingFields).toEqual(['date', 'name']);
    }
  });

  it('treats blank fields as missing', () => {
    const result = service.normalize({ date: ' ', startTime: '', name: '  ' });

    expect(!result.ok && result.error.missingFields).toEqual([
      'date',
      'startTime',
      'name',
    ]);
  });

  it('rejects a malformed date and time', () => {
    const result = service.normalize({
      ...weekday,
      date: '2026-02-30',
      startTime: '25:00',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidFieldError);
      expect(result.error.invalidFields).toEqual([
        { field: 'date', reason: 'invalid_date' },
        { field: 'startTime', reason: 'invalid_time' },
      ]);
    }
  });

  it('rejects a window past closing time', () => {
    const result = service.normalize({ ...weekday, startTime: '20:00' });

    expect(!result.ok && result.error.invalidFields).toEqual([
      { field: 'startTime', reason: 'outside_business_hours' },
    ]);
  });

  it('resolves courts by id or label and rejects unknown ones', () => {
    const byLabel = service.normalize({ ...weekday, court: 'Court B' });
    const unknown = service.normalize({ ...weekday, court: 'C' });

    expect(byLabel.ok && byLabel.value.court).toBe('B');
    expect(!unknown.ok && unknown.error.invalidFields).toEqual([
      { field: 'court', reason: 'unknown_court' },
    ]);
  });

  it('falls back to the default category', () => {
    const result = service.normalize({ ...weekday, category: 'corporate' });

    expect(result.ok && result.value.category).toBe('general');
  });

  it('folds extra contact details into the notes', () => {
    const result = service.normalize({
      ...weekday,
      notes: 'Bring nets',
      teamName: 'Riverside FC',
      partySize: 14,
      email: 'team@example.com',
    });

    expect(result.ok && result.value.notes).toBe(
      'Bring nets / Team: Riverside FC / Party size: 14 / Email: team@example.com',
    );
  });
});
