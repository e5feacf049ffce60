import {
  confirmationText,
  conflictText,
  formatYen,
  helpText,
  todayListText,
  validationText,
} from './reply-text';
import {
  ConflictRejection,
  InvalidFieldError,
  MissingFieldError,
} from '../../domain/errors/reservation.errors';
import { BookingRecord } from '../../domain/types/booking-record.type';
import { BookingStatus } from '../../domain/types/booking-status.enum';
import { DayType } from '../../domain/types/day-type.enum';
import { ReservationRequest } from '../../domain/types/reservation-request.type';
import { testPolicy } from '../../../../test/ground/support/test-policy';

describe('reply texts', () => {
  const policy = testPolicy();

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

  it('formats yen with thousands separators', () => {
    expect(formatYen(52000)).toBe('¥52,000');
    expect(formatYen(0)).toBe('¥0');
  });

  it('renders a confirmation', () => {
    const text = confirmationText(
      {
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
      },
      policy,
    );

    expect(text.split('\n')).toEqual([
      'Your reservation is confirmed!',
      '',
      'Date: 2026-10-24 (Sat) 09:00-13:00',
      'Court: Court A',
      'Name: Taro Tanaka',
      'Phone: not provided',
      'Category: General',
      'Hours: 4h',
      'Fee: ¥52,000 (Prepaid (invoice))',
      'Reservation ID: R20261019100000-ABC123',
      '',
      'An invoice will follow. Thank you for booking with us!',
    ]);
  });

  it('lists missing and invalid fields together', () => {
    const text = validationText(
      new MissingFieldError(['name'], [{ field: 'court', reason: 'unknown_court' }]),
    );

    expect(text.split('\n')).toEqual([
      'The following information is missing. Please send it again:',
      '- Name',
      '',
      'Please check the following:',
      '- Court: not one of our courts',
    ]);
  });

  it('lists invalid fields alone', () => {
    const text = validationText(
      new InvalidFieldError([
        { field: 'startTime', reason: 'outside_business_hours' },
      ]),
    );

    expect(text).toBe(
      'Please check the following:\n- Start time: outside opening hours',
    );
  });

  it('distinguishes a busy court from a taken slot', () => {
    expect(conflictText(new ConflictRejection(request, 'court_locked'))).toBe(
      'Another reservation for 2026-10-24 is being processed right now. Please try again in a moment.',
    );
  });

  it('lists today in the order given', () => {
    const record = (startTime: string, endTime: string, name: string): BookingRecord => ({
      reservationId: 'R1',
      receivedAt: '',
      date: '2026-10-19',
      dayOfWeek: 'Mon',
      startTime,
      endTime,
      court: 'B',
      name,
      phone: '',
      categoryLabel: 'General',
      hours: 2,
      ratePerHour: 12000,
      totalFee: 24000,
      dayTypeLabel: 'Weekday',
      status: BookingStatus.CONFIRMED,
      calendarEventId: '',
      notes: '',
    });

    expect(
      todayListText('2026-10-19', [
        record('09:00', '11:00', 'Early'),
        record('13:00', '15:00', 'Late'),
      ]),
    ).toBe(
      'Reservations today (2026-10-19)\n\n- 09:00-11:00 Early [B]\n- 13:00-15:00 Late [B]',
    );
  });

  it('describes the booking format and the courts in the help text', () => {
    const lines = helpText(policy).split('\n');

    expect(lines).toContain('- Time (2-hour units)');
    expect(lines).toContain('- Court (Court A or Court B)');
    expect(lines).toContain(
      '- Category (Elementary school / Middle/High school / General)',
    );
  });
});
