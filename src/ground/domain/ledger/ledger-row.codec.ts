import { BookingRecord } from '../types/booking-record.type';
import { BookingStatus } from '../types/booking-status.enum';
import { DayType } from '../types/day-type.enum';

export type LedgerCell = string | number;

/**
 * Column order is a compatibility contract for every ledger reader; append
 * new columns at the end only.
 */
export const LEDGER_COLUMNS = [
  'Reservation ID',
  'Received At',
  'Date',
  'Day',
  'Start',
  'End',
  'Court',
  'Name',
  'Phone',
  'Category',
  'Hours',
  'Rate (JPY/h)',
  'Fee (JPY)',
  'Day Type',
  'Status',
  'Calendar Event ID',
  'Notes',
] as const;

export const DAY_TYPE_LABELS: Record<DayType, string> = {
  [DayType.WEEKDAY]: 'Weekday',
  [DayType.WEEKEND_OR_HOLIDAY]: 'Weekend/Holiday',
};

export function encodeLedgerRow(record: BookingRecord): LedgerCell[] {
  return [
    record.reservationId,
    record.receivedAt,
    record.date,
    record.dayOfWeek,
    record.startTime,
    record.endTime,
    record.court,
    record.name,
    record.phone,
    record.categoryLabel,
    record.hours ?? '',
    record.ratePerHour ?? '',
    record.totalFee ?? '',
    record.dayTypeLabel,
    record.status,
    record.calendarEventId,
    record.notes,
  ];
}

/** Short rows (trailing empty cells trimmed by the store) are padded. */
export function decodeLedgerRow(cells: readonly string[]): BookingRecord {
  const cell = (index: number): string => cells[index]?.trim() ?? '';

  return {
    reservationId: cell(0),
    receivedAt: cell(1),
    date: cell(2),
    dayOfWeek: cell(3),
    startTime: cell(4),
    endTime: cell(5),
    court: cell(6),
    name: cell(7),
    phone: cell(8),
    categoryLabel: cell(9),
    hours: parseLedgerNumber(cell(10)),
    ratePerHour: parseLedgerNumber(cell(11)),
    totalFee: parseLedgerNumber(cell(12)),
    dayTypeLabel: cell(13),
    status:
      cell(14).toLowerCase() === BookingStatus.CANCELLED
        ? BookingStatus.CANCELLED
        : BookingStatus.CONFIRMED,
    calendarEventId: cell(15),
    notes: cell(16),
  };
}

/** Accepts `24000` and the formatted `24,000`; anything else is null. */
export function parseLedgerNumber(value: string): number | null {
  if (!/^-?(\d+|\d{1,3}(,\d{3})+)$/.test(value)) {
    return null;
  }
  return Number(value.replace(/,/g, ''));
}
