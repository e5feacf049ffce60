import { BookingStatus } from './booking-status.enum';

/**
 * One ledger line. Numeric columns read back from the ledger are `null` when
 * the stored cell is not a number.
 */
export interface BookingRecord {
  reservationId: string;
  receivedAt: string;
  date: string;
  dayOfWeek: string;
  startTime: string;
  endTime: string;
  court: string;
  name: string;
  phone: string;
  categoryLabel: string;
  hours: number | null;
  ratePerHour: number | null;
  totalFee: number | null;
  dayTypeLabel: string;
  status: BookingStatus;
  calendarEventId: string;
  notes: string;
}
