import { BookingRecord } from './booking-record.type';
import { FeeBreakdown } from './fee-breakdown.type';
import { ReservationRequest } from './reservation-request.type';

export type NotificationMessage =
  | {
      type: 'reservation_created';
      request: ReservationRequest;
      fee: FeeBreakdown;
      reservationId: string;
      ledgerRowIndex: number;
      sentAt: Date;
    }
  | {
      type: 'conflict';
      request: ReservationRequest;
    }
  | {
      type: 'cancel_request';
      text: string;
      sentAt: Date;
    }
  | {
      type: 'daily_summary';
      date: string;
      records: BookingRecord[];
      totalFee: number;
    };
