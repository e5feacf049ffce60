import { FeeBreakdown } from './fee-breakdown.type';
import { ReservationRequest } from './reservation-request.type';

export type CommitStateName =
  | 'Received'
  | 'Validated'
  | 'ConflictChecked'
  | 'Priced'
  | 'CalendarCommitted'
  | 'LedgerCommitted'
  | 'Notified'
  | 'Done'
  | 'Rejected'
  | 'Failed';

/** Everything a caller needs to render a receipt. */
export interface Confirmation {
  request: ReservationRequest;
  fee: FeeBreakdown;
  reservationId: string;
  ledgerRowIndex: number;
  calendarEventId: string;
  trail: CommitStateName[];
}
