import { ReservationCandidate } from './reservation-candidate.type';

export type ExtractionInput =
  | { kind: 'text'; text: string }
  | { kind: 'image'; data: Buffer; mimeType: string };

export type ExtractionOutcome =
  | { isReservation: false; confidence: number }
  | {
      isReservation: true;
      candidate: ReservationCandidate;
      confidence: number;
    };
