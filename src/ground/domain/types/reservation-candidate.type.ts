/**
 * Untrusted reservation fields as produced by an extractor or posted by a
 * gateway. Nothing here is checked until it passes the normalizer.
 */
export interface ReservationCandidate {
  date?: string;
  startTime?: string;
  endTime?: string;
  hours?: number;
  court?: string;
  category?: string;
  isWeekend?: boolean;
  isHoliday?: boolean;
  name?: string;
  phone?: string;
  email?: string;
  teamName?: string;
  partySize?: number;
  notes?: string;
  confidence?: number;
}
