import { z } from 'zod';

/**
 * Structured reservation fields posted by a gateway that did its own
 * extraction. Everything is optional; the normalizer decides what is missing.
 */
export const ReservationCandidateSchema = z.object({
  date: z.string().optional(),
  startTime: z.string().optional(),
  endTime: z.string().optional(),
  hours: z.number().nonnegative().optional(),
  court: z.string().optional(),
  category: z.string().optional(),
  isWeekend: z.boolean().optional(),
  isHoliday: z.boolean().optional(),
  name: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  teamName: z.string().optional(),
  partySize: z.number().int().positive().optional(),
  notes: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export type ReservationCandidateRequest = z.infer<
  typeof ReservationCandidateSchema
>;

export interface ConfirmationResponse {
  reservationId: string;
  ledgerRowIndex: number;
  calendarEventId: string;
  date: string;
  startTime: string;
  endTime: string;
  hours: number;
  court: string;
  name: string;
  category: string;
  dayType: string;
  ratePerHour: number;
  total: number;
  paymentMethod: string;
  trail: string[];
  reply: string;
}
