import { z } from 'zod';
import { ExtractionError } from '../../domain/errors/reservation.errors';
import { ExtractionOutcome } from '../../domain/types/extraction.type';
import { ReservationCandidate } from '../../domain/types/reservation-candidate.type';
import { Result, err, ok } from '../../domain/types/result.type';

// Models answer "not found" with null; the candidate wants the key absent.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

export const ExtractionResponseSchema = z.object({
  isReservation: z.boolean(),
  confidence: z.number().min(0).max(1).catch(0),
  date: optional(z.string()),
  startTime: optional(z.string()),
  endTime: optional(z.string()),
  hours: optional(z.number()),
  court: optional(z.string()),
  category: optional(z.string()),
  isWeekend: optional(z.boolean()),
  isHoliday: optional(z.boolean()),
  name: optional(z.string()),
  phone: optional(z.string()),
  email: optional(z.string()),
  teamName: optional(z.string()),
  partySize: optional(z.number().int()),
  notes: optional(z.string()),
});

export function parseExtractionResponse(
  raw: string,
): Result<ExtractionOutcome, ExtractionError> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return err(new ExtractionError('Extractor returned malformed JSON', error));
  }

  const parsed = ExtractionResponseSchema.safeParse(json);
  if (!parsed.success) {
    return err(
      new ExtractionError(
        `Extractor output failed validation: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')} ${issue.message}`)
          .join('; ')}`,
        parsed.error,
      ),
    );
  }

  const { isReservation, confidence, ...fields } = parsed.data;
  if (!isReservation) {
    return ok({ isReservation: false, confidence });
  }

  const candidate: ReservationCandidate = { ...fields, confidence };
  return ok({ isReservation: true, candidate, confidence });
}
