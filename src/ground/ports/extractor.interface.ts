import { ExtractionError } from '../domain/errors/reservation.errors';
import {
  ExtractionInput,
  ExtractionOutcome,
} from '../domain/types/extraction.type';
import { Result } from '../domain/types/result.type';

export interface Extractor {
  extract(
    input: ExtractionInput,
  ): Promise<Result<ExtractionOutcome, ExtractionError>>;
}
