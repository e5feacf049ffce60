import { ReservationRequest } from '../types/reservation-request.type';

export type RequiredField = 'date' | 'startTime' | 'name';

export type InvalidFieldReason =
  | 'invalid_date'
  | 'invalid_time'
  | 'invalid_hours'
  | 'unknown_court'
  | 'outside_business_hours';

export interface InvalidField {
  field: string;
  reason: InvalidFieldReason;
}

export class ValidationError extends Error {
  readonly kind = 'validation' as const;

  constructor(
    readonly missingFields: RequiredField[],
    readonly invalidFields: InvalidField[],
  ) {
    super(
      [
        missingFields.length > 0
          ? `missing: ${missingFields.join(', ')}`
          : undefined,
        invalidFields.length > 0
          ? `invalid: ${invalidFields.map((f) => `${f.field} (${f.reason})`).join(', ')}`
          : undefined,
      ]
        .filter((part) => part !== undefined)
        .join('; '),
    );
    this.name = 'ValidationError';
  }
}

/** Raised when required fields are absent; lists all of them at once. */
export class MissingFieldError extends ValidationError {
  constructor(missingFields: RequiredField[], invalidFields: InvalidField[] = []) {
    super(missingFields, invalidFields);
    this.name = 'MissingFieldError';
  }
}

export class InvalidFieldError extends ValidationError {
  constructor(invalidFields: InvalidField[]) {
    super([], invalidFields);
    this.name = 'InvalidFieldError';
  }
}

export type ConflictReason = 'slot_taken' | 'court_locked';

export class ConflictRejection extends Error {
  readonly kind = 'conflict' as const;

  constructor(
    readonly request: ReservationRequest,
    readonly reason: ConflictReason,
  ) {
    super(
      `${request.court} ${request.date} ${request.startTime}-${request.endTime}: ${reason}`,
    );
    this.name = 'ConflictRejection';
  }
}

export type ExternalStore = 'calendar' | 'ledger' | 'notification';

export type CompensationOutcome = 'not_needed' | 'completed' | 'failed';

export class ExternalStoreError extends Error {
  readonly kind = 'external_store' as const;

  constructor(
    readonly store: ExternalStore,
    readonly operation: string,
    readonly cause: unknown,
    readonly compensation: CompensationOutcome = 'not_needed',
  ) {
    super(`${store}.${operation} failed: ${describeCause(cause)}`);
    this.name = 'ExternalStoreError';
  }
}

export class ExtractionError extends Error {
  readonly kind = 'extraction' as const;

  constructor(
    detail: string,
    readonly cause?: unknown,
  ) {
    super(detail);
    this.name = 'ExtractionError';
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export type CommitFailure =
  | ValidationError
  | ConflictRejection
  | ExternalStoreError;

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
