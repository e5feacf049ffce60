import { Inject, Injectable } from '@nestjs/common';
import { getDay } from 'date-fns';
import { GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../policy/ground-policy';
import {
  InvalidField,
  InvalidFieldError,
  MissingFieldError,
  RequiredField,
  ValidationError,
} from '../errors/reservation.errors';
import { DayType } from '../types/day-type.enum';
import { ReservationCandidate } from '../types/reservation-candidate.type';
import { ReservationRequest } from '../types/reservation-request.type';
import { Result, err, ok } from '../types/result.type';
import {
  formatClockTime,
  parseCalendarDate,
  parseClockTime,
} from '../utils/clock-time.util';
import { isWithinBusinessHours } from '../utils/business-hours.util';
import { PricingPolicyService } from './pricing-policy.service';
import { LoggerService } from '../../infrastructure/logging/logger.service';

@Injectable()
export class RequestNormalizerService {
  constructor(
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    private readonly pricingPolicyService: PricingPolicyService,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Turns an untrusted candidate into a request every downstream step can
   * rely on. Never throws: every problem with the input is collected into
   * the returned error so the caller can ask for all of it in one reply.
   */
  normalize(
    candidate: ReservationCandidate,
  ): Result<ReservationRequest, ValidationError> {
    const date = candidate.date?.trim() ?? '';
    const startTime = candidate.startTime?.trim() ?? '';
    const name = candidate.name?.trim() ?? '';

    const missing: RequiredField[] = [];
    if (!date) missing.push('date');
    if (!startTime) missing.push('startTime');
    if (!name) missing.push('name');

    const invalid: InvalidField[] = [];

    const parsedDate = date ? parseCalendarDate(date) : null;
    if (date && !parsedDate) {
      invalid.push({ field: 'date', reason: 'invalid_date' });
    }

    const startMinutes = startTime ? parseClockTime(startTime) : null;
    if (startTime && startMinutes === null) {
      invalid.push({ field: 'startTime', reason: 'invalid_time' });
    }

    const requestedHours = this.requestedHours(candidate, startMinutes, invalid);
    const hours = this.roundUpToUnit(requestedHours);

    const court = this.resolveCourt(candidate.court, invalid);
    const category = this.resolveCategory(candidate.category);

    if (missing.length > 0) {
      return err(new MissingFieldError(missing, invalid));
    }

    let endTime = '';
    if (startMinutes !== null) {
      const endMinutes = startMinutes + hours * 60;
      if (
        !isWithinBusinessHours(
          startMinutes,
          endMinutes,
          this.policy.businessHours,
        )
      ) {
        invalid.push({ field: 'startTime', reason: 'outside_business_hours' });
      } else {
        endTime = formatClockTime(endMinutes);
      }
    }

    if (invalid.length > 0 || !parsedDate || startMinutes === null || !court) {
      return err(new InvalidFieldError(invalid));
    }

    const suppliedEnd = candidate.endTime?.trim();
    if (suppliedEnd && parseClockTime(suppliedEnd) !== parseClockTime(endTime)) {
      this.logger.debug('Supplied end time replaced by start + hours', {
        suppliedEnd,
        endTime,
        hours,
      });
    }

    return ok(
      Object.freeze({
        date,
        startTime: formatClockTime(startMinutes),
        endTime,
        hours,
        court,
        category,
        dayType: this.resolveDayType(candidate, parsedDate),
        name,
        phone: candidate.phone?.trim() ?? '',
        notes: this.composeNotes(candidate),
      }),
    );
  }

  /**
   * Hours as asked for, before rounding. Without an explicit duration an end
   * time after the start implies one; otherwise the minimum applies.
   */
  private requestedHours(
    candidate: ReservationCandidate,
    startMinutes: number | null,
    invalid: InvalidField[],
  ): number {
    if (candidate.hours !== undefined) {
      if (!Number.isFinite(candidate.hours)) {
        invalid.push({ field: 'hours', reason: 'invalid_hours' });
        return this.policy.pricing.minBookingHours;
      }
      return candidate.hours;
    }

    const endTime = candidate.endTime?.trim();
    if (!endTime) {
      return this.policy.pricing.minBookingHours;
    }

    const endMinutes = parseClockTime(endTime);
    if (endMinutes === null) {
      invalid.push({ field: 'endTime', reason: 'invalid_time' });
      return this.policy.pricing.minBookingHours;
    }
    if (startMinutes === null || endMinutes <= startMinutes) {
      return this.policy.pricing.minBookingHours;
    }
    return (endMinutes - startMinutes) / 60;
  }

  /** Raise to the minimum, then round up to the next whole unit (3 -> 4). */
  roundUpToUnit(hours: number): number {
    const { minBookingHours, unitHours } = this.policy.pricing;
    const atLeastMinimum = Math.max(hours, minBookingHours);
    return Math.ceil(atLeastMinimum / unitHours) * unitHours;
  }

  private resolveCourt(
    requested: string | undefined,
    invalid: InvalidField[],
  ): string | null {
    const value = requested?.trim();
    if (!value) {
      return this.policy.defaultCourt;
    }

    const court = this.policy.courts.find(
      (c) => c.id === value || c.label === value,
    );
    if (!court) {
      invalid.push({ field: 'court', reason: 'unknown_court' });
      return null;
    }
    return court.id;
  }

  private resolveCategory(requested: string | undefined): string {
    const value = requested?.trim();
    if (!value) {
      return this.pricingPolicyService.defaultCategory;
    }
    if (!this.pricingPolicyService.isKnownCategory(value)) {
      this.logger.warn('Unrecognized category replaced by default tier', {
        category: value,
        fallback: this.pricingPolicyService.defaultCategory,
      });
      return this.pricingPolicyService.defaultCategory;
    }
    return value;
  }

  private resolveDayType(candidate: ReservationCandidate, date: Date): DayType {
    if (candidate.isHoliday === true) {
      return DayType.WEEKEND_OR_HOLIDAY;
    }
    if (candidate.isWeekend !== undefined) {
      return candidate.isWeekend ? DayType.WEEKEND_OR_HOLIDAY : DayType.WEEKDAY;
    }
    return this.policy.weekendDays.includes(getDay(date))
      ? DayType.WEEKEND_OR_HOLIDAY
      : DayType.WEEKDAY;
  }

  private composeNotes(candidate: ReservationCandidate): string {
    const teamName = candidate.teamName?.trim();
    const email = candidate.email?.trim();

    return [
      candidate.notes?.trim(),
      teamName ? `Team: ${teamName}` : undefined,
      candidate.partySize !== undefined
        ? `Party size: ${candidate.partySize}`
        : undefined,
      email ? `Email: ${email}` : undefined,
    ]
      .filter((part): part is string => Boolean(part))
      .join(' / ');
  }
}
