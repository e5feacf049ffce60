import { GroundPolicy } from '../../domain/policy/ground-policy';
import {
  ConflictRejection,
  RequiredField,
  ValidationError,
} from '../../domain/errors/reservation.errors';
import { BookingRecord } from '../../domain/types/booking-record.type';
import { Confirmation } from '../../domain/types/confirmation.type';
import { MonthlySummary } from '../../domain/types/monthly-summary.type';
import { dayOfWeekLabel } from '../../domain/utils/clock-time.util';

const FIELD_LABELS: Record<string, string> = {
  date: 'Date of use',
  startTime: 'Start time',
  endTime: 'End time',
  hours: 'Hours',
  name: 'Name',
  court: 'Court',
};

const REASON_LABELS: Record<string, string> = {
  invalid_date: 'not a valid date (use YYYY-MM-DD)',
  invalid_time: 'not a valid time (use HH:MM)',
  invalid_hours: 'not a number of hours',
  unknown_court: 'not one of our courts',
  outside_business_hours: 'outside opening hours',
};

export function formatYen(amount: number): string {
  return `¥${amount.toLocaleString('en-US')}`;
}

export function courtLabel(policy: GroundPolicy, courtId: string): string {
  return policy.courts.find((court) => court.id === courtId)?.label ?? courtId;
}

export function confirmationText(
  confirmation: Confirmation,
  policy: GroundPolicy,
): string {
  const { request, fee } = confirmation;

  return [
    'Your reservation is confirmed!',
    '',
    `Date: ${request.date} (${dayOfWeekLabel(request.date)}) ${request.startTime}-${request.endTime}`,
    `Court: ${courtLabel(policy, request.court)}`,
    `Name: ${request.name}`,
    `Phone: ${request.phone || 'not provided'}`,
    `Category: ${fee.categoryLabel}`,
    `Hours: ${fee.hours}h`,
    `Fee: ${formatYen(fee.total)} (${fee.paymentMethod})`,
    `Reservation ID: ${confirmation.reservationId}`,
    '',
    'An invoice will follow. Thank you for booking with us!',
  ].join('\n');
}

export function validationText(error: ValidationError): string {
  const lines: string[] = [];

  if (error.missingFields.length > 0) {
    lines.push('The following information is missing. Please send it again:');
    lines.push(
      ...error.missingFields.map(
        (field: RequiredField) => `- ${FIELD_LABELS[field] ?? field}`,
      ),
    );
  }

  if (error.invalidFields.length > 0) {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push('Please check the following:');
    lines.push(
      ...error.invalidFields.map(
        (f) =>
          `- ${FIELD_LABELS[f.field] ?? f.field}: ${REASON_LABELS[f.reason] ?? f.reason}`,
      ),
    );
  }

  return lines.join('\n');
}

export function conflictText(rejection: ConflictRejection): string {
  const { request } = rejection;
  if (rejection.reason === 'court_locked') {
    return `Another reservation for ${request.date} is being processed right now. Please try again in a moment.`;
  }
  return [
    'Sorry, that slot is already booked:',
    `${request.date} ${request.startTime}-${request.endTime} (${request.court})`,
    'Please choose another date or time.',
  ].join('\n');
}

export function systemErrorText(): string {
  return 'A system error occurred. Sorry for the trouble; please contact us directly.';
}

export function imageUnreadableText(): string {
  return 'We could not read reservation details from the image. Please send them as text.';
}

export function todayListText(date: string, records: BookingRecord[]): string {
  if (records.length === 0) {
    return `No reservations today (${date}).`;
  }
  return [
    `Reservations today (${date})`,
    '',
    ...records.map(
      (r) => `- ${r.startTime}-${r.endTime} ${r.name} [${r.court}]`,
    ),
  ].join('\n');
}

export function monthlySummaryText(summary: MonthlySummary): string {
  const month = `${summary.year}-${String(summary.month).padStart(2, '0')}`;
  return [
    `Summary for ${month}`,
    `Reservations: ${summary.count}`,
    `Cancelled: ${summary.cancelledCount}`,
    `Total fees: ${formatYen(summary.totalFee)}`,
  ].join('\n');
}

export function cancelAcknowledgementText(): string {
  return 'Thank you for letting us know. A member of staff will confirm the cancellation and get back to you.';
}

export function helpText(policy: GroundPolicy): string {
  const courts = policy.courts.map((c) => c.label).join(' or ');
  const categories = Object.values(policy.pricing.categories)
    .map((c) => c.label)
    .join(' / ');

  return [
    `${policy.groundName} reservations`,
    '',
    'To book, send us a message with:',
    '- Date of use',
    `- Time (${policy.pricing.unitHours}-hour units)`,
    `- Court (${courts})`,
    '- Your name',
    '- Phone number',
    `- Category (${categories})`,
    '',
    'Example:',
    'June 7, 9:00-11:00, artificial turf, Taro Tanaka, 090-0000-0000, general',
    '',
    'Staff commands:',
    '/list - today\'s reservations',
    '/summary YYYY-MM - monthly summary',
    '/cancel [date] [name] - request a cancellation',
  ].join('\n');
}
