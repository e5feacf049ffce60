import { zonedTimeToUtc } from 'date-fns-tz';
import { TimeWindow } from '../../domain/types/calendar-event.type';
import { ReservationRequest } from '../../domain/types/reservation-request.type';

/** The request's [start, end) as instants, reading its wall-clock times in the ground's timezone. */
export function reservationWindow(
  request: Pick<ReservationRequest, 'date' | 'startTime' | 'endTime'>,
  timezone: string,
): TimeWindow {
  return {
    start: zonedTimeToUtc(`${request.date}T${request.startTime}:00`, timezone),
    end: zonedTimeToUtc(`${request.date}T${request.endTime}:00`, timezone),
  };
}
