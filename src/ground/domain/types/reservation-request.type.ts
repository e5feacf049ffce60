import { DayType } from './day-type.enum';

export interface ReservationRequest {
  readonly date: string; // YYYY-MM-DD
  readonly startTime: string; // HH:mm
  readonly endTime: string; // HH:mm, always startTime + hours
  readonly hours: number;
  readonly court: string;
  readonly category: string;
  readonly dayType: DayType;
  readonly name: string;
  readonly phone: string;
  readonly notes: string;
}
