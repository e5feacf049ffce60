import { DayType } from './day-type.enum';

export interface FeeBreakdown {
  readonly category: string;
  readonly categoryLabel: string;
  readonly dayType: DayType;
  readonly ratePerHour: number;
  readonly hours: number;
  readonly total: number;
  readonly paymentMethod: string;
}
