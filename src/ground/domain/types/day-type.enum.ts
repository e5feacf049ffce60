export enum DayType {
  WEEKDAY = 'weekday',
  WEEKEND_OR_HOLIDAY = 'weekend_or_holiday',
}
