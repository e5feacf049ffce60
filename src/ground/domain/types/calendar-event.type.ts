export interface TimeWindow {
  start: Date;
  end: Date; // exclusive
}

export interface CalendarEvent extends TimeWindow {
  id: string;
  summary: string;
}

export interface NewCalendarEvent extends TimeWindow {
  summary: string;
  description: string;
  colorTag: string;
}
