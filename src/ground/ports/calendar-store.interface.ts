import {
  CalendarEvent,
  NewCalendarEvent,
  TimeWindow,
} from '../domain/types/calendar-event.type';

export interface CalendarStore {
  /** Events intersecting the window whose text matches the filter. */
  queryEvents(window: TimeWindow, textFilter: string): Promise<CalendarEvent[]>;
  /** Returns the created event's id. */
  createEvent(event: NewCalendarEvent): Promise<string>;
  deleteEvent(eventId: string): Promise<void>;
}
