import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { formatInTimeZone, zonedTimeToUtc } from 'date-fns-tz';
import { calendar_v3, google } from 'googleapis';
import { CalendarStore } from '../../ports/calendar-store.interface';
import { GROUND_POLICY } from '../../tokens';
import { GroundPolicy } from '../../domain/policy/ground-policy';
import {
  CalendarEvent,
  NewCalendarEvent,
  TimeWindow,
} from '../../domain/types/calendar-event.type';
import { AllConfigType } from '../../../config/config.type';

const SCOPES = ['https://www.googleapis.com/auth/calendar'];
const RFC3339 = "yyyy-MM-dd'T'HH:mm:ssXXX";

/** Google Calendar v3 behind a service account. */
@Injectable()
export class GoogleCalendarStore implements CalendarStore {
  private readonly calendar: calendar_v3.Calendar;
  private readonly calendarId: string;

  constructor(
    @Inject(GROUND_POLICY)
    private readonly policy: GroundPolicy,
    configService: ConfigService<AllConfigType>,
  ) {
    const googleConfig = configService.getOrThrow('ground.google', {
      infer: true,
    });
    const auth = new google.auth.GoogleAuth({
      keyFile: googleConfig.serviceAccountFile,
      scopes: SCOPES,
    });

    this.calendar = google.calendar({ version: 'v3', auth });
    this.calendarId = googleConfig.calendarId;
  }

  async queryEvents(
    window: TimeWindow,
    textFilter: string,
  ): Promise<CalendarEvent[]> {
    const response = await this.calendar.events.list({
      calendarId: this.calendarId,
      timeMin: window.start.toISOString(),
      timeMax: window.end.toISOString(),
      q: textFilter,
      singleEvents: true,
      orderBy: 'startTime',
    });

    const events: CalendarEvent[] = [];
    for (const item of response.data.items ?? []) {
      const start = item.start ? this.toInstant(item.start) : null;
      const end = item.end ? this.toInstant(item.end) : null;
      if (!item.id || !start || !end) {
        continue;
      }
      events.push({
        id: item.id,
        summary: item.summary ?? '',
        start,
        end,
      });
    }
    return events;
  }

  /** All-day events carry a bare date, which starts at midnight on the ground's clock. */
  private toInstant(time: calendar_v3.Schema$EventDateTime): Date | null {
    if (time.dateTime) {
      return new Date(time.dateTime);
    }
    if (time.date) {
      return zonedTimeToUtc(`${time.date}T00:00:00`, this.policy.timezone);
    }
    return null;
  }

  async createEvent(event: NewCalendarEvent): Promise<string> {
    const timeZone = this.policy.timezone;
    const response = await this.calendar.events.insert({
      calendarId: this.calendarId,
      requestBody: {
        summary: event.summary,
        description: event.description,
        colorId: event.colorTag,
        start: {
          dateTime: formatInTimeZone(event.start, timeZone, RFC3339),
          timeZone,
        },
        end: {
          dateTime: formatInTimeZone(event.end, timeZone, RFC3339),
          timeZone,
        },
      },
    });

    if (!response.data.id) {
      throw new Error('Calendar did not return an event id');
    }
    return response.data.id;
  }

  async deleteEvent(eventId: string): Promise<void> {
    await this.calendar.events.delete({
      calendarId: this.calendarId,
      eventId,
    });
  }
}
