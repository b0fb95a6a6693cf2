import { google, calendar_v3 } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { CalendarAdapter, TimeSlot, CalendarEvent } from '../../types/calendar';
import { logger } from '../../utils/logger';
import { toProviderError } from '../../utils/errors';

export interface GoogleCalendarConfig {
  /** Base64-encoded service account JSON. */
  credentials: string;
  calendarId?: string;
}

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

const WORKDAY_START_HOUR = 9;
const WORKDAY_END_HOUR = 18;
const SLOT_MINUTES = 30;

function toIso(value: DateTime): string {
  const iso = value.toISO();
  if (!iso) {
    throw new Error(`Invalid date: ${value.invalidExplanation ?? 'unknown'}`);
  }
  return iso;
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  private calendar: calendar_v3.Calendar;
  private calendarId: string;

  constructor(config: GoogleCalendarConfig) {
    const decoded: unknown = JSON.parse(Buffer.from(config.credentials, 'base64').toString('utf8'));
    const parsed = serviceAccountSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new Error('GOOGLE_CALENDAR_CREDENTIALS must be a base64-encoded service account key');
    }

    const auth = new GoogleAuth({
      credentials: { client_email: parsed.data.client_email, private_key: parsed.data.private_key },
      scopes: ['https://www.googleapis.com/auth/calendar'],
    });

    this.calendar = google.calendar({ version: 'v3', auth });
    this.calendarId = config.calendarId || 'primary';
  }

  async getAvailableSlots(date: string, timezone: string): Promise<TimeSlot[]> {
    const day = DateTime.fromISO(date, { zone: timezone }).startOf('day');
    const dayStart = day.set({ hour: WORKDAY_START_HOUR });
    const dayEnd = day.set({ hour: WORKDAY_END_HOUR });

    let busy: calendar_v3.Schema$TimePeriod[];
    try {
      const freeBusy = await this.calendar.freebusy.query({
        requestBody: {
          timeMin: toIso(dayStart),
          timeMax: toIso(dayEnd),
          timeZone: timezone,
          items: [{ id: this.calendarId }],
        },
      });
      busy = freeBusy.data.calendars?.[this.calendarId]?.busy || [];
    } catch (error) {
      throw toProviderError('GoogleCalendar', 'getAvailableSlots', error);
    }

    const busyRanges = busy.flatMap((period) =>
      period.start && period.end
        ? [
            {
              start: DateTime.fromISO(period.start, { zone: timezone }),
              end: DateTime.fromISO(period.end, { zone: timezone }),
            },
          ]
        : []
    );

    const slots: TimeSlot[] = [];
    let cursor = dayStart;
    while (cursor < dayEnd) {
      const slotEnd = cursor.plus({ minutes: SLOT_MINUTES });
      const slotStart = cursor;
      const isBusy = busyRanges.some((range) => slotStart < range.end && slotEnd > range.start);

      slots.push({
        start: toIso(slotStart),
        end: toIso(slotEnd),
        available: !isBusy,
      });

      cursor = slotEnd;
    }

    return slots;
  }

  async createEvent(event: Omit<CalendarEvent, 'id'>): Promise<CalendarEvent> {
    try {
      const result = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: event.title,
          description: event.description,
          location: event.location,
          start: { dateTime: event.start, timeZone: 'UTC' },
          end: { dateTime: event.end, timeZone: 'UTC' },
          attendees: event.attendees?.map((email) => ({ email })),
        },
      });

      logger.info('Google Calendar event created', { eventId: result.data.id });

      return {
        id: result.data.id || '',
        title: event.title,
        start: event.start,
        end: event.end,
        attendees: event.attendees,
        location: event.location,
        description: event.description,
      };
    } catch (error) {
      throw toProviderError('GoogleCalendar', 'createEvent', error);
    }
  }

  async cancelEvent(eventId: string): Promise<void> {
    try {
      await this.calendar.events.delete({ calendarId: this.calendarId, eventId });
    } catch (error) {
      throw toProviderError('GoogleCalendar', 'cancelEvent', error);
    }

    logger.info('Google Calendar event cancelled', { eventId });
  }
}
