import { CalendarAdapter, CalendarEvent, TimeSlot } from '../../types/calendar';
import { ServiceError } from '../../utils/errors';
import { GoogleCalendarAdapter } from './google.adapter';

/** Stand-in when no calendar is configured; every call fails without retry. */
export class DisabledCalendarAdapter implements CalendarAdapter {
  private fail(operation: string): never {
    throw new ServiceError('Calendar', operation, new Error('Calendar integration not configured'), false);
  }

  async getAvailableSlots(_date: string, _timezone: string): Promise<TimeSlot[]> {
    return this.fail('getAvailableSlots');
  }

  async createEvent(_event: Omit<CalendarEvent, 'id'>): Promise<CalendarEvent> {
    return this.fail('createEvent');
  }

  async cancelEvent(_eventId: string): Promise<void> {
    return this.fail('cancelEvent');
  }
}

export class CalendarFactory {
  static create(credentials?: string, calendarId?: string): CalendarAdapter {
    if (!credentials) {
      return new DisabledCalendarAdapter();
    }
    return new GoogleCalendarAdapter({ credentials, calendarId });
  }
}
