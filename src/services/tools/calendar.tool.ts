import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { CalendarAdapter } from '../../types/calendar';
import { ToolParams, ToolResult } from '../../types/tool';
import { logger } from '../../utils/logger';
import { ActionHandler, BaseTool, toolFailure, toolSuccess } from './base.tool';

const SLOT_HOURS = [10, 14, 16];
const MAX_SLOTS_RETURNED = 10;

const bookMeetingSchema = z.object({
  lead_email: z.string().email(),
  lead_name: z.string().nullish(),
  meeting_type: z.string().default('discovery_call'),
  duration_minutes: z.number().int().positive().default(30),
  preferred_date: z.string().nullish(),
});

const checkAvailabilitySchema = z.object({
  date: z.string().nullish(),
  num_days: z.number().int().positive().default(7),
});

const cancelMeetingSchema = z.object({
  booking_id: z.string().min(1),
});

/** ISO first, then natural language ("next Tuesday at 3pm"). Null when neither parses. */
export function parseMeetingDate(text: string, reference: Date): DateTime | null {
  const isoDate = DateTime.fromISO(text, { zone: 'utc' });
  if (isoDate.isValid) return isoDate;

  const natural = chrono.parseDate(text, reference, { forwardDate: true });
  return natural ? DateTime.fromJSDate(natural, { zone: 'utc' }) : null;
}

function toIso(value: DateTime): string {
  const iso = value.toISO();
  if (!iso) {
    throw new Error(`Invalid date: ${value.invalidExplanation ?? 'unknown'}`);
  }
  return iso;
}

export class CalendarTool extends BaseTool {
  protected readonly actions: Record<string, ActionHandler> = {
    book_meeting: (params) => this.bookMeeting(params),
    check_availability: (params) => this.checkAvailability(params),
    cancel_meeting: (params) => this.cancelMeeting(params),
  };

  constructor(private calendar: CalendarAdapter, private now: () => Date = () => new Date()) {
    super('calendar_tool', 'Calendar');
  }

  private async bookMeeting(params: ToolParams): Promise<ToolResult> {
    const input = bookMeetingSchema.parse(params);

    let start: DateTime;
    if (input.preferred_date) {
      const parsed = parseMeetingDate(input.preferred_date, this.now());
      if (!parsed) {
        return toolFailure(`Invalid date format: ${input.preferred_date}`, false);
      }
      start = parsed;
    } else {
      start = DateTime.fromJSDate(this.now(), { zone: 'utc' })
        .plus({ days: 2 })
        .set({ hour: 10, minute: 0, second: 0, millisecond: 0 });
    }

    const leadName = input.lead_name || 'Prospect';
    const event = await this.calendar.createEvent({
      title: `${input.meeting_type.replace(/_/g, ' ')} with ${leadName}`,
      start: toIso(start),
      end: toIso(start.plus({ minutes: input.duration_minutes })),
      attendees: [input.lead_email],
      description: `Booked automatically for ${input.lead_email}`,
    });

    logger.info('Meeting booked', { bookingId: event.id, leadEmail: input.lead_email, scheduledAt: event.start });

    return toolSuccess({
      booking_id: event.id,
      lead_email: input.lead_email,
      lead_name: leadName,
      meeting_type: input.meeting_type,
      scheduled_at: event.start,
      duration_minutes: input.duration_minutes,
      status: 'confirmed',
    });
  }

  private async checkAvailability(params: ToolParams): Promise<ToolResult> {
    const input = checkAvailabilitySchema.parse(params);

    let startDate = DateTime.fromJSDate(this.now(), { zone: 'utc' });
    if (input.date) {
      const parsed = DateTime.fromISO(input.date, { zone: 'utc' });
      if (!parsed.isValid) {
        return toolFailure(`Invalid date format: ${input.date}`, false);
      }
      startDate = parsed;
    }

    const slots: Array<{ datetime: string; duration_minutes: number }> = [];
    for (let offset = 0; offset < input.num_days; offset++) {
      const day = startDate.plus({ days: offset }).startOf('day');
      // Saturday and Sunday
      if (day.weekday >= 6) continue;

      const daySlots = await this.calendar.getAvailableSlots(toIso(day), 'UTC');
      for (const slot of daySlots) {
        const slotStart = DateTime.fromISO(slot.start, { zone: 'utc' });
        if (slot.available && slotStart.minute === 0 && SLOT_HOURS.includes(slotStart.hour)) {
          slots.push({ datetime: toIso(slotStart), duration_minutes: 30 });
        }
      }
    }

    return toolSuccess({
      available_slots: slots.slice(0, MAX_SLOTS_RETURNED),
      total_slots: slots.length,
    });
  }

  private async cancelMeeting(params: ToolParams): Promise<ToolResult> {
    const input = cancelMeetingSchema.parse(params);
    await this.calendar.cancelEvent(input.booking_id);

    logger.info('Meeting cancelled', { bookingId: input.booking_id });
    return toolSuccess({ booking_id: input.booking_id, status: 'cancelled' });
  }
}
