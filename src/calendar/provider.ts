import { readFileSync } from "fs";
import { z } from "zod";
import { AccessDeniedError, ParseError, hasErrorCode } from "../errors.js";
import {
  CalendarEvent,
  DateRange,
  normalizeEvent,
  overlapsRange,
} from "../events/event.js";

/** Read-only event feed. Implementations may throw AccessDeniedError. */
export interface CalendarProvider {
  getEvents(range: DateRange): Promise<CalendarEvent[]>;
}

export class EmptyCalendarProvider implements CalendarProvider {
  async getEvents(): Promise<CalendarEvent[]> {
    return [];
  }
}

const FeedSchema = z.union([
  z.array(z.unknown()),
  z.object({ events: z.array(z.unknown()) }).transform((feed) => feed.events),
]);

export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  const byStart = a.start.getTime() - b.start.getTime();
  if (byStart !== 0) return byStart;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Calendar exported to a JSON file, either an array of events or `{ "events": [...] }`.
 * The file is re-read on every call so refreshes see external exports.
 */
export class JsonFeedCalendarProvider implements CalendarProvider {
  private feedPath: string;
  private calendars: Set<string>;

  constructor(feedPath: string, options: { calendars?: string[] } = {}) {
    this.feedPath = feedPath;
    this.calendars = new Set(options.calendars ?? []);
  }

  private readFeed(): string {
    try {
      return readFileSync(this.feedPath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "EACCES", "EPERM")) {
        throw new AccessDeniedError(`Calendar access denied: ${this.feedPath}`, { cause: error });
      }
      if (hasErrorCode(error, "ENOENT")) {
        throw new AccessDeniedError(`Calendar feed not found: ${this.feedPath}`, { cause: error });
      }
      throw error;
    }
  }

  async getEvents(range: DateRange): Promise<CalendarEvent[]> {
    const raw = this.readFeed();

    let entries: unknown[];
    try {
      entries = FeedSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new ParseError(`Invalid calendar feed: ${this.feedPath}`, { cause: error });
    }

    const events: CalendarEvent[] = [];
    entries.forEach((entry, index) => {
      let event: CalendarEvent;
      try {
        event = normalizeEvent(entry);
      } catch (error) {
        throw new ParseError(`Invalid event at index ${index} in ${this.feedPath}`, { cause: error });
      }
      if (this.calendars.size > 0 && !this.calendars.has(event.calendarName)) {
        return;
      }
      if (overlapsRange(event, range)) {
        events.push(event);
      }
    });

    return events.sort(compareEvents);
  }
}
