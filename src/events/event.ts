import { z } from "zod";

export interface CalendarEvent {
  id: string; // stable across runs; join key to notes
  title: string;
  start: Date;
  end: Date;
  calendarName: string;
  location: string;
  description: string;
  allDay: boolean;
}

export interface DateRange {
  start: Date;
  end: Date; // exclusive
}

const dateInput = z.union([z.string(), z.number(), z.date()]).pipe(z.coerce.date());

/** Raw event as found in a calendar export; both camelCase and snake_case keys are accepted. */
export const RawEventSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
  title: z.string().nullish(),
  start: dateInput,
  end: dateInput.nullish(),
  calendar: z.string().nullish(),
  calendarName: z.string().nullish(),
  location: z.string().nullish(),
  description: z.string().nullish(),
  notes: z.string().nullish(),
  allDay: z.boolean().nullish(),
  all_day: z.boolean().nullish(),
});

export type RawEvent = z.input<typeof RawEventSchema>;

export function normalizeEvent(raw: unknown): CalendarEvent {
  const parsed = RawEventSchema.parse(raw);

  // Titles stay as exported: surrounding whitespace is part of the derived filename.
  return {
    id: parsed.id,
    title: parsed.title ? parsed.title : "Untitled",
    start: parsed.start,
    end: parsed.end ?? parsed.start,
    calendarName: parsed.calendarName ?? parsed.calendar ?? "",
    location: parsed.location ?? "",
    description: parsed.description ?? parsed.notes ?? "",
    allDay: parsed.allDay ?? parsed.all_day ?? false,
  };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local calendar date, `YYYY-MM-DD`. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local wall-clock time, `HH:MM`. */
export function formatLocalTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatEventDate(event: CalendarEvent): string {
  return formatLocalDate(event.start);
}

export function formatEventTime(event: CalendarEvent): string {
  if (event.allDay) {
    return "All day";
  }
  return `${formatLocalTime(event.start)} - ${formatLocalTime(event.end)}`;
}

export function formatEventDuration(event: CalendarEvent): string {
  if (event.allDay) {
    return "All day";
  }
  const totalMinutes = Math.max(0, Math.floor((event.end.getTime() - event.start.getTime()) / 60_000));
  const hours = Math.floor(totalMinutes / 60) % 24;
  const minutes = totalMinutes % 60;
  if (hours > 0) {
    return minutes ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  return `${minutes}m`;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

export function dayRange(date: Date): DateRange {
  const start = startOfDay(date);
  return { start, end: addDays(start, 1) };
}

/** Monday 00:00 through the following Monday. */
export function weekRange(date: Date): DateRange {
  const day = startOfDay(date);
  const sinceMonday = (day.getDay() + 6) % 7;
  const start = addDays(day, -sinceMonday);
  return { start, end: addDays(start, 7) };
}

export function overlapsRange(event: CalendarEvent, range: DateRange): boolean {
  const start = event.start.getTime();
  const end = Math.max(event.end.getTime(), start);
  if (start === end) {
    return start >= range.start.getTime() && start < range.end.getTime();
  }
  return start < range.end.getTime() && end > range.start.getTime();
}

/** Parses `YYYY-MM-DD` as a local date; returns null for anything else. */
export function parseLocalDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}
