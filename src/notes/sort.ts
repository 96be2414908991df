import type { SortKey } from "../config/index.js";
import { CalendarEvent } from "../events/event.js";
import { NoteSummary } from "./types.js";

export const SORT_LABELS: Record<SortKey, string> = {
  date_desc: "Date (newest first)",
  date_asc: "Date (oldest first)",
  title_asc: "Title (A-Z)",
  title_desc: "Title (Z-A)",
  updated_desc: "Recently updated",
  updated_asc: "Least recently updated",
};

/** A row of the combined list: a calendar event (with its note, if any) or a bare note. */
export type ListEntry =
  | { type: "event"; event: CalendarEvent; note?: NoteSummary }
  | { type: "note"; note: NoteSummary };

function timeOf(iso: string | undefined): number | undefined {
  if (!iso) return undefined;
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? undefined : ms;
}

export function entryDate(entry: ListEntry): number {
  if (entry.type === "event") {
    return entry.event.start.getTime();
  }
  const fm = entry.note.frontmatter;
  return timeOf(fm.event?.date) ?? timeOf(fm.created) ?? 0;
}

export function entryTitle(entry: ListEntry): string {
  return entry.type === "event" ? entry.event.title : entry.note.frontmatter.title;
}

export function entryUpdated(entry: ListEntry): number | undefined {
  return timeOf(entry.note?.frontmatter.updated);
}

export function entryKey(entry: ListEntry): string {
  if (entry.note) return entry.note.id;
  return entry.type === "event" ? entry.event.id : "";
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareBy(key: SortKey, a: ListEntry, b: ListEntry): number {
  switch (key) {
    case "date_desc":
      return entryDate(b) - entryDate(a);
    case "date_asc":
      return entryDate(a) - entryDate(b);
    case "title_asc":
      return compareStrings(entryTitle(a).toLowerCase(), entryTitle(b).toLowerCase());
    case "title_desc":
      return compareStrings(entryTitle(b).toLowerCase(), entryTitle(a).toLowerCase());
    case "updated_desc":
    case "updated_asc": {
      const left = entryUpdated(a);
      const right = entryUpdated(b);
      // Rows without a note go last either way.
      if (left === undefined || right === undefined) {
        return (left === undefined ? 1 : 0) - (right === undefined ? 1 : 0);
      }
      return key === "updated_desc" ? right - left : left - right;
    }
  }
}

/** Returns a new, totally ordered list; ties fall back to path (or event id) order. */
export function sortEntries<T extends ListEntry>(entries: readonly T[], key: SortKey): T[] {
  return [...entries].sort(
    (a, b) => compareBy(key, a, b) || compareStrings(entryKey(a), entryKey(b))
  );
}
