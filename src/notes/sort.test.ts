import { describe, expect, it } from "vitest";
import { SORT_KEYS } from "../config/index.js";
import { CalendarEvent } from "../events/event.js";
import { ListEntry, sortEntries } from "./sort.js";
import { NoteSummary } from "./types.js";

function summary(id: string, title: string, created: string, updated: string): NoteSummary {
  return {
    id,
    kind: "standalone",
    filePath: `/notes/${id}`,
    frontmatter: { title, created, updated, tags: [] },
  };
}

function event(id: string, title: string, start: string): CalendarEvent {
  return {
    id,
    title,
    start: new Date(start),
    end: new Date(start),
    calendarName: "Work",
    location: "",
    description: "",
    allDay: false,
  };
}

const ids = (entries: ListEntry[]) =>
  entries.map((entry) => (entry.type === "event" ? entry.event.id : entry.note.id));

describe("sortEntries", () => {
  const notes: ListEntry[] = [
    { type: "note", note: summary("standalone/b.md", "Beta", "2024-01-02T00:00:00.000Z", "2024-01-05T00:00:00.000Z") },
    { type: "note", note: summary("standalone/a.md", "alpha", "2024-01-03T00:00:00.000Z", "2024-01-04T00:00:00.000Z") },
    { type: "note", note: summary("standalone/g.md", "Gamma", "2024-01-01T00:00:00.000Z", "2024-01-06T00:00:00.000Z") },
  ];

  it("orders titles case-insensitively", () => {
    expect(ids(sortEntries(notes, "title_asc"))).toEqual(["standalone/a.md", "standalone/b.md", "standalone/g.md"]);
    expect(ids(sortEntries(notes, "title_desc"))).toEqual(["standalone/g.md", "standalone/b.md", "standalone/a.md"]);
  });

  it("orders by creation date when there is no event", () => {
    expect(ids(sortEntries(notes, "date_desc"))).toEqual(["standalone/a.md", "standalone/b.md", "standalone/g.md"]);
    expect(ids(sortEntries(notes, "date_asc"))).toEqual(["standalone/g.md", "standalone/b.md", "standalone/a.md"]);
  });

  it("orders by last update", () => {
    expect(ids(sortEntries(notes, "updated_desc"))).toEqual(["standalone/g.md", "standalone/b.md", "standalone/a.md"]);
    expect(ids(sortEntries(notes, "updated_asc"))).toEqual(["standalone/a.md", "standalone/b.md", "standalone/g.md"]);
  });

  it("does not modify its input", () => {
    sortEntries(notes, "title_asc");

    expect(ids(notes)).toEqual(["standalone/b.md", "standalone/a.md", "standalone/g.md"]);
  });

  it("puts events without notes last for either update order", () => {
    const entries: ListEntry[] = [
      { type: "event", event: event("evt-bare", "Bare", "2024-01-15T09:00:00.000Z") },
      {
        type: "event",
        event: event("evt-noted", "Noted", "2024-01-15T10:00:00.000Z"),
        note: summary("events/noted.md", "Noted", "2024-01-10T00:00:00.000Z", "2024-01-11T00:00:00.000Z"),
      },
    ];

    expect(ids(sortEntries(entries, "updated_desc"))).toEqual(["evt-noted", "evt-bare"]);
    expect(ids(sortEntries(entries, "updated_asc"))).toEqual(["evt-noted", "evt-bare"]);
  });

  it("uses the event start for event rows", () => {
    const entries: ListEntry[] = [
      { type: "event", event: event("evt-early", "Early", "2024-01-15T08:00:00.000Z") },
      { type: "event", event: event("evt-late", "Late", "2024-01-15T17:00:00.000Z") },
    ];

    expect(ids(sortEntries(entries, "date_desc"))).toEqual(["evt-late", "evt-early"]);
  });

  it("breaks ties by path", () => {
    const tied: ListEntry[] = [
      { type: "note", note: summary("standalone/z.md", "Same", "2024-01-01T00:00:00.000Z", "2024-01-01T00:00:00.000Z") },
      { type: "note", note: summary("standalone/m.md", "same", "2024-01-01T00:00:00.000Z", "2024-01-01T00:00:00.000Z") },
    ];

    for (const key of SORT_KEYS) {
      expect(ids(sortEntries(tied, key))).toEqual(["standalone/m.md", "standalone/z.md"]);
    }
  });
});
