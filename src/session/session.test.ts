import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { CalendarProvider } from "../calendar/provider.js";
import type { LaunchResult } from "../editor/launcher.js";
import { AccessDeniedError } from "../errors.js";
import { CalendarEvent, DateRange } from "../events/event.js";
import { NoteManager } from "../notes/manager.js";
import { NotesSession } from "./session.js";

function makeEvent(id: string, title: string, hour: number): CalendarEvent {
  return {
    id,
    title,
    start: new Date(2024, 0, 15, hour),
    end: new Date(2024, 0, 15, hour + 1),
    calendarName: "Work",
    location: "",
    description: "",
    allDay: false,
  };
}

function fakeCalendar(events: CalendarEvent[]) {
  return { getEvents: vi.fn(async (_range: DateRange) => events) } satisfies CalendarProvider;
}

function fakeEditor() {
  return { open: vi.fn(async (_filePath: string): Promise<LaunchResult> => ({ ok: true })) };
}

const standup = makeEvent("evt-standup", "Standup", 9);
const review = makeEvent("evt-review", "Review", 14);

describe("NotesSession", () => {
  let dir: string;
  let notes: NoteManager;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2024, 0, 15, 11, 30, 5));
    dir = mkdtempSync(join(tmpdir(), "calnotes-session-"));
    mkdirSync(join(dir, "events"));
    mkdirSync(join(dir, "standalone"));
    notes = new NoteManager({ notesDirectory: dir });
  });

  afterEach(() => {
    vi.useRealTimers();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeStandalone(name: string, title: string, created: string, body: string): void {
    writeFileSync(
      join(dir, "standalone", name),
      `---\ntitle: ${title}\ncreated: '${created}'\nupdated: '${created}'\ntags: []\n---\n${body}`
    );
  }

  function createSession(calendar: CalendarProvider = fakeCalendar([standup, review]), editor = fakeEditor()) {
    return new NotesSession({
      calendar,
      notes,
      editor,
      search: { maxResults: 20, fuzzy: false },
      date: new Date(2024, 0, 15, 16),
    });
  }

  const noteIds = (session: NotesSession) =>
    session.rows().map((row) => (row.kind === "note" ? row.note.id : row.kind));

  describe("refresh", () => {
    it("marks events with notes, stale notes and tags", async () => {
      const { note } = await notes.createOrGetNote(standup);
      await notes.saveNote({ ...note, frontmatter: { ...note.frontmatter, tags: ["a", "b", "c", "d"] } });
      await notes.createOrGetNote({ ...review, title: "Old review" });
      const session = createSession();

      expect(await session.refresh()).toEqual([]);

      const [first, second] = session.state.events;
      expect(first.event.id).toBe("evt-review");
      expect(first.hasNote).toBe(false);
      expect(first.stale.map((stale) => stale.id)).toEqual(["events/2024-01-15_1400_Old_review.md"]);
      expect(second.event.id).toBe("evt-standup");
      expect(second.hasNote).toBe(true);
      expect(second.note?.id).toBe("events/2024-01-15_0900_Standup.md");
      expect(second.tags).toEqual(["a", "b", "c"]);
    });

    it("reads the store once however many events there are", async () => {
      await notes.createOrGetNote({ ...review, title: "Old review" });
      const events = Array.from({ length: 12 }, (_, index) => makeEvent(`evt-${index}`, `Slot ${index}`, 8));
      const session = createSession(fakeCalendar([...events, review]));
      const snapshot = vi.spyOn(notes, "snapshot");
      const listNotes = vi.spyOn(notes, "listNotes");
      const findById = vi.spyOn(notes, "findNotesForEventId");
      const getTodos = vi.spyOn(notes, "getTodos");

      await session.refresh();

      expect(snapshot).toHaveBeenCalledTimes(1);
      expect(listNotes).not.toHaveBeenCalled();
      expect(findById).not.toHaveBeenCalled();
      expect(getTodos).not.toHaveBeenCalled();
      expect(session.state.events.find((row) => row.event.id === "evt-review")?.stale.map((note) => note.id)).toEqual([
        "events/2024-01-15_1400_Old_review.md",
      ]);
    });

    it("keeps the notes usable when the calendar is unavailable", async () => {
      writeStandalone("a.md", "Budget plan", "2024-01-10T00:00:00.000Z", "Numbers\n");
      const calendar = {
        getEvents: vi.fn(async (_range: DateRange): Promise<CalendarEvent[]> => {
          throw new AccessDeniedError("Calendar access denied: /feeds/work.json");
        }),
      };
      const session = createSession(calendar);

      expect(await session.refresh()).toEqual([
        { level: "warn", message: "Calendar access denied: /feeds/work.json" },
      ]);
      expect(session.state.calendar).toEqual({
        state: "unavailable",
        message: "Calendar access denied: /feeds/work.json",
      });
      expect(session.state.events).toEqual([]);
      expect(session.state.notes.map((note) => note.id)).toEqual(["standalone/a.md"]);
    });

    it("lets unexpected calendar errors through", async () => {
      const calendar = {
        getEvents: vi.fn(async (_range: DateRange): Promise<CalendarEvent[]> => {
          throw new Error("boom");
        }),
      };

      await expect(createSession(calendar).refresh()).rejects.toThrow("boom");
    });
  });

  describe("open", () => {
    it("creates the note for an event row and opens it", async () => {
      const editor = fakeEditor();
      const session = createSession(undefined, editor);
      await session.refresh();

      const notices = await session.open(1);

      const filePath = join(dir, "events", "2024-01-15_1400_Review.md");
      expect(notices).toEqual([{ level: "info", message: "Created events/2024-01-15_1400_Review.md" }]);
      expect(editor.open).toHaveBeenCalledWith(filePath);
      expect(existsSync(filePath)).toBe(true);
      expect(session.state.events[0].hasNote).toBe(true);
    });

    it("opens an existing note without creating another", async () => {
      await notes.createOrGetNote(review);
      const session = createSession();
      await session.refresh();

      expect(await session.open(1)).toEqual([]);
    });

    it("reports editor failures", async () => {
      const editor = {
        open: vi.fn(async (_filePath: string): Promise<LaunchResult> => ({ ok: false, message: 'Editor "nope" not found' })),
      };
      await notes.createOrGetNote(review);
      const session = createSession(undefined, editor);
      await session.refresh();

      expect(await session.open(1)).toEqual([{ level: "error", message: 'Editor "nope" not found' }]);
    });

    it("warns about rows that do not exist", async () => {
      const session = createSession();
      await session.refresh();

      expect(await session.open(5)).toEqual([{ level: "warn", message: "No row 5" }]);
    });
  });

  describe("newNote", () => {
    it("creates a standalone note and opens it", async () => {
      const editor = fakeEditor();
      const session = createSession(undefined, editor);

      const notices = await session.newNote("Idea");

      expect(notices).toEqual([{ level: "info", message: "Created standalone/2024-01-15_113005_Idea.md" }]);
      expect(editor.open).toHaveBeenCalledWith(join(dir, "standalone", "2024-01-15_113005_Idea.md"));
      expect(await session.newNote("Idea")).toEqual([
        { level: "info", message: "Opened existing standalone/2024-01-15_113005_Idea.md" },
      ]);
    });

    it("needs a title", async () => {
      expect(await createSession().newNote("   ")).toEqual([{ level: "warn", message: "A note needs a title" }]);
    });
  });

  describe("search", () => {
    beforeEach(() => {
      writeStandalone("a.md", "Budget plan", "2024-01-10T00:00:00.000Z", "Numbers\n");
      writeStandalone("b.md", "Groceries", "2024-01-12T00:00:00.000Z", "milk\n");
    });

    it("shows the matches on the notes tab", async () => {
      const session = createSession();
      await session.refresh();

      expect(await session.search(" budget ")).toEqual([{ level: "info", message: "1 result(s)" }]);
      expect(session.state.tab).toBe("notes");
      expect(session.state.search?.query).toBe("budget");
      expect(noteIds(session)).toEqual(["standalone/a.md"]);
    });

    it("says when nothing matches", async () => {
      expect(await createSession().search("zzz")).toEqual([{ level: "info", message: 'No notes match "zzz"' }]);
    });

    it("refuses one-character queries", async () => {
      expect(await createSession().search("b")).toEqual([
        { level: "warn", message: "Search needs at least 2 characters" },
      ]);
    });

    it("drops the results when switching tabs", async () => {
      const session = createSession();
      await session.refresh();
      await session.search("budget");

      session.switchTab("notes");

      expect(session.state.search).toBeNull();
      expect(noteIds(session)).toEqual(["standalone/b.md", "standalone/a.md"]);
    });
  });

  describe("delete", () => {
    beforeEach(() => {
      writeStandalone("a.md", "Budget plan", "2024-01-10T00:00:00.000Z", "Numbers\n");
      writeStandalone("b.md", "Groceries", "2024-01-12T00:00:00.000Z", "milk\n");
    });

    it("asks first and removes the file", async () => {
      const session = createSession();
      await session.refresh();
      session.switchTab("notes");
      const confirm = vi.fn(async () => true);

      expect(await session.delete(2, confirm)).toEqual([{ level: "info", message: "Deleted standalone/a.md" }]);
      expect(confirm).toHaveBeenCalledWith(expect.objectContaining({ id: "standalone/a.md" }));
      expect(existsSync(join(dir, "standalone", "a.md"))).toBe(false);
      expect(noteIds(session)).toEqual(["standalone/b.md"]);
    });

    it("keeps the file when the user declines", async () => {
      const session = createSession();
      await session.refresh();
      session.switchTab("notes");

      expect(await session.delete(1, async () => false)).toEqual([{ level: "info", message: "Delete cancelled" }]);
      expect(existsSync(join(dir, "standalone", "b.md"))).toBe(true);
    });

    it("needs a row with a note", async () => {
      const session = createSession();
      await session.refresh();

      expect(await session.delete(1, async () => true)).toEqual([{ level: "warn", message: "No note in row 1" }]);
    });
  });

  it("re-sorts on request", async () => {
    writeStandalone("a.md", "Budget plan", "2024-01-10T00:00:00.000Z", "Numbers\n");
    writeStandalone("b.md", "Groceries", "2024-01-12T00:00:00.000Z", "milk\n");
    const session = createSession();
    session.switchTab("notes");

    expect(await session.setSort("title_asc")).toEqual([{ level: "info", message: "Sorted by Title (A-Z)" }]);
    expect(noteIds(session)).toEqual(["standalone/a.md", "standalone/b.md"]);
  });

  it("moves between days and views", async () => {
    const calendar = fakeCalendar([]);
    const session = createSession(calendar);

    await session.shiftDays(1);
    expect(session.state.range).toEqual({ start: new Date(2024, 0, 16), end: new Date(2024, 0, 17) });

    await session.toggleView();
    expect(session.state.mode).toBe("week");
    expect(calendar.getEvents).toHaveBeenLastCalledWith({ start: new Date(2024, 0, 15), end: new Date(2024, 0, 22) });

    await session.today();
    expect(session.state.date).toEqual(new Date(2024, 0, 15));
  });

  it("completes todos and reloads the list", async () => {
    writeStandalone("c.md", "Calls", "2024-01-10T00:00:00.000Z", "#todo: call Bob\nother line\n");
    const session = createSession();
    await session.refresh();

    expect(session.state.todos.map((todo) => todo.content)).toEqual(["call Bob"]);
    expect(await session.completeTodo(1)).toEqual([{ level: "info", message: "Completed: call Bob" }]);
    expect(session.state.todos).toEqual([]);
    expect(await session.completeTodo(3)).toEqual([{ level: "warn", message: "No todo 3" }]);
  });
});
