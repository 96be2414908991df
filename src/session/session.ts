import type { SearchConfig, SortKey, ViewMode } from "../config/index.js";
import { CalendarProvider } from "../calendar/provider.js";
import { EditorLauncher } from "../editor/launcher.js";
import { AccessDeniedError, CalnotesError, ParseError } from "../errors.js";
import {
  CalendarEvent,
  DateRange,
  addDays,
  dayRange,
  startOfDay,
  weekRange,
} from "../events/event.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { NoteManager } from "../notes/manager.js";
import { SearchIndex, SearchResult, MIN_QUERY_LENGTH } from "../notes/search.js";
import { SORT_LABELS, sortEntries } from "../notes/sort.js";
import { NoteSummary, TodoItem } from "../notes/types.js";
import { TABS, Tab } from "./commands.js";

export type NoticeLevel = "info" | "warn" | "error";

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export type CalendarStatus = { state: "ready" } | { state: "unavailable"; message: string };

export interface EventRow {
  event: CalendarEvent;
  note?: NoteSummary;
  hasNote: boolean;
  /** Notes for this event id under another derived path (title or time changed). */
  stale: NoteSummary[];
  tags: string[];
}

export interface SearchState {
  query: string;
  results: SearchResult[];
}

export interface SessionState {
  date: Date;
  mode: ViewMode;
  range: DateRange;
  tab: Tab;
  sort: SortKey;
  calendar: CalendarStatus;
  events: EventRow[];
  notes: NoteSummary[];
  todos: TodoItem[];
  search: SearchState | null;
  showHelp: boolean;
}

/** Only the editor call the session needs; tests pass a fake. */
export type Editor = Pick<EditorLauncher, "open">;

export interface NotesSessionOptions {
  calendar: CalendarProvider;
  notes: NoteManager;
  editor: Editor;
  search: SearchConfig;
  mode?: ViewMode;
  sort?: SortKey;
  date?: Date;
  logger?: Logger;
}

export type SessionRow =
  | { kind: "event"; row: EventRow }
  | { kind: "note"; note: NoteSummary }
  | { kind: "todo"; todo: TodoItem };

const TAG_PREVIEW = 3;

function info(message: string): Notice {
  return { level: "info", message };
}

function warn(message: string): Notice {
  return { level: "warn", message };
}

function error(message: string): Notice {
  return { level: "error", message };
}

/**
 * Plain-data UI state plus one method per user intent. Every intent resolves to the
 * notices to show; failures that only affect one operation come back as error notices.
 */
export class NotesSession {
  private calendar: CalendarProvider;
  private notes: NoteManager;
  private editor: Editor;
  private searchConfig: SearchConfig;
  private logger: Logger;
  readonly state: SessionState;

  constructor(options: NotesSessionOptions) {
    this.calendar = options.calendar;
    this.notes = options.notes;
    this.editor = options.editor;
    this.searchConfig = options.search;
    this.logger = options.logger ?? silentLogger;

    const date = startOfDay(options.date ?? new Date());
    const mode = options.mode ?? "day";
    this.state = {
      date,
      mode,
      range: mode === "day" ? dayRange(date) : weekRange(date),
      tab: "events",
      sort: options.sort ?? "date_desc",
      calendar: { state: "ready" },
      events: [],
      notes: [],
      todos: [],
      search: null,
      showHelp: false,
    };
  }

  /** Rows of the active tab in display order. */
  rows(): SessionRow[] {
    switch (this.state.tab) {
      case "events":
        return this.state.events.map((row) => ({ kind: "event", row }));
      case "notes":
        if (this.state.search) {
          const byId = new Map(this.state.notes.map((note) => [note.id, note]));
          return this.state.search.results.flatMap((result) => {
            const note = byId.get(result.id);
            return note ? [{ kind: "note" as const, note }] : [];
          });
        }
        return this.state.notes.map((note) => ({ kind: "note", note }));
      case "todos":
        return this.state.todos.map((todo) => ({ kind: "todo", todo }));
    }
  }

  async refresh(): Promise<Notice[]> {
    const notices: Notice[] = [];
    const { notes, todos } = await this.notes.snapshot();
    const byPath = new Map(notes.map((note) => [note.filePath, note]));
    const byEventId = new Map<string, NoteSummary[]>();
    for (const note of notes) {
      const eventId = note.kind === "event" ? note.frontmatter.event?.id : undefined;
      if (eventId === undefined) continue;
      byEventId.set(eventId, [...(byEventId.get(eventId) ?? []), note]);
    }

    let events: CalendarEvent[] = [];
    try {
      events = await this.calendar.getEvents(this.state.range);
      this.state.calendar = { state: "ready" };
    } catch (err) {
      if (!(err instanceof AccessDeniedError || err instanceof ParseError)) throw err;
      this.state.calendar = { state: "unavailable", message: err.message };
      this.logger.warn(err.message);
      notices.push(warn(err.message));
    }

    const rows: EventRow[] = [];
    for (const event of events) {
      const note = byPath.get(this.notes.resolver.eventNotePath(event));
      // An unreadable file is missing from the snapshot but still occupies the path.
      const hasNote = note !== undefined || this.notes.noteExistsForEvent(event);
      const stale = hasNote ? [] : (byEventId.get(event.id) ?? []);
      rows.push({
        event,
        note,
        hasNote,
        stale,
        tags: (note?.frontmatter.tags ?? []).slice(0, TAG_PREVIEW),
      });
    }

    this.state.events = sortEntries(
      rows.map((row) => ({ type: "event" as const, ...row })),
      this.state.sort
    ).map(({ type: _type, ...row }) => row);
    this.state.notes = sortEntries(
      notes.map((note) => ({ type: "note" as const, note })),
      this.state.sort
    ).map((entry) => entry.note);
    this.state.todos = todos;
    return notices;
  }

  private target(position: number): SessionRow | null {
    return this.rows()[position - 1] ?? null;
  }

  private async edit(filePath: string): Promise<Notice[]> {
    const launched = await this.editor.open(filePath);
    const notices = launched.ok ? [] : [error(launched.message)];
    return [...notices, ...(await this.refresh())];
  }

  private failure(err: unknown): Notice[] {
    if (err instanceof CalnotesError) {
      this.logger.error(err.message);
      return [error(err.message)];
    }
    throw err;
  }

  async open(position: number): Promise<Notice[]> {
    const target = this.target(position);
    if (!target) {
      return [warn(`No row ${position}`)];
    }

    try {
      switch (target.kind) {
        case "event": {
          const { note, created } = await this.notes.createOrGetNote(target.row.event);
          const notices = created ? [info(`Created ${note.id}`)] : [];
          return [...notices, ...(await this.edit(note.filePath))];
        }
        case "note":
          return await this.edit(target.note.filePath);
        case "todo":
          return await this.edit(target.todo.filePath);
      }
    } catch (err) {
      return this.failure(err);
    }
  }

  async newNote(title: string, tags: string[] = []): Promise<Notice[]> {
    if (!title.trim()) {
      return [warn("A note needs a title")];
    }
    try {
      const { note, created } = await this.notes.createOrGetNote({ title, tags });
      const notices = [info(created ? `Created ${note.id}` : `Opened existing ${note.id}`)];
      return [...notices, ...(await this.edit(note.filePath))];
    } catch (err) {
      return this.failure(err);
    }
  }

  /** Rebuilds the index from the store and shows the results on the notes tab. */
  async search(query: string): Promise<Notice[]> {
    if (query.trim().length < MIN_QUERY_LENGTH) {
      this.state.search = null;
      return [warn(`Search needs at least ${MIN_QUERY_LENGTH} characters`)];
    }

    const notes = await this.notes.getAllNotes();
    const index = SearchIndex.build(notes, this.searchConfig);
    const results = index.search(query);
    this.state.notes = sortEntries(
      notes.map(({ content: _content, ...note }) => ({ type: "note" as const, note })),
      this.state.sort
    ).map((entry) => entry.note);
    this.state.search = { query: query.trim(), results };
    this.state.tab = "notes";

    return [info(results.length === 0 ? `No notes match "${query.trim()}"` : `${results.length} result(s)`)];
  }

  clearSearch(): void {
    this.state.search = null;
  }

  /** The note a delete of this row would remove, if any. */
  deletionTarget(position: number): NoteSummary | null {
    const target = this.target(position);
    if (!target) return null;
    if (target.kind === "event") return target.row.note ?? null;
    if (target.kind === "note") return target.note;
    return null;
  }

  async delete(position: number, confirm: (note: NoteSummary) => Promise<boolean>): Promise<Notice[]> {
    const note = this.deletionTarget(position);
    if (!note) {
      return [warn(`No note in row ${position}`)];
    }
    if (!(await confirm(note))) {
      return [info("Delete cancelled")];
    }

    try {
      const removed = await this.notes.deleteNote(note.filePath);
      if (this.state.search) {
        this.state.search.results = this.state.search.results.filter((result) => result.id !== note.id);
      }
      const notices = [info(removed ? `Deleted ${note.id}` : `${note.id} was already gone`)];
      return [...notices, ...(await this.refresh())];
    } catch (err) {
      return this.failure(err);
    }
  }

  async setSort(key: SortKey): Promise<Notice[]> {
    this.state.sort = key;
    const notices = await this.refresh();
    return [info(`Sorted by ${SORT_LABELS[key]}`), ...notices];
  }

  private async moveTo(date: Date, mode: ViewMode = this.state.mode): Promise<Notice[]> {
    this.state.date = startOfDay(date);
    this.state.mode = mode;
    this.state.range = mode === "day" ? dayRange(this.state.date) : weekRange(this.state.date);
    return this.refresh();
  }

  toggleView(): Promise<Notice[]> {
    return this.moveTo(this.state.date, this.state.mode === "day" ? "week" : "day");
  }

  today(): Promise<Notice[]> {
    return this.moveTo(new Date());
  }

  shiftDays(days: number): Promise<Notice[]> {
    return this.moveTo(addDays(this.state.date, days));
  }

  gotoDate(date: Date): Promise<Notice[]> {
    return this.moveTo(date);
  }

  /** Without an argument, cycles events → notes → todos. */
  switchTab(tab?: Tab): void {
    this.state.tab = tab ?? TABS[(TABS.indexOf(this.state.tab) + 1) % TABS.length];
    this.state.search = null;
    this.state.showHelp = false;
  }

  toggleHelp(): void {
    this.state.showHelp = !this.state.showHelp;
  }

  async completeTodo(position: number): Promise<Notice[]> {
    const todo = this.state.todos[position - 1];
    if (!todo) {
      return [warn(`No todo ${position}`)];
    }

    try {
      const done = await this.notes.completeTodo(todo);
      const notices = done
        ? [info(`Completed: ${todo.content || todo.fullLine.trim()}`)]
        : [warn("The note changed since it was listed; refresh and try again")];
      return [...notices, ...(await this.refresh())];
    } catch (err) {
      return this.failure(err);
    }
  }
}
