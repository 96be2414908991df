import { readFileSync, existsSync, readdirSync, statSync, unlinkSync } from "fs";
import { basename, join } from "path";
import { Config, getNotesDirectory } from "../config/index.js";
import { NotFoundError, ParseError, WriteFailure, describeError, hasErrorCode } from "../errors.js";
import { CalendarEvent } from "../events/event.js";
import { AgendaSource, noAgenda } from "../agenda/enricher.js";
import { Logger, silentLogger } from "../logging/logger.js";
import { writeFileAtomic } from "./atomic.js";
import { parseNoteFile, serializeNote } from "./frontmatter.js";
import { NotePathResolver } from "./paths.js";
import { eventNoteBody, standaloneNoteBody } from "./template.js";
import {
  CreateResult,
  EventRef,
  Note,
  NoteFrontmatter,
  NoteKind,
  NoteSummary,
  StandaloneRequest,
  TodoItem,
} from "./types.js";

const TODO_MARKER = "#todo";

export interface NoteManagerOptions {
  agenda?: AgendaSource;
  logger?: Logger;
}

export function isCalendarEvent(target: CalendarEvent | StandaloneRequest): target is CalendarEvent {
  return "start" in target && "id" in target;
}

export function snapshotEvent(event: CalendarEvent): EventRef {
  return {
    id: event.id,
    title: event.title,
    date: event.start.toISOString(),
    calendar: event.calendarName,
    location: event.location,
    allDay: event.allDay,
  };
}

export function normalizeTags(tags: string[] | undefined): string[] {
  const seen = new Set<string>();
  for (const tag of tags ?? []) {
    const trimmed = tag.trim().replace(/^#/, "");
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

interface StoredFile {
  note: Note;
  raw: string;
}

export interface StoreSnapshot {
  notes: NoteSummary[];
  todos: TodoItem[];
}

function findTodos(note: Note, raw: string): TodoItem[] {
  const todos: TodoItem[] = [];
  raw.split("\n").forEach((line, index) => {
    const at = line.toLowerCase().indexOf(TODO_MARKER);
    if (at === -1) return;

    let content = line.slice(at + TODO_MARKER.length).trim();
    if (content.startsWith(":")) {
      content = content.slice(1).trim();
    }
    todos.push({
      filePath: note.filePath,
      lineNumber: index + 1,
      content,
      fullLine: line.replace(/\r$/, ""),
      noteTitle: note.frontmatter.title,
    });
  });
  return todos;
}

/**
 * Sets `updated:` inside a well-formed header block, leaving every other header line
 * as written. Files without a header, or with one that does not parse, are left alone.
 */
function touchUpdated(lines: string[], now: string): void {
  if (lines[0]?.trim() !== "---") return;
  const close = lines.findIndex((line, index) => index > 0 && line.trim() === "---");
  if (close === -1) return;

  try {
    if (!parseNoteFile(lines.join("\n")).header) return;
  } catch (error) {
    if (error instanceof ParseError) return;
    throw error;
  }

  const stamp = `updated: '${now}'`;
  const at = lines.findIndex((line, index) => index > 0 && index < close && /^updated\s*:/.test(line));
  if (at === -1) {
    lines.splice(close, 0, stamp);
  } else {
    lines[at] = lines[at].endsWith("\r") ? `${stamp}\r` : stamp;
  }
}

function summarize(note: Note): NoteSummary {
  const { content: _content, ...summary } = note;
  return summary;
}

function compareByUpdated(a: NoteSummary, b: NoteSummary): number {
  const byUpdated = Date.parse(b.frontmatter.updated) - Date.parse(a.frontmatter.updated);
  if (byUpdated !== 0 && !Number.isNaN(byUpdated)) return byUpdated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Filesystem-backed note store. Every note is one markdown file whose derived path
 * is its key; there is no index or cache beside the files.
 */
export class NoteManager {
  private paths: NotePathResolver;
  private agenda: AgendaSource;
  private logger: Logger;

  constructor(config: Pick<Config, "notesDirectory">, options: NoteManagerOptions = {}) {
    this.paths = new NotePathResolver(getNotesDirectory(config));
    this.agenda = options.agenda ?? noAgenda;
    this.logger = options.logger ?? silentLogger;
  }

  get notesDirectory(): string {
    return this.paths.root;
  }

  get resolver(): NotePathResolver {
    return this.paths;
  }

  private fileTimes(filePath: string): { created: string; updated: string } {
    const stats = statSync(filePath);
    const born = stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
    return { created: born.toISOString(), updated: stats.mtime.toISOString() };
  }

  private buildNote(filePath: string, raw: string): Note {
    const id = this.paths.noteId(filePath);
    const stem = basename(filePath, ".md");

    let parsed: ReturnType<typeof parseNoteFile> | null = null;
    let headerError: string | undefined;
    try {
      parsed = parseNoteFile(raw);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      headerError = error.message;
      this.logger.warn(`${id}: ${error.message}; reading it as plain text`);
    }

    const header = parsed?.header ?? null;
    const times =
      header?.created && header.updated
        ? { created: header.created, updated: header.updated }
        : this.fileTimes(filePath);

    const frontmatter: NoteFrontmatter = {
      title: header?.title || stem,
      created: header?.created ?? times.created,
      updated: header?.updated ?? times.updated,
      tags: normalizeTags(header?.tags),
    };
    if (header?.event) {
      frontmatter.event = header.event;
    }
    if (header && Object.keys(header.extra).length > 0) {
      frontmatter.extra = header.extra;
    }

    const note: Note = {
      id,
      kind: this.paths.kindOf(filePath) ?? (frontmatter.event ? "event" : "standalone"),
      filePath,
      frontmatter,
      content: parsed ? parsed.content : raw,
    };
    if (headerError) {
      note.headerError = headerError;
    }
    return note;
  }

  private readRaw(filePath: string): string {
    try {
      return readFileSync(filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT", "ENOTDIR")) {
        throw new NotFoundError(filePath);
      }
      throw error;
    }
  }

  private readNote(filePath: string): Note {
    return this.buildNote(filePath, this.readRaw(filePath));
  }

  private noteFiles(kind: NoteKind): string[] {
    const dir = this.paths.partitionDir(kind);
    let names: string[];
    try {
      names = readdirSync(dir);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }
    return names
      .filter((name) => name.endsWith(".md") && !name.startsWith("."))
      .sort()
      .map((name) => join(dir, name));
  }

  /** Reads each file once; the raw text is kept for line-based scans. */
  private readEntries(kind?: NoteKind): StoredFile[] {
    const kinds: NoteKind[] = kind ? [kind] : ["event", "standalone"];
    const entries: StoredFile[] = [];

    for (const partition of kinds) {
      for (const filePath of this.noteFiles(partition)) {
        try {
          const raw = this.readRaw(filePath);
          entries.push({ note: this.buildNote(filePath, raw), raw });
        } catch (error) {
          this.logger.warn(`Skipping ${this.paths.noteId(filePath)}: ${describeError(error)}`);
        }
      }
    }

    return entries.sort((a, b) => compareByUpdated(a.note, b.note));
  }

  private readAll(kind?: NoteKind): Note[] {
    return this.readEntries(kind).map((entry) => entry.note);
  }

  /** Note metadata for list views, newest `updated` first. Unreadable files are skipped. */
  async listNotes(kind?: NoteKind): Promise<NoteSummary[]> {
    return this.readAll(kind).map(summarize);
  }

  /** Summaries and todos from a single pass over the store. */
  async snapshot(): Promise<StoreSnapshot> {
    const entries = this.readEntries();
    return {
      notes: entries.map((entry) => summarize(entry.note)),
      todos: entries.flatMap((entry) => findTodos(entry.note, entry.raw)),
    };
  }

  /** Notes with bodies, for building a search index. */
  async getAllNotes(kind?: NoteKind): Promise<Note[]> {
    return this.readAll(kind);
  }

  async loadNote(filePath: string): Promise<Note> {
    return this.readNote(filePath);
  }

  noteExistsForEvent(event: CalendarEvent): boolean {
    return existsSync(this.paths.eventNotePath(event));
  }

  async getNoteForEvent(event: CalendarEvent): Promise<Note | null> {
    const filePath = this.paths.eventNotePath(event);
    if (!existsSync(filePath)) {
      return null;
    }
    return this.readNote(filePath);
  }

  /** Event notes whose snapshot carries this event id, wherever their path points. */
  async findNotesForEventId(eventId: string): Promise<NoteSummary[]> {
    const notes = await this.listNotes("event");
    return notes.filter((note) => note.frontmatter.event?.id === eventId);
  }

  /**
   * Opens the note at the event's (or request's) derived path, creating it when absent.
   * A second call for the same event returns the same file with `created: false`.
   */
  async createOrGetNote(target: CalendarEvent | StandaloneRequest): Promise<CreateResult> {
    if (isCalendarEvent(target)) {
      return this.createOrGetEventNote(target);
    }
    return this.createStandaloneNote(target);
  }

  private async createOrGetEventNote(event: CalendarEvent): Promise<CreateResult> {
    const filePath = this.paths.eventNotePath(event);
    if (existsSync(filePath)) {
      return { note: this.readNote(filePath), created: false };
    }

    const enrichment = await this.agenda.enrich(event.description);
    if (existsSync(filePath)) {
      return { note: this.readNote(filePath), created: false };
    }

    const now = new Date().toISOString();
    const frontmatter: NoteFrontmatter = {
      title: event.title,
      created: now,
      updated: now,
      tags: [],
      event: snapshotEvent(event),
    };
    const content = eventNoteBody(event, enrichment.status === "ok" ? enrichment.markdown : undefined);

    writeFileAtomic(filePath, serializeNote(frontmatter, content));
    this.logger.info(`Created event note ${this.paths.noteId(filePath)}`);
    return { note: this.readNote(filePath), created: true };
  }

  private async createStandaloneNote(request: StandaloneRequest): Promise<CreateResult> {
    const title = request.title.trim();
    if (!title) {
      throw new Error("A standalone note needs a title");
    }

    const createdAt = new Date();
    const filePath = this.paths.standaloneNotePath(title, createdAt);
    if (existsSync(filePath)) {
      return { note: this.readNote(filePath), created: false };
    }

    const now = createdAt.toISOString();
    const frontmatter: NoteFrontmatter = {
      title,
      created: now,
      updated: now,
      tags: normalizeTags(request.tags),
    };

    writeFileAtomic(filePath, serializeNote(frontmatter, standaloneNoteBody(title)));
    this.logger.info(`Created standalone note ${this.paths.noteId(filePath)}`);
    return { note: this.readNote(filePath), created: true };
  }

  /** Rewrites header and body atomically with a fresh `updated`. */
  async saveNote(note: Note): Promise<Note> {
    const frontmatter: NoteFrontmatter = {
      ...note.frontmatter,
      tags: normalizeTags(note.frontmatter.tags),
      updated: new Date().toISOString(),
    };

    writeFileAtomic(note.filePath, serializeNote(frontmatter, note.content));
    this.logger.info(`Saved ${note.id}`);
    return this.readNote(note.filePath);
  }

  /** Removes the file. Returns false when it was already gone. */
  async deleteNote(filePath: string): Promise<boolean> {
    try {
      unlinkSync(filePath);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        this.logger.debug(`Delete of ${this.paths.noteId(filePath)} skipped: already absent`);
        return false;
      }
      throw new WriteFailure(filePath, error);
    }
    this.logger.info(`Deleted ${this.paths.noteId(filePath)}`);
    return true;
  }

  resolveNotePath(input: string): string {
    return this.paths.resolveNotePath(input, existsSync);
  }

  /** Every line containing `#todo` (any case) across both partitions. */
  async getTodos(): Promise<TodoItem[]> {
    return this.readEntries().flatMap((entry) => findTodos(entry.note, entry.raw));
  }

  /**
   * Removes the todo's line if the file still has it at the same position.
   * Returns false when the file changed underneath.
   */
  async completeTodo(todo: TodoItem): Promise<boolean> {
    let raw: string;
    try {
      raw = readFileSync(todo.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return false;
      throw error;
    }

    const lines = raw.split("\n");
    const current = lines[todo.lineNumber - 1];
    if (current === undefined || current.trim() !== todo.fullLine.trim()) {
      return false;
    }
    lines.splice(todo.lineNumber - 1, 1);
    touchUpdated(lines, new Date().toISOString());

    writeFileAtomic(todo.filePath, lines.join("\n"));
    this.logger.info(`Completed todo in ${this.paths.noteId(todo.filePath)}: ${todo.content}`);
    return true;
  }
}
