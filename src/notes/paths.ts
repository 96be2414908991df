import { basename, isAbsolute, join, relative, resolve, sep } from "path";
import { EVENT_PARTITION, STANDALONE_PARTITION } from "../config/index.js";
import { CalendarEvent, formatLocalDate } from "../events/event.js";
import { NoteKind } from "./types.js";

const MAX_TITLE_LENGTH = 100;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Filename-safe form of a title. Must stay byte-compatible with existing stores:
 * drop anything but letters, digits, `_`, `-` and whitespace, turn whitespace runs
 * into one `_`, keep the first 100 code points.
 */
export function sanitizeTitle(title: string): string {
  const safe = title.replace(/[^\p{L}\p{N}_\s-]/gu, "").replace(/\s+/gu, "_");
  return Array.from(safe).slice(0, MAX_TITLE_LENGTH).join("");
}

export function eventFilename(event: CalendarEvent): string {
  const date = formatLocalDate(event.start);
  const time = event.allDay
    ? "allday"
    : `${pad(event.start.getHours())}${pad(event.start.getMinutes())}`;
  return `${date}_${time}_${sanitizeTitle(event.title)}.md`;
}

export function standaloneFilename(title: string, createdAt: Date): string {
  const date = formatLocalDate(createdAt);
  const time = `${pad(createdAt.getHours())}${pad(createdAt.getMinutes())}${pad(createdAt.getSeconds())}`;
  return `${date}_${time}_${sanitizeTitle(title)}.md`;
}

/** Maps note identity to paths; the derived path is the note's key within its partition. */
export class NotePathResolver {
  private readonly notesDir: string;

  constructor(notesDir: string) {
    this.notesDir = resolve(notesDir);
  }

  get root(): string {
    return this.notesDir;
  }

  partitionDir(kind: NoteKind): string {
    return join(this.notesDir, kind === "event" ? EVENT_PARTITION : STANDALONE_PARTITION);
  }

  eventNotePath(event: CalendarEvent): string {
    return join(this.partitionDir("event"), eventFilename(event));
  }

  standaloneNotePath(title: string, createdAt: Date): string {
    return join(this.partitionDir("standalone"), standaloneFilename(title, createdAt));
  }

  noteId(filePath: string): string {
    return relative(this.notesDir, filePath).split(sep).join("/");
  }

  /** Partition a path belongs to, or null when it lies outside both. */
  kindOf(filePath: string): NoteKind | null {
    const resolved = resolve(filePath);
    for (const kind of ["event", "standalone"] as const) {
      const dir = this.partitionDir(kind);
      if (resolved.startsWith(dir + sep) && !resolved.slice(dir.length + 1).includes(sep)) {
        return kind;
      }
    }
    return null;
  }

  /**
   * Resolves user input (absolute path, path relative to the notes directory, or a
   * bare filename found in either partition) to a note path inside the store.
   */
  resolveNotePath(input: string, exists: (path: string) => boolean): string {
    const trimmed = input.trim();
    if (!trimmed.endsWith(".md")) {
      throw new Error(`Not a note file: ${input}`);
    }

    const candidates = isAbsolute(trimmed)
      ? [resolve(trimmed)]
      : trimmed.includes("/") || trimmed.includes(sep)
        ? [resolve(this.notesDir, trimmed), resolve(trimmed)]
        : [
            join(this.partitionDir("event"), basename(trimmed)),
            join(this.partitionDir("standalone"), basename(trimmed)),
          ];

    const inside = candidates.filter((candidate) => this.kindOf(candidate) !== null);
    if (inside.length === 0) {
      throw new Error(`Path is outside the notes directory: ${input}`);
    }
    return inside.find((candidate) => exists(candidate)) ?? inside[0];
  }
}
