export type NoteKind = "event" | "standalone";

/** Snapshot of the event taken when the note was created; never refreshed. */
export interface EventRef {
  id: string;
  title: string;
  date: string; // ISO timestamp of the event start
  calendar: string;
  location: string;
  allDay: boolean;
}

export interface NoteFrontmatter {
  title: string;
  created: string; // ISO date string
  updated: string; // ISO date string
  tags: string[];
  event?: EventRef;
  extra?: Record<string, unknown>; // user-added header keys, written back unchanged
}

export interface Note {
  id: string; // Path relative to the notes directory, e.g. events/2024-01-15_0930_Standup.md
  kind: NoteKind;
  filePath: string;
  frontmatter: NoteFrontmatter;
  content: string;
  headerError?: string; // set when the header was unreadable and defaults were used
}

export type NoteSummary = Omit<Note, "content">;

export interface CreateResult {
  note: Note;
  created: boolean;
}

export interface StandaloneRequest {
  title: string;
  tags?: string[];
}

export interface TodoItem {
  filePath: string;
  lineNumber: number; // 1-based
  content: string; // text after #todo
  fullLine: string;
  noteTitle: string;
}
