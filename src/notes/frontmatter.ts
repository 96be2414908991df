import matter from "gray-matter";
import { z } from "zod";
import { ParseError, describeError } from "../errors.js";
import { EventRef, NoteFrontmatter } from "./types.js";

// YAML turns unquoted ISO timestamps into Date objects; keep them as strings.
const timestamp = z
  .union([z.string(), z.date()])
  .transform((value) => (value instanceof Date ? value.toISOString() : value));

const scalarString = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const EventRefSchema = z.object({
  id: scalarString,
  title: scalarString.nullish(),
  date: timestamp.nullish(),
  calendar: scalarString.nullish(),
  location: scalarString.nullish(),
  all_day: z.boolean().nullish(),
});

const HeaderSchema = z
  .object({
    title: scalarString.nullish(),
    created: timestamp.nullish(),
    updated: timestamp.nullish(),
    tags: z
      .union([z.array(scalarString), scalarString.transform((tag) => [tag])])
      .nullish(),
    event: EventRefSchema.nullish(),
  })
  .passthrough();

const KNOWN_KEYS = new Set(["title", "created", "updated", "tags", "event"]);

/** Header fields as found on disk; absent ones are filled in by the store. */
export interface ParsedHeader {
  title?: string;
  created?: string;
  updated?: string;
  tags: string[];
  event?: EventRef;
  extra: Record<string, unknown>;
}

export interface ParsedNoteFile {
  header: ParsedHeader | null; // null when the file has no header block
  content: string;
}

/**
 * Splits a note file into header and body. Throws ParseError when a header block
 * is present but is not valid YAML or does not have the expected shape.
 */
export function parseNoteFile(raw: string): ParsedNoteFile {
  if (raw.trim() === "") {
    return { header: null, content: raw };
  }

  let file: matter.GrayMatterFile<string>;
  try {
    // Passing options bypasses gray-matter's per-string cache.
    file = matter(raw, {});
  } catch (error) {
    throw new ParseError(`Malformed note header: ${describeError(error)}`, { cause: error });
  }

  if (file.matter.trim() === "") {
    return { header: null, content: file.content };
  }

  const result = HeaderSchema.safeParse(file.data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ParseError(`Malformed note header: ${where}${issue?.message ?? "invalid header"}`, {
      cause: result.error,
    });
  }

  const data = result.data;
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key) && value !== undefined) {
      extra[key] = value;
    }
  }

  const header: ParsedHeader = {
    tags: data.tags ?? [],
    extra,
  };
  if (data.title != null) header.title = data.title;
  if (data.created != null) header.created = data.created;
  if (data.updated != null) header.updated = data.updated;
  if (data.event) {
    header.event = {
      id: data.event.id,
      title: data.event.title ?? "",
      date: data.event.date ?? "",
      calendar: data.event.calendar ?? "",
      location: data.event.location ?? "",
      allDay: data.event.all_day ?? false,
    };
  }

  return { header, content: file.content };
}

export function serializeNote(frontmatter: NoteFrontmatter, content: string): string {
  const data: Record<string, unknown> = {
    title: frontmatter.title,
    created: frontmatter.created,
    updated: frontmatter.updated,
    tags: [...frontmatter.tags],
  };

  if (frontmatter.event) {
    data.event = {
      id: frontmatter.event.id,
      title: frontmatter.event.title,
      date: frontmatter.event.date,
      calendar: frontmatter.event.calendar,
      location: frontmatter.event.location,
      all_day: frontmatter.event.allDay,
    };
  }

  for (const [key, value] of Object.entries(frontmatter.extra ?? {})) {
    if (!KNOWN_KEYS.has(key) && value !== undefined) {
      data[key] = value;
    }
  }

  return matter.stringify(content, data);
}
