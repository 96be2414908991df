import { z } from "zod";

export const SORT_KEYS = [
  "date_desc",
  "date_asc",
  "title_asc",
  "title_desc",
  "updated_desc",
  "updated_asc",
] as const;

export const SortKeySchema = z.enum(SORT_KEYS);

export const EditorConfigSchema = z.object({
  command: z.string().min(1).optional(), // falls back to $EDITOR, then nvim
  args: z.array(z.string()).default([]),
});

export const CalendarConfigSchema = z.object({
  feedPath: z.string().optional(),
  calendars: z.array(z.string()).default([]), // empty = every calendar
});

export const AgendaConfigSchema = z.object({
  enabled: z.boolean().default(true),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().min(500).max(60_000).default(5000),
});

export const SearchConfigSchema = z.object({
  maxResults: z.number().int().min(1).max(500).default(20),
  fuzzy: z.boolean().default(true),
});

export const ViewConfigSchema = z.object({
  mode: z.enum(["day", "week"]).default("day"),
  sort: SortKeySchema.default("date_desc"),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  notesDirectory: z.string().default("~/notes"),
  editor: EditorConfigSchema.default({}),
  calendar: CalendarConfigSchema.default({}),
  agenda: AgendaConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  view: ViewConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type EditorConfig = z.infer<typeof EditorConfigSchema>;
export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;
export type AgendaConfig = z.infer<typeof AgendaConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type SortKey = z.infer<typeof SortKeySchema>;
export type ViewMode = ViewConfig["mode"];
export type LogLevel = LoggingConfig["level"];

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
