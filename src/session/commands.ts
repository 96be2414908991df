import { SORT_KEYS, SortKey, SortKeySchema } from "../config/index.js";
import { parseLocalDate } from "../events/event.js";

export const TABS = ["events", "notes", "todos"] as const;
export type Tab = (typeof TABS)[number];

export type Command =
  | { type: "open"; position: number }
  | { type: "new"; title?: string }
  | { type: "search"; query?: string }
  | { type: "delete"; position: number }
  | { type: "sort"; key?: SortKey }
  | { type: "toggle-view" }
  | { type: "refresh" }
  | { type: "today" }
  | { type: "prev-day" }
  | { type: "next-day" }
  | { type: "prev-week" }
  | { type: "next-week" }
  | { type: "goto"; date?: Date }
  | { type: "tab"; tab?: Tab }
  | { type: "complete-todo"; position: number }
  | { type: "help" }
  | { type: "quit" }
  | { type: "empty" }
  | { type: "unknown"; input: string; hint: string };

const SIMPLE = new Map<string, Command>([
  ["v", { type: "toggle-view" }],
  ["r", { type: "refresh" }],
  ["t", { type: "today" }],
  ["<", { type: "prev-day" }],
  [">", { type: "next-day" }],
  ["b", { type: "prev-week" }],
  ["w", { type: "next-week" }],
  ["?", { type: "help" }],
  ["help", { type: "help" }],
  ["q", { type: "quit" }],
  ["quit", { type: "quit" }],
]);

function unknown(input: string, hint: string): Command {
  return { type: "unknown", input, hint };
}

function parsePosition(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const position = Number(value);
  return position >= 1 ? position : null;
}

function parseTab(value: string): Tab | null {
  const lower = value.toLowerCase();
  if (/^[1-3]$/.test(lower)) {
    return TABS[Number(lower) - 1];
  }
  return TABS.find((tab) => tab === lower) ?? null;
}

/** Maps one typed line to an intent. Row numbers are 1-based as displayed. */
export function parseCommand(line: string): Command {
  const input = line.trim();
  if (!input) {
    return { type: "empty" };
  }

  const bare = parsePosition(input);
  if (bare !== null) {
    return { type: "open", position: bare };
  }

  const space = input.search(/\s/);
  const name = space === -1 ? input : input.slice(0, space);
  const rest = space === -1 ? "" : input.slice(space + 1).trim();

  const simple = rest ? undefined : SIMPLE.get(name);
  if (simple) {
    return simple;
  }

  switch (name) {
    case "o":
    case "d":
    case "x": {
      const position = parsePosition(rest);
      if (position === null) {
        return unknown(input, `Usage: ${name} <number>`);
      }
      if (name === "o") return { type: "open", position };
      if (name === "d") return { type: "delete", position };
      return { type: "complete-todo", position };
    }
    case "n":
      return rest ? { type: "new", title: rest } : { type: "new" };
    case "s":
      return rest ? { type: "search", query: rest } : { type: "search" };
    case "S": {
      if (!rest) return { type: "sort" };
      const key = SortKeySchema.safeParse(rest);
      return key.success
        ? { type: "sort", key: key.data }
        : unknown(input, `Sort keys: ${SORT_KEYS.join(", ")}`);
    }
    case "g": {
      if (!rest) return { type: "goto" };
      const date = parseLocalDate(rest);
      return date ? { type: "goto", date } : unknown(input, "Usage: g YYYY-MM-DD");
    }
    case "tab": {
      if (!rest) return { type: "tab" };
      const tab = parseTab(rest);
      return tab ? { type: "tab", tab } : unknown(input, `Tabs: 1-3 or ${TABS.join(", ")}`);
    }
  }

  return unknown(input, "Type ? for the list of commands");
}

export const HELP_LINES: ReadonlyArray<[string, string]> = [
  ["<n>, o <n>", "Open or create the note for row n"],
  ["n <title>", "New standalone note"],
  ["s <query>", "Search notes (at least 2 characters)"],
  ["d <n>", "Delete the note in row n"],
  ["S [key]", "Change sort order"],
  ["v", "Toggle day/week view"],
  ["r", "Refresh"],
  ["t", "Jump to today"],
  ["< / >", "Previous/next day"],
  ["b / w", "Previous/next week"],
  ["g <date>", "Go to date (YYYY-MM-DD)"],
  ["tab [1-3]", "Switch tab: events, notes, todos"],
  ["x <n>", "Complete todo n"],
  ["?", "Help"],
  ["q", "Quit"],
];
