import prompts from "prompts";
import chalk from "chalk";
import { SORT_KEYS, SortKey, SortKeySchema } from "../config/index.js";
import { parseLocalDate } from "../events/event.js";
import { SORT_LABELS } from "../notes/sort.js";
import { NoteSummary } from "../notes/types.js";
import { Command, parseCommand } from "./commands.js";
import { CalendarPalette, renderNotice, renderSession } from "./render.js";
import { Notice, NotesSession } from "./session.js";

/** The prompts the loop needs; tests replace them. */
export interface SessionPrompts {
  command(): Promise<string | null>;
  text(message: string): Promise<string | null>;
  confirmDelete(note: NoteSummary): Promise<boolean>;
  sortKey(current: SortKey): Promise<SortKey | null>;
}

export const terminalPrompts: SessionPrompts = {
  async command() {
    const { command } = await prompts({ type: "text", name: "command", message: ">" });
    return typeof command === "string" ? command : null;
  },

  async text(message) {
    const { value } = await prompts({ type: "text", name: "value", message });
    return typeof value === "string" ? value : null;
  },

  async confirmDelete(note) {
    const { confirmed } = await prompts({
      type: "confirm",
      name: "confirmed",
      message: `Delete "${note.frontmatter.title}" (${note.id})?`,
      initial: false,
    });
    return confirmed === true;
  },

  async sortKey(current) {
    const { key } = await prompts({
      type: "select",
      name: "key",
      message: "Sort by",
      choices: SORT_KEYS.map((value) => ({ title: SORT_LABELS[value], value })),
      initial: SORT_KEYS.indexOf(current),
    });
    const parsed = SortKeySchema.safeParse(key);
    return parsed.success ? parsed.data : null;
  },
};

/** Runs one intent. Returns null when the user asked to quit. */
export async function dispatch(
  session: NotesSession,
  command: Command,
  ask: SessionPrompts
): Promise<Notice[] | null> {
  switch (command.type) {
    case "quit":
      return null;
    case "empty":
      return [];
    case "unknown":
      return [{ level: "warn", message: `Unknown command "${command.input}". ${command.hint}` }];
    case "open":
      return session.open(command.position);
    case "new": {
      const title = command.title ?? (await ask.text("Note title"));
      return title ? session.newNote(title) : [];
    }
    case "search": {
      const query = command.query ?? (await ask.text("Search"));
      return query === null ? [] : session.search(query);
    }
    case "delete":
      return session.delete(command.position, (note) => ask.confirmDelete(note));
    case "sort": {
      const key = command.key ?? (await ask.sortKey(session.state.sort));
      return key ? session.setSort(key) : [];
    }
    case "toggle-view":
      return session.toggleView();
    case "refresh":
      session.clearSearch();
      return session.refresh();
    case "today":
      return session.today();
    case "prev-day":
      return session.shiftDays(-1);
    case "next-day":
      return session.shiftDays(1);
    case "prev-week":
      return session.shiftDays(-7);
    case "next-week":
      return session.shiftDays(7);
    case "goto": {
      let date = command.date ?? null;
      if (!date) {
        const answer = await ask.text("Go to date (YYYY-MM-DD)");
        if (answer === null) return [];
        date = parseLocalDate(answer);
        if (!date) return [{ level: "warn", message: `Not a date: ${answer}` }];
      }
      return session.gotoDate(date);
    }
    case "tab":
      session.switchTab(command.tab);
      return [];
    case "complete-todo":
      return session.completeTodo(command.position);
    case "help":
      session.toggleHelp();
      return [];
  }
}

export interface InteractiveOptions {
  prompts?: SessionPrompts;
  write?: (text: string) => void;
}

export async function runInteractiveSession(session: NotesSession, options: InteractiveOptions = {}): Promise<void> {
  const ask = options.prompts ?? terminalPrompts;
  const write = options.write ?? ((text: string) => console.log(text));
  const palette = new CalendarPalette();

  let notices = await session.refresh();

  for (;;) {
    write(renderSession(session.state, palette));
    if (notices.length > 0) {
      write("");
      notices.forEach((notice) => write(renderNotice(notice)));
    }
    write(chalk.dim("? for help, q to quit"));

    const line = await ask.command();
    if (line === null) {
      return;
    }
    const next = await dispatch(session, parseCommand(line), ask);
    if (next === null) {
      return;
    }
    notices = next;
  }
}
