import chalk, { ChalkInstance } from "chalk";
import {
  CalendarEvent,
  addDays,
  formatEventDate,
  formatEventTime,
  formatLocalDate,
} from "../events/event.js";
import { SORT_LABELS } from "../notes/sort.js";
import { HELP_LINES, TABS, Tab } from "./commands.js";
import { EventRow, Notice, SessionState } from "./session.js";

const TAB_LABELS: Record<Tab, string> = {
  events: "Calendar",
  notes: "Notes",
  todos: "Todos",
};

const CALENDAR_COLORS: ChalkInstance[] = [
  chalk.cyan,
  chalk.green,
  chalk.yellow,
  chalk.magenta,
  chalk.blue,
  chalk.red,
  chalk.cyanBright,
  chalk.greenBright,
  chalk.yellowBright,
  chalk.magentaBright,
];

/** Hands out colours in first-seen order so a calendar keeps its colour for the session. */
export class CalendarPalette {
  private assigned = new Map<string, ChalkInstance>();

  colorFor(calendarName: string): ChalkInstance {
    let color = this.assigned.get(calendarName);
    if (!color) {
      color = CALENDAR_COLORS[this.assigned.size % CALENDAR_COLORS.length];
      this.assigned.set(calendarName, color);
    }
    return color;
  }
}

export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  return chars.length > width ? chars.slice(0, width - 1).join("") + "…" : text;
}

function rangeLabel(state: SessionState): string {
  if (state.mode === "day") {
    return formatLocalDate(state.date);
  }
  return `${formatLocalDate(state.range.start)} → ${formatLocalDate(addDays(state.range.end, -1))}`;
}

function renderTabs(active: Tab): string {
  return TABS.map((tab, index) => {
    const label = `${index + 1} ${TAB_LABELS[tab]}`;
    return tab === active ? chalk.bold.inverse(` ${label} `) : chalk.dim(` ${label} `);
  }).join(" ");
}

function renderEventRow(row: EventRow, position: number, state: SessionState, palette: CalendarPalette): string {
  const event: CalendarEvent = row.event;
  const color = palette.colorFor(event.calendarName);
  const when = state.mode === "week" ? `${formatEventDate(event)} ${formatEventTime(event)}` : formatEventTime(event);
  const marker = row.hasNote ? chalk.green("✎") : row.stale.length > 0 ? chalk.yellow("!") : " ";

  let line = `${chalk.dim(String(position).padStart(3))} ${marker} ${when.padEnd(state.mode === "week" ? 24 : 13)} ${chalk.bold(truncate(event.title, 50))}`;
  line += ` ${color("●")} ${color(truncate(event.calendarName, 12))}`;
  if (row.tags.length > 0) {
    line += " " + chalk.cyan(row.tags.map((tag) => `#${tag}`).join(" "));
  }
  if (row.stale.length > 0) {
    line += chalk.yellow(`  (note under an older title: ${row.stale[0].id})`);
  }
  return line;
}

function renderEvents(state: SessionState, palette: CalendarPalette): string[] {
  if (state.calendar.state === "unavailable") {
    return [chalk.yellow(`Calendar unavailable: ${state.calendar.message}`), chalk.dim("Standalone notes still work (n <title>).")];
  }
  if (state.events.length === 0) {
    return [chalk.dim(state.mode === "day" ? "No events for this day." : "No events this week.")];
  }
  return state.events.map((row, index) => renderEventRow(row, index + 1, state, palette));
}

function renderNotes(state: SessionState): string[] {
  const lines: string[] = [];

  if (state.search) {
    lines.push(chalk.bold(`Search: "${state.search.query}" (${state.search.results.length})`));
    if (state.search.results.length === 0) {
      lines.push(chalk.dim("No matches."));
    }
    state.search.results.forEach((result, index) => {
      lines.push(
        `${chalk.dim(String(index + 1).padStart(3))} ${chalk.bold(truncate(result.title, 60))} ${chalk.dim(`[${result.kind}]`)}`
      );
      if (result.snippet) {
        lines.push(`      ${chalk.dim(truncate(result.snippet, 100))}`);
      }
    });
    return lines;
  }

  if (state.notes.length === 0) {
    return [chalk.dim("No notes yet. n <title> creates one.")];
  }
  state.notes.forEach((note, index) => {
    const date = (note.frontmatter.event?.date || note.frontmatter.created).slice(0, 10);
    const kind = note.kind === "event" ? chalk.blue("event") : chalk.magenta("note ");
    let line = `${chalk.dim(String(index + 1).padStart(3))} ${kind} ${chalk.cyan(date)} ${truncate(note.frontmatter.title, 60)}`;
    if (note.frontmatter.tags.length > 0) {
      line += " " + chalk.dim(note.frontmatter.tags.map((tag) => `#${tag}`).join(" "));
    }
    if (note.headerError) {
      line += chalk.yellow(" (header unreadable)");
    }
    lines.push(line);
  });
  return lines;
}

function renderTodos(state: SessionState): string[] {
  if (state.todos.length === 0) {
    return [chalk.dim("No #todo lines in any note.")];
  }
  return state.todos.map(
    (todo, index) =>
      `${chalk.dim(String(index + 1).padStart(3))} ☐ ${todo.content || chalk.dim("(empty)")} ${chalk.dim(`· ${todo.noteTitle}`)}`
  );
}

export function renderHelp(): string {
  const width = Math.max(...HELP_LINES.map(([keys]) => keys.length));
  return [chalk.bold("Commands"), ...HELP_LINES.map(([keys, text]) => `  ${chalk.cyan(keys.padEnd(width))}  ${text}`)].join(
    "\n"
  );
}

export function renderNotice(notice: Notice): string {
  switch (notice.level) {
    case "error":
      return chalk.red(notice.message);
    case "warn":
      return chalk.yellow(notice.message);
    case "info":
      return chalk.green(notice.message);
  }
}

export function renderSession(state: SessionState, palette: CalendarPalette = new CalendarPalette()): string {
  const header = `${chalk.bold("calnotes")}  ${rangeLabel(state)}  ${chalk.dim(`[${state.mode === "day" ? "Day" : "Week"}]`)}  ${chalk.dim(`Sort: ${SORT_LABELS[state.sort]}`)}`;
  const lines = [header, renderTabs(state.tab), ""];

  if (state.showHelp) {
    lines.push(renderHelp());
    return lines.join("\n");
  }

  switch (state.tab) {
    case "events":
      lines.push(...renderEvents(state, palette));
      break;
    case "notes":
      lines.push(...renderNotes(state));
      break;
    case "todos":
      lines.push(...renderTodos(state));
      break;
  }
  return lines.join("\n");
}
