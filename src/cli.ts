#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import prompts from "prompts";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { z } from "zod";
import {
  SORT_KEYS,
  SortKey,
  SortKeySchema,
  configExists,
  expandPath,
  getConfigPath,
  getLogFilePath,
  getNotesDirectory,
} from "./config/index.js";
import { App, createApp } from "./app.js";
import { describeError } from "./errors.js";
import { CalendarEvent, dayRange, formatEventDate, formatEventTime, parseLocalDate, weekRange } from "./events/event.js";
import { SearchIndex } from "./notes/search.js";
import { SORT_LABELS, sortEntries } from "./notes/sort.js";
import { NoteKind } from "./notes/types.js";
import { runInteractiveSession } from "./session/interactive.js";
import { runInteractiveSetup } from "./setup/interactive.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")));

const program = new Command();

program
  .name("calnotes")
  .description("Markdown notes linked to your calendar events")
  .version(packageJson.version)
  .option("-c, --config <path>", "Config file (default: $CALNOTES_CONFIG or ~/.calnotes.json)");

function configPath(): string {
  const { config } = program.opts<{ config?: string }>();
  return config ? expandPath(config) : getConfigPath();
}

function app(): App {
  return createApp({ configPath: configPath() });
}

function fail(error: unknown): never {
  console.error(chalk.red(describeError(error)));
  process.exit(1);
}

function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      fail(error);
    }
  };
}

function parseDateOption(value: string): Date {
  const date = parseLocalDate(value);
  if (!date) {
    throw new InvalidArgumentError("Expected YYYY-MM-DD.");
  }
  return date;
}

function parseSortOption(value: string): SortKey {
  const key = SortKeySchema.safeParse(value);
  if (!key.success) {
    throw new InvalidArgumentError(`Expected one of ${SORT_KEYS.join(", ")}.`);
  }
  return key.data;
}

function parseKindOption(value: string): NoteKind {
  if (value !== "event" && value !== "standalone") {
    throw new InvalidArgumentError("Expected event or standalone.");
  }
  return value;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }
  return count;
}

interface RangeOptions {
  date?: Date;
  week?: boolean;
}

async function eventsFor(instance: App, options: RangeOptions): Promise<CalendarEvent[]> {
  const date = options.date ?? new Date();
  return instance.calendar.getEvents(options.week ? weekRange(date) : dayRange(date));
}

// Default: interactive session
program.action(
  run(async () => {
    if (!configExists(configPath())) {
      console.log(chalk.dim(`No config at ${configPath()}; using defaults. Run 'calnotes init' to create one.\n`));
    }
    const instance = app();
    await runInteractiveSession(instance.createSession());
  })
);

program
  .command("init")
  .description("Create the config file and notes directories")
  .option("-f, --force", "Overwrite existing configuration")
  .action(
    run(async (options: { force?: boolean }) => {
      await runInteractiveSetup({ configPath: configPath(), force: options.force });
    })
  );

program
  .command("config")
  .description("Show the resolved configuration")
  .action(
    run(async () => {
      const { config } = app();
      console.log(chalk.bold("\nConfiguration:\n"));
      console.log(`Config file: ${configPath()}${configExists(configPath()) ? "" : chalk.dim(" (not found, defaults)")}`);
      console.log(`Notes directory: ${getNotesDirectory(config)}`);
      console.log(`Editor: ${[config.editor.command, ...config.editor.args].join(" ")}`);
      console.log(`Calendar feed: ${config.calendar.feedPath ?? chalk.dim("none")}`);
      console.log(`Calendars: ${config.calendar.calendars.join(", ") || "all"}`);
      console.log(
        `Agenda: ${config.agenda.enabled ? "enabled" : "disabled"} (timeout ${config.agenda.timeoutMs}ms, token ${config.agenda.apiKey ? "set" : "not set"})`
      );
      console.log(`Search: max ${config.search.maxResults} results, fuzzy ${config.search.fuzzy ? "on" : "off"}`);
      console.log(`View: ${config.view.mode}, sorted by ${SORT_LABELS[config.view.sort]}`);
      console.log(`Log file: ${getLogFilePath(config)} (${config.logging.level})`);
    })
  );

program
  .command("events")
  .description("List events for a day or week and whether they have notes")
  .option("-d, --date <date>", "Day to show (YYYY-MM-DD)", parseDateOption)
  .option("-w, --week", "Show the whole week")
  .action(
    run(async (options: RangeOptions) => {
      const instance = app();
      const events = await eventsFor(instance, options);

      if (events.length === 0) {
        console.log(chalk.yellow("No events."));
        return;
      }

      for (const event of events) {
        const marker = instance.notes.noteExistsForEvent(event) ? chalk.green("✎") : " ";
        console.log(
          `${marker} ${chalk.cyan(formatEventDate(event))} ${formatEventTime(event).padEnd(13)} ${chalk.bold(event.title)} ${chalk.dim(`[${event.calendarName}] ${event.id}`)}`
        );
      }
    })
  );

program
  .command("open <target>")
  .description("Open (creating if needed) the note for an event id, or open a note file")
  .option("-d, --date <date>", "Day to look the event up in (YYYY-MM-DD)", parseDateOption)
  .option("-w, --week", "Look the event up in the whole week")
  .action(
    run(async (target: string, options: RangeOptions) => {
      const instance = app();
      let filePath: string;

      if (target.endsWith(".md")) {
        filePath = (await instance.notes.loadNote(instance.notes.resolveNotePath(target))).filePath;
      } else {
        const events = await eventsFor(instance, options);
        const event = events.find((candidate) => candidate.id === target);
        if (!event) {
          fail(`No event with id ${target} in the selected ${options.week ? "week" : "day"}`);
        }
        const { note, created } = await instance.notes.createOrGetNote(event);
        console.log(created ? chalk.green(`Created ${note.filePath}`) : chalk.dim(note.filePath));
        filePath = note.filePath;
      }

      const launched = await instance.editor.open(filePath);
      if (!launched.ok) {
        fail(launched.message);
      }
    })
  );

program
  .command("new <title...>")
  .description("Create a standalone note")
  .option("--tags <tags>", "Comma-separated tags")
  .option("--no-edit", "Don't open the editor")
  .action(
    run(async (words: string[], options: { tags?: string; edit: boolean }) => {
      const instance = app();
      const { note, created } = await instance.notes.createOrGetNote({
        title: words.join(" "),
        tags: options.tags ? options.tags.split(",").map((t) => t.trim()) : undefined,
      });

      console.log(created ? chalk.green(`Created note: ${note.filePath}`) : chalk.yellow(`Already exists: ${note.filePath}`));
      if (options.edit) {
        const launched = await instance.editor.open(note.filePath);
        if (!launched.ok) {
          fail(launched.message);
        }
      }
    })
  );

program
  .command("list")
  .description("List notes")
  .option("-k, --kind <kind>", "event or standalone", parseKindOption)
  .option("-s, --sort <key>", `Sort key (${SORT_KEYS.join(", ")})`, parseSortOption)
  .action(
    run(async (options: { kind?: NoteKind; sort?: SortKey }) => {
      const instance = app();
      const notes = await instance.notes.listNotes(options.kind);

      if (notes.length === 0) {
        console.log(chalk.yellow("No notes."));
        return;
      }

      const sorted = sortEntries(
        notes.map((note) => ({ type: "note" as const, note })),
        options.sort ?? instance.config.view.sort
      );
      console.log(chalk.bold(`\nNotes (${notes.length}):\n`));
      for (const { note } of sorted) {
        const date = (note.frontmatter.event?.date || note.frontmatter.created).slice(0, 10);
        const tags = note.frontmatter.tags.length ? chalk.dim(` ${note.frontmatter.tags.map((t) => `#${t}`).join(" ")}`) : "";
        console.log(`${chalk.cyan(date)} - ${note.frontmatter.title}${tags} ${chalk.dim(`[${note.id}]`)}`);
      }
    })
  );

program
  .command("search <query>")
  .description("Search note titles and bodies")
  .option("-l, --limit <limit>", "Maximum results", parseCount)
  .action(
    run(async (query: string, options: { limit?: number }) => {
      const instance = app();
      const search = { ...instance.config.search, maxResults: options.limit ?? instance.config.search.maxResults };
      const index = SearchIndex.build(await instance.notes.getAllNotes(), search);
      const results = index.search(query);

      if (results.length === 0) {
        console.log(chalk.yellow("No results found."));
        return;
      }

      console.log(chalk.bold(`\nFound ${results.length} results:\n`));
      for (const result of results) {
        console.log(`${chalk.cyan(result.updated.slice(0, 10))} - ${chalk.bold(result.title)} ${chalk.dim(`(${result.match})`)}`);
        console.log(chalk.dim(`File: ${result.filePath}`));
        console.log(result.snippet);
        console.log();
      }
    })
  );

program
  .command("delete <path>")
  .description("Delete a note file")
  .option("-y, --yes", "Don't ask for confirmation")
  .action(
    run(async (path: string, options: { yes?: boolean }) => {
      const instance = app();
      const filePath = instance.notes.resolveNotePath(path);

      if (!options.yes) {
        const { confirmed } = await prompts({
          type: "confirm",
          name: "confirmed",
          message: `Delete ${instance.notes.resolver.noteId(filePath)}?`,
          initial: false,
        });
        if (confirmed !== true) {
          console.log(chalk.yellow("Cancelled."));
          return;
        }
      }

      const removed = await instance.notes.deleteNote(filePath);
      console.log(removed ? chalk.green(`Deleted ${filePath}`) : chalk.dim(`Nothing to delete at ${filePath}`));
    })
  );

program
  .command("todos")
  .description("List #todo lines across all notes")
  .action(
    run(async () => {
      const todos = await app().notes.getTodos();
      if (todos.length === 0) {
        console.log(chalk.yellow("No todos."));
        return;
      }
      todos.forEach((todo, index) => {
        console.log(`${chalk.dim(String(index + 1).padStart(3))} ${todo.content} ${chalk.dim(`(${todo.noteTitle})`)}`);
      });
    })
  );

program
  .command("todo-done <n>")
  .description("Complete the nth todo from 'calnotes todos'")
  .action(
    run(async (n: string) => {
      const position = parseCount(n);
      const instance = app();
      const todo = (await instance.notes.getTodos())[position - 1];
      if (!todo) {
        fail(`No todo ${position}`);
      }
      if (await instance.notes.completeTodo(todo)) {
        console.log(chalk.green(`Completed: ${todo.content}`));
      } else {
        fail("The note changed since the todo was listed; run 'calnotes todos' again");
      }
    })
  );

program.parseAsync().catch(fail);
