import {
  Environment,
  ResolvedConfig,
  ensureDirectories,
  expandPath,
  getConfigPath,
  getLogFilePath,
  loadConfig,
  resolveEnvironment,
} from "./config/index.js";
import { AgendaEnricher } from "./agenda/enricher.js";
import { FetchLike } from "./agenda/indico.js";
import { CalendarProvider, EmptyCalendarProvider, JsonFeedCalendarProvider } from "./calendar/provider.js";
import { EditorLauncher, SpawnLike } from "./editor/launcher.js";
import { Logger, createLogger } from "./logging/logger.js";
import { NoteManager } from "./notes/manager.js";
import { NotesSession } from "./session/session.js";

export interface App {
  configPath: string;
  config: ResolvedConfig;
  logger: Logger;
  calendar: CalendarProvider;
  notes: NoteManager;
  editor: EditorLauncher;
  createSession(date?: Date): NotesSession;
}

export interface AppOptions {
  configPath?: string;
  env?: Environment;
  fetch?: FetchLike;
  spawn?: SpawnLike;
  logger?: Logger;
}

/** Wires the store, calendar, agenda and editor from one resolved configuration. */
export function createApp(options: AppOptions = {}): App {
  const env = options.env ?? process.env;
  const configPath = options.configPath ? expandPath(options.configPath) : getConfigPath(env);
  const config = resolveEnvironment(loadConfig(configPath), env);

  const logger =
    options.logger ??
    createLogger({ level: config.logging.level, file: getLogFilePath(config), console: true });

  ensureDirectories(config);

  const calendar: CalendarProvider = config.calendar.feedPath
    ? new JsonFeedCalendarProvider(expandPath(config.calendar.feedPath), { calendars: config.calendar.calendars })
    : new EmptyCalendarProvider();
  const agenda = new AgendaEnricher(config.agenda, { fetch: options.fetch, logger });
  const notes = new NoteManager(config, { agenda, logger });
  const editor = new EditorLauncher(config.editor, { spawn: options.spawn, logger });

  return {
    configPath,
    config,
    logger,
    calendar,
    notes,
    editor,
    createSession: (date?: Date) =>
      new NotesSession({
        calendar,
        notes,
        editor,
        search: config.search,
        mode: config.view.mode,
        sort: config.view.sort,
        date,
        logger,
      }),
  };
}
