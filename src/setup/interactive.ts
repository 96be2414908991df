import prompts from "prompts";
import chalk from "chalk";
import {
  Config,
  ConfigSchema,
  DEFAULT_CONFIG,
  saveConfig,
  configExists,
  ensureDirectories,
  getNotesDirectory,
} from "../config/index.js";

export interface SetupOptions {
  configPath: string;
  force?: boolean;
}

export async function runInteractiveSetup(options: SetupOptions): Promise<Config | null> {
  const { configPath } = options;
  console.log(chalk.bold("\ncalnotes setup\n"));

  if (configExists(configPath) && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${configPath}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: "text",
        name: "notesDirectory",
        message: "Where should notes be stored?",
        initial: DEFAULT_CONFIG.notesDirectory,
        validate: (value: string) => (value.trim() ? true : "Directory path is required"),
      },
      {
        type: "text",
        name: "editor",
        message: "Editor command (leave empty to use $EDITOR, then nvim):",
        initial: "",
      },
      {
        type: "text",
        name: "feedPath",
        message: "Calendar export (JSON) to read events from (leave empty for none):",
        initial: "",
      },
      {
        type: "list",
        name: "calendars",
        message: "Calendars to show (comma-separated, empty for all):",
        initial: "",
        separator: ",",
      },
      {
        type: "confirm",
        name: "agendaEnabled",
        message: "Fetch Indico agendas for meetings that link one?",
        initial: DEFAULT_CONFIG.agenda.enabled,
      },
      {
        type: (prev: boolean) => (prev ? "password" : null),
        name: "apiKey",
        message: "Indico API token (leave empty to use $INDICO_API_KEY):",
        initial: "",
      },
      {
        type: "select",
        name: "mode",
        message: "Default view",
        choices: [
          { title: "Day", value: "day" },
          { title: "Week", value: "week" },
        ],
        initial: DEFAULT_CONFIG.view.mode === "day" ? 0 : 1,
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("\nSetup cancelled."));
    return null;
  }

  const text = (value: unknown): string | undefined =>
    typeof value === "string" && value.trim() ? value.trim() : undefined;
  const calendars = Array.isArray(responses.calendars)
    ? responses.calendars.filter((name): name is string => typeof name === "string" && name.trim() !== "")
    : [];

  const config = ConfigSchema.parse({
    ...DEFAULT_CONFIG,
    notesDirectory: text(responses.notesDirectory) ?? DEFAULT_CONFIG.notesDirectory,
    editor: { ...DEFAULT_CONFIG.editor, command: text(responses.editor) },
    calendar: { feedPath: text(responses.feedPath), calendars: calendars.map((name) => name.trim()) },
    agenda: {
      ...DEFAULT_CONFIG.agenda,
      enabled: responses.agendaEnabled !== false,
      apiKey: text(responses.apiKey),
    },
    view: { ...DEFAULT_CONFIG.view, mode: responses.mode === "week" ? "week" : "day" },
  });

  console.log(chalk.dim("\nCreating configuration..."));
  saveConfig(config, configPath);
  console.log(chalk.green(`✓ Created ${configPath}`));

  console.log(chalk.dim("Creating directories..."));
  ensureDirectories(config);
  console.log(chalk.green(`✓ Created ${getNotesDirectory(config)}`));

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Browse today's events:  ") + "calnotes");
  console.log(chalk.dim("  2. Or write a note:        ") + "calnotes new 'My first note'\n");

  return config;
}
