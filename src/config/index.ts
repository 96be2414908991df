import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { Config, ConfigSchema, DEFAULT_CONFIG, EditorConfig } from "./schema.js";

const CONFIG_FILENAME = ".calnotes.json";
const LOG_FILENAME = ".calnotes.log";
const DEFAULT_EDITOR = "nvim";

export const EVENT_PARTITION = "events";
export const STANDALONE_PARTITION = "standalone";

/** Config after environment fallbacks are applied; the only shape the core accepts. */
export interface ResolvedConfig extends Config {
  editor: EditorConfig & { command: string };
}

export type Environment = Record<string, string | undefined>;

export function getConfigPath(env: Environment = process.env): string {
  if (env.CALNOTES_CONFIG) {
    return expandPath(env.CALNOTES_CONFIG);
  }
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(configPath: string = getConfigPath()): boolean {
  return existsSync(configPath);
}

export function loadConfig(configPath: string = getConfigPath()): Config {
  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
}

export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  const validated = ConfigSchema.parse(config);
  writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
}

/**
 * Fills the settings the config file leaves open from the process environment.
 * This is the one place environment variables are read.
 */
export function resolveEnvironment(config: Config, env: Environment = process.env): ResolvedConfig {
  return {
    ...config,
    editor: {
      ...config.editor,
      command: config.editor.command || env.EDITOR || DEFAULT_EDITOR,
    },
    agenda: {
      ...config.agenda,
      apiKey: config.agenda.apiKey || env.INDICO_API_KEY || undefined,
    },
  };
}

export function getNotesDirectory(config: Pick<Config, "notesDirectory">): string {
  return expandPath(config.notesDirectory);
}

export function getLogFilePath(config: Config): string {
  if (config.logging.file) {
    return expandPath(config.logging.file);
  }
  return join(getNotesDirectory(config), LOG_FILENAME);
}

export function ensureDirectories(config: Config): void {
  const notesDir = getNotesDirectory(config);

  for (const dir of [join(notesDir, EVENT_PARTITION), join(notesDir, STANDALONE_PARTITION)]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

export * from "./schema.js";
