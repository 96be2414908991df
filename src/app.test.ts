import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventEmitter } from "events";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { SpawnOptions } from "child_process";
import { createApp } from "./app.js";
import { EmptyCalendarProvider, JsonFeedCalendarProvider } from "./calendar/provider.js";
import { silentLogger } from "./logging/logger.js";

describe("createApp", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "calnotes-app-"));
    configPath = join(dir, "config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(config: unknown): void {
    writeFileSync(configPath, JSON.stringify(config));
  }

  it("creates the note partitions and falls back to the environment", () => {
    const notesDirectory = join(dir, "notes");
    writeConfig({ notesDirectory });

    const app = createApp({ configPath, env: { EDITOR: "vim", INDICO_API_KEY: "test-secret" }, logger: silentLogger });

    expect(existsSync(join(notesDirectory, "events"))).toBe(true);
    expect(existsSync(join(notesDirectory, "standalone"))).toBe(true);
    expect(app.config.editor.command).toBe("vim");
    expect(app.config.agenda.apiKey).toBe("test-secret");
    expect(app.calendar).toBeInstanceOf(EmptyCalendarProvider);
    expect(app.notes.notesDirectory).toBe(notesDirectory);
  });

  it("reads events from the configured feed", async () => {
    const feedPath = join(dir, "events.json");
    writeFileSync(
      feedPath,
      JSON.stringify([{ id: "evt-1", title: "Standup", start: new Date(2024, 0, 15, 9).toISOString() }])
    );
    writeConfig({ notesDirectory: join(dir, "notes"), calendar: { feedPath } });

    const app = createApp({ configPath, env: {}, logger: silentLogger });
    const session = app.createSession(new Date(2024, 0, 15));
    await session.refresh();

    expect(app.calendar).toBeInstanceOf(JsonFeedCalendarProvider);
    expect(session.state.events.map((row) => row.event.title)).toEqual(["Standup"]);
  });

  it("applies the configured view to new sessions", () => {
    writeConfig({ notesDirectory: join(dir, "notes"), view: { mode: "week", sort: "title_asc" } });

    const session = createApp({ configPath, env: {}, logger: silentLogger }).createSession(new Date(2024, 0, 17));

    expect(session.state.mode).toBe("week");
    expect(session.state.sort).toBe("title_asc");
    expect(session.state.range.start).toEqual(new Date(2024, 0, 15));
  });

  it("launches the configured editor through the injected spawn", async () => {
    writeConfig({ notesDirectory: join(dir, "notes"), editor: { command: "nano", args: ["-l"] } });
    const spawn = vi.fn((_command: string, _args: readonly string[], _options: SpawnOptions) => {
      const child = new EventEmitter();
      process.nextTick(() => child.emit("exit", 0, null));
      return child;
    });

    const app = createApp({ configPath, env: { EDITOR: "vim" }, spawn, logger: silentLogger });

    expect(await app.editor.open("/tmp/a.md")).toEqual({ ok: true });
    expect(spawn).toHaveBeenCalledWith("nano", ["-l", "/tmp/a.md"], { stdio: "inherit" });
  });
});
