import { spawn, type SpawnOptions } from "child_process";
import type { EventEmitter } from "events";
import { basename } from "path";
import type { EditorConfig } from "../config/index.js";
import { describeError, hasErrorCode } from "../errors.js";
import { Logger, silentLogger } from "../logging/logger.js";

export type SpawnLike = (command: string, args: readonly string[], options: SpawnOptions) => EventEmitter;

export type LaunchResult = { ok: true } | { ok: false; message: string };

export interface EditorLauncherOptions {
  spawn?: SpawnLike;
  logger?: Logger;
}

// GUI editors return immediately unless told to wait for the file to close.
const WAIT_FLAG_EDITORS = new Set(["code", "code-insiders", "subl"]);

export class EditorLauncher {
  private command: string;
  private args: string[];
  private spawnFn: SpawnLike;
  private logger: Logger;

  constructor(config: EditorConfig & { command: string }, options: EditorLauncherOptions = {}) {
    this.command = config.command;
    this.args = config.args;
    this.spawnFn = options.spawn ?? spawn;
    this.logger = options.logger ?? silentLogger;
  }

  argsFor(filePath: string): string[] {
    const args = [...this.args];
    if (WAIT_FLAG_EDITORS.has(basename(this.command)) && !args.includes("--wait")) {
      args.push("--wait");
    }
    args.push(filePath);
    return args;
  }

  /** Runs the editor on the file and resolves once it exits. Never rejects. */
  open(filePath: string): Promise<LaunchResult> {
    const args = this.argsFor(filePath);
    this.logger.debug(`Launching ${this.command} ${args.join(" ")}`);

    return new Promise((resolve) => {
      let child: EventEmitter;
      try {
        child = this.spawnFn(this.command, args, { stdio: "inherit" });
      } catch (error) {
        resolve(this.failure(`Could not start editor "${this.command}": ${describeError(error)}`));
        return;
      }

      child.once("error", (error: unknown) => {
        const message = hasErrorCode(error, "ENOENT")
          ? `Editor "${this.command}" not found. Set editor.command or $EDITOR.`
          : `Could not start editor "${this.command}": ${describeError(error)}`;
        resolve(this.failure(message));
      });

      child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          resolve({ ok: true });
        } else if (signal) {
          resolve(this.failure(`Editor "${this.command}" was killed by ${signal}`));
        } else {
          resolve(this.failure(`Editor "${this.command}" exited with code ${code}`));
        }
      });
    });
  }

  private failure(message: string): LaunchResult {
    this.logger.error(message);
    return { ok: false, message };
  }
}
