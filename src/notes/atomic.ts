import { mkdirSync, renameSync, rmSync, writeFileSync } from "fs";
import { basename, dirname, join } from "path";
import { WriteFailure, describeError } from "../errors.js";

let sequence = 0;

/**
 * Writes beside the target and renames into place, so readers see either the old
 * file or the new one. Temp names start with a dot and end in .tmp; listings skip them.
 */
export function writeFileAtomic(filePath: string, data: string): void {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${process.pid}.${sequence++}.tmp`);

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(tmp, data, "utf-8");
    renameSync(tmp, filePath);
  } catch (error) {
    const failure = new WriteFailure(filePath, error);
    try {
      rmSync(tmp, { force: true });
    } catch (cleanupError) {
      failure.message += ` (temporary file ${tmp} left behind: ${describeError(cleanupError)})`;
    }
    throw failure;
  }
}
