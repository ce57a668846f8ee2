import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { log } from "./logger";

export const CONDA_INIT_COMMENT = "# Conda initialization";

/** Double-quote `value` for bash, escaping the characters that stay special inside double quotes */
export function shellQuote(value: string): string {
  const escaped = value.replace(/[\\"$`]/g, "\\$&");
  return `"${escaped}"`;
}

export function sourceLine(script: string): string {
  return `source ${shellQuote(script)}`;
}

/**
 * Append `line` to an existing shell startup file unless it is already there.
 * Missing files are left alone. Returns true when the file was modified.
 */
export function appendLineOnce(rcFile: string, line: string, comment: string = CONDA_INIT_COMMENT): boolean {
  if (!fs.existsSync(rcFile)) {
    return false;
  }

  const content = fs.readFileSync(rcFile, "utf-8");
  if (content.split(/\r?\n/).some((existing) => existing.trim() === line)) {
    return false;
  }

  fs.appendFileSync(rcFile, `\n${comment}\n${line}\n`, "utf-8");
  return true;
}

/** Write a script with mode 755, creating its directory and replacing any previous file */
export async function writeExecutable(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await fsp.writeFile(filePath, content, "utf-8");
  await fsp.chmod(filePath, 0o755);
  log.project("Wrote %s", filePath);
}
