import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import type { PathExists } from "../conda/commands";
import type { Downloader } from "../download";
import type { CommandResult, CommandRunner, RunOptions } from "../runner";

// ============================================================================
// Fake command runner
// ============================================================================

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: RunOptions;
}

export type Responder = (command: string, args: string[]) => Partial<CommandResult> | undefined;

export interface FakeRunner extends CommandRunner {
  calls: RecordedCommand[];
}

/** Records every invocation; exits 0 with empty output unless `respond` says otherwise */
export function createFakeRunner(respond: Responder = () => undefined): FakeRunner {
  const calls: RecordedCommand[] = [];
  return {
    calls,
    run: vi.fn(async (command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult> => {
      calls.push({ command, args: [...args], options });
      return { exitCode: 0, stdout: "", stderr: "", ...respond(command, [...args]) };
    }),
  };
}

export function commandLines(runner: FakeRunner): string[] {
  return runner.calls.map((call) => [call.command, ...call.args].join(" "));
}

/** conda is not callable anywhere */
export const noConda: Responder = (_command, args) => (args[0] === "--version" ? { exitCode: null, stderr: "spawn conda ENOENT" } : undefined);

// ============================================================================
// Fake downloader
// ============================================================================

export function createFakeDownloader(body = "#!/bin/bash\necho installer\n"): Downloader & { urls: string[] } {
  const urls: string[] = [];
  const downloader = async (url: string, destination: string): Promise<void> => {
    urls.push(url);
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    fs.writeFileSync(destination, body);
  };
  return Object.assign(downloader, { urls });
}

// ============================================================================
// Temp directories
// ============================================================================

export function makeTempDir(prefix = "conda-bootstrap-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Existence check confined to a sandbox so system-wide installs on the host do not leak in */
export function existsUnder(root: string): PathExists {
  return (filePath) => filePath.startsWith(root + path.sep) && fs.existsSync(filePath);
}

export function touch(filePath: string, content = ""): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/** Silence operator-facing output for the duration of a test */
export function muteConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}
