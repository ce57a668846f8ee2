import { spawn } from "node:child_process";
import { InstallationFailed } from "./errors";
import { log } from "./logger";

export interface RunOptions {
  cwd?: string;
  /** Merged over process.env */
  env?: Record<string, string>;
  /** Kill the process after this many milliseconds */
  timeout?: number;
  /**
   * - `capture`: collect stdout/stderr silently (default)
   * - `tee`: collect and also forward to this process's stdout/stderr
   * - `inherit`: the child writes straight to the terminal, nothing is captured
   */
  output?: "capture" | "tee" | "inherit";
}

export interface CommandResult {
  /** null when the process was killed or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  signal?: string;
  timedOut?: boolean;
  /** Set when the process could not be spawned (ENOENT, EACCES, ...) */
  spawnError?: Error;
}

/**
 * Narrow capability for running external programs. The process-backed
 * implementation is {@link createProcessRunner}; tests substitute a recording fake.
 */
export interface CommandRunner {
  /** Resolves once the process exits. Never rejects for a non-zero exit status. */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

export function createProcessRunner(): CommandRunner {
  return {
    run(command, args, options = {}) {
      return new Promise((resolve) => {
        const output = options.output ?? "capture";
        log.runner("Executing: %s %o", command, args);

        const proc = spawn(command, [...args], {
          cwd: options.cwd,
          stdio: output === "inherit" ? "inherit" : ["ignore", "pipe", "pipe"],
          env: { ...process.env, ...options.env },
        });
        let stdout = "";
        let stderr = "";
        let timedOut = false;
        let settled = false;

        const timer =
          options.timeout === undefined
            ? undefined
            : setTimeout(() => {
                timedOut = true;
                log.runner("Command timed out after %dms: %s", options.timeout, command);
                proc.kill();
              }, options.timeout);

        const finish = (result: CommandResult) => {
          if (settled) {
            return;
          }
          settled = true;
          if (timer) {
            clearTimeout(timer);
          }
          resolve(result);
        };

        proc.stdout?.on("data", (data: Buffer) => {
          const chunk = data.toString();
          stdout += chunk;
          if (output === "tee") {
            process.stdout.write(chunk);
          }
        });

        proc.stderr?.on("data", (data: Buffer) => {
          const chunk = data.toString();
          stderr += chunk;
          if (output === "tee") {
            process.stderr.write(chunk);
          }
          if (chunk.trim()) {
            log.runner("stderr: %s", chunk.trim());
          }
        });

        proc.on("error", (err) => {
          log.runner("Command error: %O", err);
          finish({ exitCode: null, stdout, stderr: stderr || err.message, spawnError: err });
        });

        proc.on("close", (code, signal) => {
          log.runner("Command exited with code: %d", code);
          finish({ exitCode: code, stdout, stderr, signal: signal ?? undefined, timedOut });
        });
      });
    },
  };
}

/** Run a command and throw {@link InstallationFailed} unless it exits with 0 */
export async function runChecked(runner: CommandRunner, command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    const commandLine = formatCommand(command, args);
    const detail = result.stderr.trim() || result.stdout.trim() || describeExit(result);
    throw new InstallationFailed(`Command "${commandLine}" failed: ${detail}`, result.exitCode, result.stderr, result.spawnError);
  }
  return result;
}

/** True when the command can be started and exits with 0 within the timeout */
export async function probe(runner: CommandRunner, command: string, args: readonly string[], timeout: number): Promise<boolean> {
  const result = await runner.run(command, args, { timeout });
  return result.exitCode === 0;
}

function describeExit(result: CommandResult): string {
  if (result.timedOut) {
    return "timed out";
  }
  if (result.signal) {
    return `killed by ${result.signal}`;
  }
  return `exited with code ${result.exitCode}`;
}
