import * as path from "node:path";
import type { CAC } from "cac";
import { z } from "zod";
import type { PathExists } from "../conda/commands";
import { fetchDownloader } from "../download";
import type { Downloader } from "../download";
import { getErrorMessage } from "../errors";
import { enableLogs, log } from "../logger";
import { createSetupPaths } from "../paths";
import type { SetupPaths } from "../paths";
import { detectPlatform } from "../platform";
import { createProcessRunner } from "../runner";
import type { CommandRunner } from "../runner";
import type { PlatformDescriptor } from "../schema";

export { version as VERSION } from "../package.json";

/** Everything a command touches outside its own process, built once at startup */
export interface CliDeps {
  runner: CommandRunner;
  paths: SetupPaths;
  platform: PlatformDescriptor;
  downloader: Downloader;
  cwd: string;
  exists?: PathExists;
}

export function defaultDeps(): CliDeps {
  return {
    runner: createProcessRunner(),
    paths: createSetupPaths(),
    platform: detectPlatform(),
    downloader: fetchDownloader,
    cwd: process.cwd(),
  };
}

export const CommonOptionsSchema = z.object({
  verbose: z.boolean().optional(),
});

export function resolveFrom(cwd: string, target: string): string {
  return path.resolve(cwd, target);
}

/**
 * Run a command body, print any failure as `Error: <message>` and map it to an
 * exit code.
 */
export async function runMain(name: string, body: () => Promise<void>): Promise<number> {
  try {
    await body();
    return 0;
  } catch (err) {
    console.error(`Error: ${getErrorMessage(err)}`);
    log.cli("%s failed: %O", name, err);
    return 1;
  }
}

export function applyVerbosity(options: { verbose?: boolean }): void {
  if (options.verbose) {
    enableLogs();
  }
}

export interface ParsedArgv {
  args: readonly string[];
  options: Record<string, unknown>;
}

/**
 * Parse argv with `cli` and read the value of every `<value>` option back as typed.
 *
 * cac hands digit-only values over as numbers (`--env 2024` becomes 2024, `--dir 010`
 * becomes 10); option values here are names and paths, so the argv text is kept.
 */
export function parseArgv(cli: CAC, argv: string[]): ParsedArgv {
  const parsed = cli.parse(argv, { run: false });
  const options: Record<string, unknown> = { ...parsed.options };

  for (const option of cli.globalCommand.options) {
    if (typeof option.required !== "boolean") {
      continue;
    }
    const values = rawValues(argv, flagsOf(option.rawName));
    if (values.length > 1) {
      throw new Error(`--${option.name}: expected a single value, got ${values.length}`);
    }
    if (values.length === 1) {
      options[option.name] = values[0];
    }
  }

  return { args: parsed.args, options };
}

// "-e, --env <name>" -> ["-e", "--env"]
function flagsOf(rawName: string): string[] {
  return rawName
    .replace(/\s*[<[].*$/, "")
    .split(",")
    .map((flag) => flag.trim())
    .filter((flag) => flag.length > 0);
}

function rawValues(argv: readonly string[], flags: readonly string[]): string[] {
  const values: string[] = [];
  for (let i = 2; i < argv.length; i++) {
    const token = argv[i];
    if (token === "--") {
      break;
    }
    const flag = flags.find((candidate) => token === candidate || token.startsWith(`${candidate}=`));
    if (flag === undefined) {
      continue;
    }
    if (token.length > flag.length) {
      values.push(token.slice(flag.length + 1));
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("-")) {
      values.push(argv[i + 1]);
      i++;
    }
  }
  return values;
}

export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("; "));
  }
  return result.data;
}
