import * as fs from "node:fs";
import type { PathExists } from "./conda/commands";
import { InstallationFailed, ManifestNotFound } from "./errors";
import { log } from "./logger";
import { DEFAULT_ENVIRONMENT, FALLBACK_PYTHON } from "./paths";
import type { SetupPaths } from "./paths";
import type { CommandRunner } from "./runner";
import { formatCommand } from "./runner";
import type { RequirementsInstallResult } from "./schema";

export interface RequirementsContext {
  runner: CommandRunner;
  paths: SetupPaths;
  exists?: PathExists;
}

export interface InstallRequirementsOptions {
  requirements: string;
  /** Interpreter to install into; probed from known environment locations when omitted */
  python?: string;
  /** Environment whose interpreter is probed, defaults to torchpy310 */
  env?: string;
}

export function resolvePython(paths: SetupPaths, envName: string, exists: PathExists = fs.existsSync): string {
  const found = paths.envPythonCandidates(envName).find((candidate) => exists(candidate));
  log.requirements("Interpreter lookup for %s: %s", envName, found ?? "none");
  return found ?? FALLBACK_PYTHON;
}

export async function installRequirements(ctx: RequirementsContext, options: InstallRequirementsOptions): Promise<RequirementsInstallResult> {
  const exists = ctx.exists ?? fs.existsSync;
  if (!exists(options.requirements)) {
    throw new ManifestNotFound(options.requirements);
  }

  const python = options.python ?? resolvePython(ctx.paths, options.env ?? DEFAULT_ENVIRONMENT, exists);
  console.log(`Using Python: ${python}`);
  console.log(`Installing from: ${options.requirements}`);

  const args = ["-m", "pip", "install", "-r", options.requirements];
  const result = await ctx.runner.run(python, args, { output: "inherit" });
  if (result.exitCode !== 0) {
    const reason = result.spawnError ? result.spawnError.message : `exit code ${result.exitCode}`;
    throw new InstallationFailed(`Error installing requirements (${formatCommand(python, args)}): ${reason}`, result.exitCode, result.stderr, result.spawnError);
  }

  return { python, requirements: options.requirements };
}
