import * as fs from "node:fs";
import * as path from "node:path";
import { PackageManagerMissing } from "../errors";
import { log } from "../logger";
import { condaRootOf } from "../paths";
import type { SetupPaths } from "../paths";
import { probe, runChecked } from "../runner";
import type { CommandRunner, RunOptions } from "../runner";

export type PathExists = (filePath: string) => boolean;

export const CONDA_EXECUTABLE = "conda";
/** Only the presence probe is time-limited; installs may run for as long as they need */
export const CONDA_PROBE_TIMEOUT_MS = 10_000;

export interface ResolvedConda {
  /** `conda` when on PATH, otherwise the absolute path of a known installation's binary */
  executable: string;
  /** conda.sh of the installation, when one was found at a known location */
  condaScript?: string;
}

// ===== Argument Builders =====

export function createEnvArgs(envName: string, python: string): string[] {
  return ["create", "-n", envName, `python=${python}`, "-y"];
}

export function installPackagesArgs(envName: string, packages: readonly string[], channels: readonly string[]): string[] {
  return ["install", "-n", envName, ...packages, ...channels.flatMap((channel) => ["-c", channel]), "-y"];
}

export function pipInstallArgs(envName: string, packages: readonly string[]): string[] {
  return ["run", "-n", envName, "pip", "install", ...packages];
}

// ===== Discovery =====

export function isCondaCallable(runner: CommandRunner, executable: string = CONDA_EXECUTABLE): Promise<boolean> {
  return probe(runner, executable, ["--version"], CONDA_PROBE_TIMEOUT_MS);
}

export function findCondaScript(paths: SetupPaths, exists: PathExists = fs.existsSync): string | undefined {
  const found = paths.condaScriptCandidates.find((candidate) => exists(candidate));
  log.installer("conda.sh lookup: %s", found ?? "none");
  return found;
}

/**
 * Find a conda executable the following steps can actually call.
 *
 * An installation found at a known location but missing from PATH is used through
 * its absolute `bin/conda`, so later commands in the same run do not fail.
 */
export async function resolveConda(runner: CommandRunner, paths: SetupPaths, exists: PathExists = fs.existsSync): Promise<ResolvedConda> {
  const condaScript = findCondaScript(paths, exists);

  if (await isCondaCallable(runner)) {
    return { executable: CONDA_EXECUTABLE, condaScript };
  }

  if (condaScript) {
    const executable = path.join(condaRootOf(condaScript), "bin", "conda");
    if (exists(executable) && (await isCondaCallable(runner, executable))) {
      log.installer("conda not on PATH, using %s", executable);
      return { executable, condaScript };
    }
  }

  throw new PackageManagerMissing();
}

// ===== Commands =====

export async function createEnvironment(runner: CommandRunner, conda: string, envName: string, python: string, options?: RunOptions): Promise<void> {
  await runChecked(runner, conda, createEnvArgs(envName, python), options);
}

export async function installCondaPackages(
  runner: CommandRunner,
  conda: string,
  envName: string,
  packages: readonly string[],
  channels: readonly string[],
  options?: RunOptions,
): Promise<void> {
  await runChecked(runner, conda, installPackagesArgs(envName, packages, channels), options);
}

export async function installPipPackages(runner: CommandRunner, conda: string, envName: string, packages: readonly string[], options?: RunOptions): Promise<void> {
  await runChecked(runner, conda, pipInstallArgs(envName, packages), options);
}
