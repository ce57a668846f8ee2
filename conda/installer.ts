import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import type { Downloader } from "../download";
import { InstallFailed } from "../errors";
import { log } from "../logger";
import { condaScriptOf } from "../paths";
import type { SetupPaths } from "../paths";
import { resolveInstallerUrl } from "../platform";
import type { CommandRunner } from "../runner";
import { formatCommand } from "../runner";
import type { CondaInstallResult, Flavor, PlatformDescriptor } from "../schema";
import { appendLineOnce, sourceLine } from "../shell-rc";
import { findCondaScript, isCondaCallable } from "./commands";
import type { PathExists } from "./commands";

export interface InstallerContext {
  runner: CommandRunner;
  paths: SetupPaths;
  platform: PlatformDescriptor;
  downloader: Downloader;
  exists?: PathExists;
}

export interface InstallCondaOptions {
  flavor?: Flavor;
  /** Installation directory, defaults to ~/miniconda3 or ~/anaconda3 */
  dir?: string;
}

/**
 * Install conda unless it is already callable or present at a known location.
 *
 * Sequence: resolve URL → download → chmod → `bash <installer> -b -p <dir>` →
 * remove installer → add `source .../conda.sh` to the shell startup files.
 */
export async function installConda(ctx: InstallerContext, options: InstallCondaOptions = {}): Promise<CondaInstallResult> {
  const flavor = options.flavor ?? "miniconda";
  const exists = ctx.exists ?? fs.existsSync;

  console.log("Checking conda installation...");
  if (await isCondaCallable(ctx.runner)) {
    log.installer("conda already callable");
    return { status: "on-path" };
  }

  const existing = findCondaScript(ctx.paths, exists);
  if (existing) {
    return { status: "found", condaScript: existing };
  }

  const url = resolveInstallerUrl(ctx.platform, flavor);
  const installDir = options.dir ?? ctx.paths.defaultInstallDir(flavor);
  const installer = ctx.paths.installerScript(flavor);

  console.log(`Downloading ${flavor} installer...`);
  console.log(`URL: ${url}`);
  await ctx.downloader(url, installer);
  console.log(`Downloaded to: ${installer}`);

  await fsp.chmod(installer, 0o755);

  const args = [installer, "-b", "-p", installDir];
  console.log(`Installing conda to: ${installDir}`);
  console.log(`Running: ${formatCommand("bash", args)}`);
  const result = await ctx.runner.run("bash", args, { output: "inherit" });
  if (result.exitCode !== 0) {
    throw new InstallFailed(
      `Error during installation: installer exited with ${result.exitCode === null ? "no exit code" : `code ${result.exitCode}`}`,
      result.spawnError,
      { installer, installDir, exitCode: result.exitCode },
    );
  }

  await fsp.rm(installer, { force: true });
  log.installer("Removed installer %s", installer);

  const condaScript = condaScriptOf(installDir);
  const shellFiles = setupShellIntegration(ctx.paths, condaScript, exists);

  return { status: "installed", installDir, condaScript, shellFiles };
}

/** Returns the startup files that were modified */
export function setupShellIntegration(paths: SetupPaths, condaScript: string, exists: PathExists = fs.existsSync): string[] {
  if (!exists(condaScript)) {
    console.warn("Warning: conda.sh not found, shell integration may not work");
    return [];
  }

  const line = sourceLine(condaScript);
  const modified = paths.shellRcFiles.filter((rcFile) => appendLineOnce(rcFile, line));
  for (const rcFile of modified) {
    console.log(`Added conda initialization to ${rcFile}`);
  }
  return modified;
}
