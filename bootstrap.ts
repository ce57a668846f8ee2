import * as path from "node:path";
import { resolveConda } from "./conda/commands";
import type { ResolvedConda } from "./conda/commands";
import { createActivationScript, createLauncherScript, setupEnvironment } from "./conda/environments";
import type { EnvironmentContext } from "./conda/environments";
import { installConda } from "./conda/installer";
import type { InstallerContext } from "./conda/installer";
import { getEnvironment } from "./config";
import { UnknownEnvironment } from "./errors";
import { condaRootOf, DEFAULT_ENVIRONMENT } from "./paths";
import { createAliasesScript, createProjectStructure } from "./project";
import type { CondaInstallResult, Flavor } from "./schema";

export type BootstrapContext = InstallerContext & Omit<EnvironmentContext, "conda">;

export interface BootstrapOptions {
  env?: string;
  skipConda?: boolean;
  flavor?: Flavor;
  dir?: string;
}

export interface BootstrapResult {
  install?: CondaInstallResult;
  /** Working directories under the root */
  directories: string[];
  activationScript: string;
  launcherScript: string;
  aliasesScript: string;
}

/** install conda (optional) → project directories → environment → activation scripts → aliases */
export async function bootstrap(ctx: BootstrapContext, options: BootstrapOptions = {}): Promise<BootstrapResult> {
  const envName = options.env ?? DEFAULT_ENVIRONMENT;
  if (!getEnvironment(ctx.config, envName)) {
    throw new UnknownEnvironment(envName);
  }

  let install: CondaInstallResult | undefined;
  let conda: ResolvedConda;
  if (options.skipConda) {
    conda = await resolveConda(ctx.runner, ctx.paths, ctx.exists);
  } else {
    install = await installConda(ctx, { flavor: options.flavor, dir: options.dir });
    conda = install.status === "installed" ? freshInstall(install.condaScript) : await resolveConda(ctx.runner, ctx.paths, ctx.exists);
  }

  const directories = await createProjectStructure(ctx.root);

  const envCtx: EnvironmentContext = { ...ctx, conda };
  await setupEnvironment(envCtx, envName);
  const activationScript = await createActivationScript(envCtx, envName);
  const launcherScript = await createLauncherScript(ctx.root, Object.keys(ctx.config.environments));
  const aliasesScript = await createAliasesScript(ctx.root);

  return { install, directories, activationScript, launcherScript, aliasesScript };
}

// A fresh install is not on PATH until the shell is restarted
function freshInstall(condaScript: string): ResolvedConda {
  return { executable: path.join(condaRootOf(condaScript), "bin", "conda"), condaScript };
}
