import * as fs from "node:fs";
import { getEnvironment } from "../config";
import { PackageManagerMissing, UnknownEnvironment } from "../errors";
import { log } from "../logger";
import { activationScriptPath, launcherScriptPath } from "../paths";
import type { SetupPaths } from "../paths";
import type { CommandRunner } from "../runner";
import type { EnvironmentsConfig } from "../schema";
import { sourceLine, writeExecutable } from "../shell-rc";
import { createEnvironment, findCondaScript, installCondaPackages, installPipPackages, resolveConda } from "./commands";
import type { PathExists, ResolvedConda } from "./commands";

export interface EnvironmentContext {
  runner: CommandRunner;
  paths: SetupPaths;
  config: EnvironmentsConfig;
  /** Directory the activation scripts are written to */
  root: string;
  exists?: PathExists;
  /** Skip discovery when the caller already resolved conda */
  conda?: ResolvedConda;
}

/**
 * Create `envName` and install its package lists.
 *
 * Runs create → conda install → pip install, each only when there is something to
 * install. The first failing command aborts the setup; a partially created
 * environment is left in place.
 */
export async function setupEnvironment(ctx: EnvironmentContext, envName: string): Promise<ResolvedConda> {
  const env = getEnvironment(ctx.config, envName);
  if (!env) {
    throw new UnknownEnvironment(envName);
  }

  const conda = ctx.conda ?? (await resolveConda(ctx.runner, ctx.paths, ctx.exists));
  const output = { output: "tee" } as const;

  console.log(`Setting up environment: ${envName}`);
  console.log(`Python version: ${env.python}`);

  log.environments("Creating %s with python=%s", envName, env.python);
  await createEnvironment(ctx.runner, conda.executable, envName, env.python, output);

  if (env.packages.conda.length > 0) {
    log.environments("Installing %d conda packages", env.packages.conda.length);
    await installCondaPackages(ctx.runner, conda.executable, envName, env.packages.conda, env.channels, output);
  }

  if (env.packages.pip.length > 0) {
    log.environments("Installing %d pip packages", env.packages.pip.length);
    await installPipPackages(ctx.runner, conda.executable, envName, env.packages.pip, output);
  }

  console.log(`Environment '${envName}' setup complete!`);
  return conda;
}

export function renderActivationScript(envName: string, condaScript: string): string {
  return `#!/bin/bash

# Auto-generated activation script for ${envName}

# Source conda
${sourceLine(condaScript)}

# Activate environment
conda activate ${envName}

echo "Environment '${envName}' activated!"
echo "Python version: $(python --version)"
echo "PyTorch version: $(python -c 'import torch; print(torch.__version__)' 2>/dev/null || echo 'PyTorch not installed')"
`;
}

/** Write `activate_<env>.sh` under the root, replacing any previous one */
export async function createActivationScript(ctx: Pick<EnvironmentContext, "paths" | "root" | "exists" | "conda">, envName: string): Promise<string> {
  const condaScript = ctx.conda?.condaScript ?? findCondaScript(ctx.paths, ctx.exists ?? fs.existsSync);
  if (!condaScript) {
    throw new PackageManagerMissing("Conda not found");
  }

  const scriptPath = activationScriptPath(ctx.root, envName);
  await writeExecutable(scriptPath, renderActivationScript(envName, condaScript));
  console.log(`Activation script created: ${scriptPath}`);
  return scriptPath;
}

export function renderLauncherScript(envNames: readonly string[]): string {
  const branches = envNames
    .map((name, index) => {
      const keyword = index === 0 ? "if" : "elif";
      return `${keyword} [[ -f "$SCRIPT_DIR/activate_${name}.sh" ]]; then\n    source "$SCRIPT_DIR/activate_${name}.sh"`;
    })
    .join("\n");
  const fallback = `    echo "No environment activation script found!"\n    echo "Please run: setup_conda setup"\n    exit 1`;

  if (!branches) {
    return `#!/bin/bash

${fallback.replace(/^ {4}/gm, "")}
`;
  }

  return `#!/bin/bash

# Main activation script
# Sources the first environment activation script found beside it

SCRIPT_DIR="$(cd "$(dirname "\${BASH_SOURCE[0]}")" && pwd)"

${branches}
else
${fallback}
fi
`;
}

/** Write `activate.sh`, trying each environment's activation script in order */
export async function createLauncherScript(root: string, envNames: readonly string[]): Promise<string> {
  const scriptPath = launcherScriptPath(root);
  await writeExecutable(scriptPath, renderLauncherScript(envNames));
  console.log(`Created main activation script: ${scriptPath}`);
  return scriptPath;
}
