import * as os from "node:os";
import * as path from "node:path";

import type { Flavor } from "./schema";

export const DEFAULT_ENVIRONMENT = "torchpy310";
export const DEFAULT_CONFIG_PATH = path.join("config", "environments.json");
export const DEFAULT_REQUIREMENTS_PATH = "requirements.txt";
export const FALLBACK_PYTHON = "python3";

// Checked in order, first existing wins
const CONDA_ROOT_CANDIDATES = ["~/miniconda3", "~/anaconda3", "/opt/conda", "/usr/local/conda", "/opt/miniconda3", "/opt/anaconda3"];
const ENV_PYTHON_ROOT_CANDIDATES = ["~/miniconda3", "~/anaconda3", "/opt/conda"];

const SHELL_RC_FILES = [".bashrc", ".zshrc"];

export function expandHome(template: string, home: string): string {
  if (template === "~") {
    return home;
  }
  if (template.startsWith("~/")) {
    return path.join(home, template.slice(2));
  }
  return template;
}

/** The shell integration script inside a conda installation root */
export function condaScriptOf(condaRoot: string): string {
  return path.join(condaRoot, "etc", "profile.d", "conda.sh");
}

/** Inverse of {@link condaScriptOf} */
export function condaRootOf(condaScript: string): string {
  return path.resolve(path.dirname(condaScript), "..", "..");
}

export interface SetupPaths {
  readonly home: string;
  /** Candidate conda.sh locations, in priority order */
  readonly condaScriptCandidates: readonly string[];
  readonly shellRcFiles: readonly string[];
  /** Candidate interpreters of a named environment, in priority order */
  envPythonCandidates(envName: string): string[];
  installerScript(flavor: Flavor): string;
  defaultInstallDir(flavor: Flavor): string;
}

export function createSetupPaths(home: string = os.homedir()): SetupPaths {
  return {
    home,
    condaScriptCandidates: CONDA_ROOT_CANDIDATES.map((root) => condaScriptOf(expandHome(root, home))),
    shellRcFiles: SHELL_RC_FILES.map((name) => path.join(home, name)),

    envPythonCandidates(envName: string): string[] {
      return ENV_PYTHON_ROOT_CANDIDATES.map((root) => path.join(expandHome(root, home), "envs", envName, "bin", "python"));
    },

    installerScript(flavor: Flavor): string {
      return path.join(home, `${flavor}_installer.sh`);
    },

    defaultInstallDir(flavor: Flavor): string {
      return path.join(home, flavor === "anaconda" ? "anaconda3" : "miniconda3");
    },
  };
}

export function activationScriptPath(root: string, envName: string): string {
  return path.join(root, `activate_${envName}.sh`);
}

export function launcherScriptPath(root: string): string {
  return path.join(root, "activate.sh");
}

export function aliasesScriptPath(root: string): string {
  return path.join(root, "aliases.sh");
}
