import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { log } from "./logger";
import { aliasesScriptPath } from "./paths";
import { writeExecutable } from "./shell-rc";

/** Working directories created under the project root */
export const PROJECT_DIRECTORIES = ["data", "results", "logs", "models", "configs"] as const;

/** Create the working directories under `root`; existing ones are kept as they are */
export async function createProjectStructure(root: string): Promise<string[]> {
  console.log("Setting up project structure...");
  const directories = PROJECT_DIRECTORIES.map((name) => path.join(root, name));
  for (const directory of directories) {
    await fsp.mkdir(directory, { recursive: true });
    log.project("Ensured %s", directory);
  }
  console.log("Project structure created!");
  return directories;
}

export function renderAliasesScript(): string {
  return `# Shortcuts for working with conda environments

# Conda
alias ca='conda activate'
alias cde='conda deactivate'
alias cel='conda env list'
alias cec='conda env create'
alias ced='conda env remove'

# GPU monitoring
alias gpu='nvidia-smi'
alias gpuw='watch -n 1 nvidia-smi'
alias gpum='nvidia-smi -l 1'

# Python
alias py='python3'
alias jup='jupyter notebook'
alias jlab='jupyter lab'

# Git
alias gs='git status'
alias ga='git add'
alias gc='git commit'
alias gp='git push'
alias gl='git log --oneline'

echo "Aliases loaded! Use 'source aliases.sh' to load them in new sessions."
`;
}

/** Write `aliases.sh` under the root, replacing any previous one */
export async function createAliasesScript(root: string): Promise<string> {
  const scriptPath = aliasesScriptPath(root);
  await writeExecutable(scriptPath, renderAliasesScript());
  console.log(`Created aliases file: ${scriptPath}`);
  return scriptPath;
}
