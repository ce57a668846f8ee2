import { cac } from "cac";
import { z } from "zod";
import { installConda } from "../conda/installer";
import { FlavorSchema } from "../schema";
import type { CondaInstallResult } from "../schema";
import { sourceLine } from "../shell-rc";
import { applyVerbosity, CommonOptionsSchema, parseArgv, parseOptions, resolveFrom, runMain, VERSION } from "./shared";
import type { CliDeps } from "./shared";

const OptionsSchema = CommonOptionsSchema.extend({
  type: FlavorSchema.default("miniconda"),
  dir: z.string().optional(),
});

export async function runInstallConda(argv: string[], deps: CliDeps): Promise<number> {
  return runMain("install_conda", async () => {
    const cli = cac("install_conda");
    cli.option("-t, --type <type>", "Type of conda to install (miniconda | anaconda)", { default: "miniconda" });
    cli.option("-d, --dir <path>", "Installation directory");
    cli.option("--verbose", "Print debug logs");
    cli.help();
    cli.version(VERSION);

    const parsed = parseArgv(cli, argv);
    if (parsed.options.help || parsed.options.version) {
      return;
    }
    const options = parseOptions(OptionsSchema, parsed.options);
    applyVerbosity(options);

    const result = await installConda(deps, {
      flavor: options.type,
      dir: options.dir === undefined ? undefined : resolveFrom(deps.cwd, options.dir),
    });
    report(result);
  });
}

function report(result: CondaInstallResult): void {
  switch (result.status) {
    case "on-path":
      console.log("Conda is already installed and accessible!");
      break;
    case "found":
      console.log(`Found existing conda installation: ${result.condaScript}`);
      console.warn("Warning: conda is not on PATH. Later commands in this shell will not find it until you run:");
      console.warn(`  ${sourceLine(result.condaScript)}`);
      break;
    case "installed":
      console.log("\n" + "=".repeat(50));
      console.log("Conda installation completed!");
      console.log("=".repeat(50));
      console.log(`Installation directory: ${result.installDir}`);
      console.log(`Conda script: ${result.condaScript}`);
      console.log("\nTo use conda, either:");
      console.log("1. Restart your terminal");
      console.log("2. Run: source ~/.bashrc (or ~/.zshrc)");
      console.log(`3. Or manually source: source ${result.condaScript}`);
      console.log("\nThen you can run: conda --version");
      break;
  }
}

