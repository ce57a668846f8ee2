import { cac } from "cac";
import { z } from "zod";
import { bootstrap } from "../bootstrap";
import { loadConfig } from "../config";
import { DEFAULT_CONFIG_PATH, DEFAULT_ENVIRONMENT } from "../paths";
import { EnvironmentNameSchema, FlavorSchema } from "../schema";
import { applyVerbosity, CommonOptionsSchema, parseArgv, parseOptions, resolveFrom, runMain, VERSION } from "./shared";
import type { CliDeps } from "./shared";

const OptionsSchema = CommonOptionsSchema.extend({
  env: EnvironmentNameSchema.default(DEFAULT_ENVIRONMENT),
  skipConda: z.boolean().default(false),
  type: FlavorSchema.default("miniconda"),
  dir: z.string().optional(),
  config: z.string().default(DEFAULT_CONFIG_PATH),
  root: z.string().optional(),
});

export async function runBootstrap(argv: string[], deps: CliDeps): Promise<number> {
  return runMain("conda_bootstrap", async () => {
    const cli = cac("conda_bootstrap");
    cli.option("-e, --env <name>", "Environment to set up", { default: DEFAULT_ENVIRONMENT });
    cli.option("--skip-conda", "Assume conda is already installed");
    cli.option("-t, --type <type>", "Type of conda to install (miniconda | anaconda)", { default: "miniconda" });
    cli.option("-d, --dir <path>", "conda installation directory");
    cli.option("-c, --config <path>", "Configuration file path", { default: DEFAULT_CONFIG_PATH });
    cli.option("--root <path>", "Directory activation scripts are written to (default: current directory)");
    cli.option("--verbose", "Print debug logs");
    cli.help();
    cli.version(VERSION);

    const parsed = parseArgv(cli, argv);
    if (parsed.options.help || parsed.options.version) {
      return;
    }
    const options = parseOptions(OptionsSchema, parsed.options);
    applyVerbosity(options);

    const { config } = loadConfig(resolveFrom(deps.cwd, options.config));
    console.log(`Target environment: ${options.env}`);

    const result = await bootstrap(
      { ...deps, config, root: resolveFrom(deps.cwd, options.root ?? ".") },
      {
        env: options.env,
        skipConda: options.skipConda,
        flavor: options.type,
        dir: options.dir === undefined ? undefined : resolveFrom(deps.cwd, options.dir),
      },
    );

    console.log("Setup completed successfully!");
    console.log("Next steps:");
    console.log("1. Restart your terminal or run: source ~/.bashrc");
    console.log(`2. Activate environment: source ${result.launcherScript}`);
    console.log(`3. Load aliases: source ${result.aliasesScript}`);
  });
}
