import { cac } from "cac";
import { z } from "zod";
import { resolveConda } from "../conda/commands";
import { createActivationScript, setupEnvironment } from "../conda/environments";
import { getEnvironment, listEnvironments, loadConfig } from "../config";
import { UnknownEnvironment } from "../errors";
import { DEFAULT_CONFIG_PATH, DEFAULT_ENVIRONMENT } from "../paths";
import { EnvironmentNameSchema } from "../schema";
import { applyVerbosity, CommonOptionsSchema, parseArgv, parseOptions, resolveFrom, runMain, VERSION } from "./shared";
import type { CliDeps } from "./shared";

export const ACTIONS = ["setup", "list", "create-script"] as const;

const OptionsSchema = CommonOptionsSchema.extend({
  env: EnvironmentNameSchema.default(DEFAULT_ENVIRONMENT),
  config: z.string().default(DEFAULT_CONFIG_PATH),
  root: z.string().optional(),
});

export async function runSetupConda(argv: string[], deps: CliDeps): Promise<number> {
  return runMain("setup_conda", async () => {
    const cli = cac("setup_conda");
    cli.usage(`<${ACTIONS.join("|")}> [options]`);
    cli.option("-e, --env <name>", "Environment name", { default: DEFAULT_ENVIRONMENT });
    cli.option("-c, --config <path>", "Configuration file path", { default: DEFAULT_CONFIG_PATH });
    cli.option("--root <path>", "Directory activation scripts are written to (default: current directory)");
    cli.option("--verbose", "Print debug logs");
    cli.help();
    cli.version(VERSION);

    const parsed = parseArgv(cli, argv);
    if (parsed.options.help || parsed.options.version) {
      return;
    }
    const action = z.enum(ACTIONS).safeParse(parsed.args[0]);
    if (!action.success || parsed.args.length > 1) {
      throw new Error(`Expected one action: ${ACTIONS.join(", ")}`);
    }
    const options = parseOptions(OptionsSchema, parsed.options);
    applyVerbosity(options);

    const { config } = loadConfig(resolveFrom(deps.cwd, options.config));
    const root = resolveFrom(deps.cwd, options.root ?? ".");

    if (action.data === "setup" && !getEnvironment(config, options.env)) {
      throw new UnknownEnvironment(options.env);
    }
    const conda = await resolveConda(deps.runner, deps.paths, deps.exists);

    switch (action.data) {
      case "list":
        console.log("Available environments:");
        for (const env of listEnvironments(config)) {
          console.log(`  - ${env.name} (Python ${env.python})`);
        }
        return;

      case "setup": {
        const ctx = { ...deps, config, root, conda };
        await setupEnvironment(ctx, options.env);
        await createActivationScript(ctx, options.env);
        return;
      }

      case "create-script":
        await createActivationScript({ paths: deps.paths, root, exists: deps.exists, conda }, options.env);
        return;
    }
  });
}
