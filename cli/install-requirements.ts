import { cac } from "cac";
import { z } from "zod";
import { DEFAULT_ENVIRONMENT, DEFAULT_REQUIREMENTS_PATH } from "../paths";
import { installRequirements } from "../requirements";
import { EnvironmentNameSchema } from "../schema";
import { applyVerbosity, CommonOptionsSchema, parseArgv, parseOptions, resolveFrom, runMain, VERSION } from "./shared";
import type { CliDeps } from "./shared";

const OptionsSchema = CommonOptionsSchema.extend({
  requirements: z.string().default(DEFAULT_REQUIREMENTS_PATH),
  python: z.string().optional(),
  env: EnvironmentNameSchema.default(DEFAULT_ENVIRONMENT),
});

export async function runInstallRequirements(argv: string[], deps: CliDeps): Promise<number> {
  return runMain("install_requirements", async () => {
    const cli = cac("install_requirements");
    cli.option("-r, --requirements <path>", "Requirements file path", { default: DEFAULT_REQUIREMENTS_PATH });
    cli.option("-p, --python <path>", "Python executable path");
    cli.option("-e, --env <name>", "Environment whose interpreter is used when --python is omitted", { default: DEFAULT_ENVIRONMENT });
    cli.option("--verbose", "Print debug logs");
    cli.help();
    cli.version(VERSION);

    const parsed = parseArgv(cli, argv);
    if (parsed.options.help || parsed.options.version) {
      return;
    }
    const options = parseOptions(OptionsSchema, parsed.options);
    applyVerbosity(options);

    await installRequirements(deps, {
      requirements: resolveFrom(deps.cwd, options.requirements),
      python: options.python,
      env: options.env,
    });
    console.log("Requirements installed successfully!");
  });
}
