import * as fs from "node:fs";
import * as toml from "toml";
import { ZodError } from "zod";
import builtinEnvironments from "./config/environments.json";
import { ConfigInvalid, getErrorMessage } from "./errors";
import { log } from "./logger";
import { EnvironmentsConfigSchema } from "./schema";
import type { EnvironmentDescriptor, EnvironmentsConfig, EnvironmentSummary } from "./schema";

export interface LoadedConfig {
  /** Where the environments came from */
  readonly source: "file" | "builtin";
  readonly path: string;
  readonly config: EnvironmentsConfig;
}

// Config Parsing
export function parseConfigText(text: string, format: "json" | "toml"): EnvironmentsConfig {
  const raw: unknown = format === "toml" ? toml.parse(text) : JSON.parse(text);
  return deepFreeze(EnvironmentsConfigSchema.parse(raw));
}

export function builtinConfig(): EnvironmentsConfig {
  return deepFreeze(EnvironmentsConfigSchema.parse(builtinEnvironments));
}

/**
 * Load the environment configuration.
 *
 * A missing file falls back to the built-in environments. A file that exists but
 * cannot be read or validated is an error.
 */
export function loadConfig(configPath: string): LoadedConfig {
  if (!fs.existsSync(configPath)) {
    log.config("No config at %s, using built-in environments", configPath);
    return Object.freeze({ source: "builtin" as const, path: configPath, config: builtinConfig() });
  }

  const format = configPath.toLowerCase().endsWith(".toml") ? "toml" : "json";
  try {
    const config = parseConfigText(fs.readFileSync(configPath, "utf-8"), format);
    log.config("Loaded %d environments from %s", Object.keys(config.environments).length, configPath);
    return Object.freeze({ source: "file" as const, path: configPath, config });
  } catch (err) {
    throw new ConfigInvalid(configPath, describeParseError(err), err);
  }
}

function describeParseError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
  }
  return getErrorMessage(err);
}

// Environment Utilities
export function getEnvironment(config: EnvironmentsConfig, name: string): EnvironmentDescriptor | undefined {
  return Object.prototype.hasOwnProperty.call(config.environments, name) ? config.environments[name] : undefined;
}

export function listEnvironments(config: EnvironmentsConfig): EnvironmentSummary[] {
  return Object.entries(config.environments).map(([name, env]) => ({ name, python: env.python }));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
