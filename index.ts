/**
 * conda-bootstrap - install conda, create pinned environments and install requirements.
 *
 * @example Programmatic setup
 * ```typescript
 * import { createProcessRunner, createSetupPaths, loadConfig, resolveConda, setupEnvironment } from "conda-bootstrap";
 *
 * const runner = createProcessRunner();
 * const paths = createSetupPaths();
 * const { config } = loadConfig("config/environments.json");
 *
 * const conda = await resolveConda(runner, paths);
 * await setupEnvironment({ runner, paths, config, root: process.cwd(), conda }, "torchpy310");
 * ```
 *
 * @module conda-bootstrap
 */

// Requirements
export { installRequirements, resolvePython } from "./requirements";
export type { RequirementsContext, InstallRequirementsOptions } from "./requirements";

// Conda installation
export { installConda, setupShellIntegration } from "./conda/installer";
export type { InstallerContext, InstallCondaOptions } from "./conda/installer";

// Environments
export { setupEnvironment, createActivationScript, createLauncherScript, renderActivationScript, renderLauncherScript } from "./conda/environments";
export type { EnvironmentContext } from "./conda/environments";
export { resolveConda, findCondaScript, isCondaCallable, createEnvArgs, installPackagesArgs, pipInstallArgs } from "./conda/commands";
export type { ResolvedConda, PathExists } from "./conda/commands";

// Full setup
export { bootstrap } from "./bootstrap";
export type { BootstrapContext, BootstrapOptions, BootstrapResult } from "./bootstrap";

// Project layout
export { createProjectStructure, createAliasesScript, renderAliasesScript, PROJECT_DIRECTORIES } from "./project";

// Config
export { loadConfig, parseConfigText, builtinConfig, getEnvironment, listEnvironments } from "./config";
export type { LoadedConfig } from "./config";

// Platform
export { detectPlatform, createPlatformDescriptor, normalizeArch, resolveInstallerUrl, INSTALLER_PATHS } from "./platform";

// Paths
export { createSetupPaths, condaScriptOf, activationScriptPath, launcherScriptPath, aliasesScriptPath } from "./paths";
export type { SetupPaths } from "./paths";

// Processes and downloads
export { createProcessRunner, runChecked, probe, formatCommand } from "./runner";
export type { CommandRunner, CommandResult, RunOptions } from "./runner";
export { fetchDownloader } from "./download";
export { shellQuote, sourceLine } from "./shell-rc";
export type { Downloader } from "./download";

// Logging
export { enableLogs, disableLogs, isLogEnabled } from "./logger";

// Errors
export {
  CondaBootstrapError,
  ManifestNotFound,
  UnsupportedPlatform,
  DownloadFailed,
  InstallFailed,
  PackageManagerMissing,
  UnknownEnvironment,
  InstallationFailed,
  ConfigInvalid,
  ErrorCodes,
  isCondaBootstrapError,
  getErrorCode,
} from "./errors";
export type { ErrorCodeType } from "./errors";

// Types
export type { Flavor, EnvironmentDescriptor, EnvironmentsConfig, EnvironmentSummary, PlatformDescriptor, CondaInstallResult, RequirementsInstallResult } from "./schema";

// Schemas
export { FlavorSchema, EnvironmentNameSchema, EnvironmentDescriptorSchema, EnvironmentsConfigSchema } from "./schema";
