// Error Code Constants
export const ErrorCodes = {
  MANIFEST_NOT_FOUND: "MANIFEST_NOT_FOUND",
  UNSUPPORTED_PLATFORM: "UNSUPPORTED_PLATFORM",
  DOWNLOAD_FAILED: "DOWNLOAD_FAILED",
  INSTALL_FAILED: "INSTALL_FAILED",
  PACKAGE_MANAGER_MISSING: "PACKAGE_MANAGER_MISSING",
  UNKNOWN_ENVIRONMENT: "UNKNOWN_ENVIRONMENT",
  INSTALLATION_FAILED: "INSTALLATION_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
} as const;

export type ErrorCodeType = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Base Error
export abstract class CondaBootstrapError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(
    message: string,
    public readonly cause?: unknown,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// The requirements manifest passed to install_requirements does not exist
export class ManifestNotFound extends CondaBootstrapError {
  readonly code = ErrorCodes.MANIFEST_NOT_FOUND;

  constructor(public readonly manifestPath: string) {
    super(`${manifestPath} not found!`, undefined, { manifestPath });
  }
}

// No installer URL for this (os, arch, flavor)
export class UnsupportedPlatform extends CondaBootstrapError {
  readonly code = ErrorCodes.UNSUPPORTED_PLATFORM;

  constructor(os: string, arch: string, flavor: string) {
    super(`Unsupported system: ${os} ${arch} (${flavor})`, undefined, { os, arch, flavor });
  }
}

export class DownloadFailed extends CondaBootstrapError {
  readonly code = ErrorCodes.DOWNLOAD_FAILED;

  constructor(url: string, reason: string, cause?: unknown) {
    super(`Error downloading installer from ${url}: ${reason}`, cause, { url });
  }
}

// The vendor installer script exited non-zero
export class InstallFailed extends CondaBootstrapError {
  readonly code = ErrorCodes.INSTALL_FAILED;

  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super(message, cause, context);
  }
}

export class PackageManagerMissing extends CondaBootstrapError {
  readonly code = ErrorCodes.PACKAGE_MANAGER_MISSING;

  constructor(message = "conda is not installed or not in PATH") {
    super(message);
  }
}

export class UnknownEnvironment extends CondaBootstrapError {
  readonly code = ErrorCodes.UNKNOWN_ENVIRONMENT;

  constructor(public readonly environment: string) {
    super(`Environment '${environment}' not found in configuration`, undefined, { environment });
  }
}

// Generic non-zero exit of an external command
export class InstallationFailed extends CondaBootstrapError {
  readonly code = ErrorCodes.INSTALLATION_FAILED;

  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string = "",
    cause?: unknown,
  ) {
    super(message, cause, { exitCode });
  }
}

export class ConfigInvalid extends CondaBootstrapError {
  readonly code = ErrorCodes.CONFIG_INVALID;

  constructor(configPath: string, reason: string, cause?: unknown) {
    super(`Invalid configuration ${configPath}: ${reason}`, cause, { configPath });
  }
}

// Error Utilities
export function isCondaBootstrapError(err: unknown): err is CondaBootstrapError {
  return err instanceof CondaBootstrapError;
}

export function getErrorCode(err: unknown): string {
  if (isCondaBootstrapError(err)) {
    return err.code;
  }
  return "UNKNOWN";
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
