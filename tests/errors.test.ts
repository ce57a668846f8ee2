import { describe, it, expect } from "vitest";
import {
  ConfigInvalid,
  CondaBootstrapError,
  DownloadFailed,
  getErrorCode,
  InstallationFailed,
  InstallFailed,
  isCondaBootstrapError,
  ManifestNotFound,
  PackageManagerMissing,
  UnknownEnvironment,
  UnsupportedPlatform,
} from "../errors";

describe("error taxonomy", () => {
  const cases: Array<[CondaBootstrapError, string, string]> = [
    [new ManifestNotFound("requirements.txt"), "MANIFEST_NOT_FOUND", "ManifestNotFound"],
    [new UnsupportedPlatform("win32", "x86_64", "miniconda"), "UNSUPPORTED_PLATFORM", "UnsupportedPlatform"],
    [new DownloadFailed("https://example.invalid/x.sh", "HTTP 500"), "DOWNLOAD_FAILED", "DownloadFailed"],
    [new InstallFailed("installer exited with code 1"), "INSTALL_FAILED", "InstallFailed"],
    [new PackageManagerMissing(), "PACKAGE_MANAGER_MISSING", "PackageManagerMissing"],
    [new UnknownEnvironment("envZ"), "UNKNOWN_ENVIRONMENT", "UnknownEnvironment"],
    [new InstallationFailed("pip failed", 1), "INSTALLATION_FAILED", "InstallationFailed"],
    [new ConfigInvalid("envs.json", "bad"), "CONFIG_INVALID", "ConfigInvalid"],
  ];

  for (const [error, code, name] of cases) {
    it(`${name} carries ${code}`, () => {
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
      expect(isCondaBootstrapError(error)).toBe(true);
      expect(getErrorCode(error)).toBe(code);
    });
  }

  it("treats foreign errors as unknown", () => {
    expect(isCondaBootstrapError(new Error("boom"))).toBe(false);
    expect(getErrorCode(new Error("boom"))).toBe("UNKNOWN");
    expect(getErrorCode("boom")).toBe("UNKNOWN");
  });

  it("formats messages for the operator", () => {
    expect(new ManifestNotFound("requirements.txt").message).toBe("requirements.txt not found!");
    expect(new DownloadFailed("https://example.invalid/x.sh", "HTTP 500").message).toBe("Error downloading installer from https://example.invalid/x.sh: HTTP 500");
  });
});
