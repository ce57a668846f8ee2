import * as os from "node:os";
import { UnsupportedPlatform } from "./errors";
import type { Flavor, PlatformDescriptor } from "./schema";

// ===== Platform Detection =====

const ARCH_ALIASES: Record<string, string> = {
  x86_64: "x86_64",
  amd64: "x86_64",
  x64: "x86_64",
  aarch64: "arm64",
  arm64: "arm64",
};

export function normalizeArch(machine: string): string {
  const key = machine.trim().toLowerCase();
  return ARCH_ALIASES[key] ?? key;
}

export function createPlatformDescriptor(osName: string, machine: string): PlatformDescriptor {
  return Object.freeze({ os: osName.trim().toLowerCase(), arch: normalizeArch(machine) });
}

export function detectPlatform(): PlatformDescriptor {
  return createPlatformDescriptor(process.platform, os.machine());
}

// ===== Installer Table =====

const INSTALLER_BASE_URL = "https://repo.anaconda.com";

export const INSTALLER_PATHS: Readonly<Record<Flavor, Readonly<Record<string, string>>>> = {
  miniconda: {
    "linux-x86_64": "/miniconda/Miniconda3-latest-Linux-x86_64.sh",
    "linux-arm64": "/miniconda/Miniconda3-latest-Linux-aarch64.sh",
    "darwin-x86_64": "/miniconda/Miniconda3-latest-MacOSX-x86_64.sh",
    "darwin-arm64": "/miniconda/Miniconda3-latest-MacOSX-arm64.sh",
  },
  anaconda: {
    "linux-x86_64": "/archive/Anaconda3-2023.09-0-Linux-x86_64.sh",
    "linux-arm64": "/archive/Anaconda3-2023.09-0-Linux-aarch64.sh",
    "darwin-x86_64": "/archive/Anaconda3-2023.09-0-MacOSX-x86_64.sh",
    "darwin-arm64": "/archive/Anaconda3-2023.09-0-MacOSX-arm64.sh",
  },
};

export function platformKey(platform: PlatformDescriptor): string {
  return `${platform.os}-${platform.arch}`;
}

export function resolveInstallerUrl(platform: PlatformDescriptor, flavor: Flavor): string {
  const table = INSTALLER_PATHS[flavor];
  const key = platformKey(platform);
  const installerPath = Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
  if (!installerPath) {
    throw new UnsupportedPlatform(platform.os, platform.arch, flavor);
  }
  return `${INSTALLER_BASE_URL}${installerPath}`;
}
