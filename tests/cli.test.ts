import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { runBootstrap } from "../cli/bootstrap";
import { runInstallConda } from "../cli/install-conda";
import { runInstallRequirements } from "../cli/install-requirements";
import { runSetupConda } from "../cli/setup-conda";
import type { CliDeps } from "../cli/shared";
import { createSetupPaths } from "../paths";
import { createPlatformDescriptor } from "../platform";
import type { FakeRunner } from "./helpers";
import { commandLines, createFakeDownloader, createFakeRunner, existsUnder, makeTempDir, muteConsole, noConda, removeDir, touch } from "./helpers";

const envConfig = JSON.stringify({
  environments: {
    envA: { python: "3.10", packages: { conda: ["numpy"], pip: ["requests"] }, channels: ["conda-forge"] },
  },
});

describe("command line entry points", () => {
  let home: string;
  let runner: FakeRunner;

  const deps = (overrides: Partial<CliDeps> = {}): CliDeps => ({
    runner,
    paths: createSetupPaths(home),
    platform: createPlatformDescriptor("linux", "x86_64"),
    downloader: createFakeDownloader(),
    cwd: home,
    exists: existsUnder(home),
    ...overrides,
  });

  beforeEach(() => {
    home = makeTempDir();
    runner = createFakeRunner();
    muteConsole();
  });

  afterEach(() => {
    removeDir(home);
  });

  // ==========================================================================
  // setup_conda
  // ==========================================================================
  describe("setup_conda", () => {
    it("lists the built-in environments once conda answers", async () => {
      const code = await runSetupConda(["node", "setup_conda", "list"], deps());

      expect(code).toBe(0);
      expect(console.log).toHaveBeenCalledWith("  - torchpy310 (Python 3.10)");
      expect(console.log).toHaveBeenCalledWith("  - torchpy311 (Python 3.11)");
      expect(commandLines(runner)).toEqual(["conda --version"]);
    });

    it("exits 1 for list when conda is missing", async () => {
      runner = createFakeRunner(noConda);

      const code = await runSetupConda(["node", "setup_conda", "list"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Error: conda is not installed or not in PATH");
      expect(console.log).not.toHaveBeenCalledWith("Available environments:");
    });

    it("keeps digit-only environment names as typed", async () => {
      touch(path.join(home, "envs.json"), JSON.stringify({ environments: { "2024": { python: "3.12" } } }));
      touch(path.join(home, "miniconda3", "etc", "profile.d", "conda.sh"));

      const code = await runSetupConda(["node", "setup_conda", "setup", "--env", "2024", "-c", "envs.json"], deps());

      expect(code).toBe(0);
      expect(commandLines(runner)).toEqual(["conda --version", "conda create -n 2024 python=3.12 -y"]);
      expect(fs.existsSync(path.join(home, "activate_2024.sh"))).toBe(true);
    });

    it("exits 1 when an option is given twice", async () => {
      touch(path.join(home, "envs.json"), envConfig);

      const code = await runSetupConda(["node", "setup_conda", "setup", "-e", "envA", "--env", "envB", "-c", "envs.json"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Error: --env: expected a single value, got 2");
      expect(runner.calls).toEqual([]);
    });

    it("sets up a configured environment and writes its activation script", async () => {
      touch(path.join(home, "envs.json"), envConfig);
      const condaScript = touch(path.join(home, "miniconda3", "etc", "profile.d", "conda.sh"));

      const code = await runSetupConda(["node", "setup_conda", "setup", "--env", "envA", "--config", "envs.json"], deps());

      expect(code).toBe(0);
      expect(commandLines(runner)).toEqual([
        "conda --version",
        "conda create -n envA python=3.10 -y",
        "conda install -n envA numpy -c conda-forge -y",
        "conda run -n envA pip install requests",
      ]);
      const script = fs.readFileSync(path.join(home, "activate_envA.sh"), "utf-8").split("\n");
      expect(script).toContain(`source "${condaScript}"`);
      expect(script).toContain("conda activate envA");
    });

    it("writes scripts under --root", async () => {
      touch(path.join(home, "miniconda3", "etc", "profile.d", "conda.sh"));

      const code = await runSetupConda(["node", "setup_conda", "create-script", "-e", "torchpy311", "--root", "out"], deps());

      expect(code).toBe(0);
      expect(fs.existsSync(path.join(home, "out", "activate_torchpy311.sh"))).toBe(true);
    });

    it("exits 1 for an unknown environment without calling conda", async () => {
      touch(path.join(home, "envs.json"), envConfig);

      const code = await runSetupConda(["node", "setup_conda", "setup", "--env", "envZ", "-c", "envs.json"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Error: Environment 'envZ' not found in configuration");
      expect(runner.calls).toEqual([]);
    });

    it("exits 1 when conda is missing", async () => {
      runner = createFakeRunner(noConda);

      const code = await runSetupConda(["node", "setup_conda", "setup"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Error: conda is not installed or not in PATH");
    });

    it("exits 1 for an unknown action", async () => {
      const code = await runSetupConda(["node", "setup_conda", "remove"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Error: Expected one action: setup, list, create-script");
    });

    it("exits 1 for an invalid configuration file", async () => {
      touch(path.join(home, "envs.json"), "{");

      const code = await runSetupConda(["node", "setup_conda", "list", "-c", "envs.json"], deps());

      expect(code).toBe(1);
    });
  });

  // ==========================================================================
  // install_conda
  // ==========================================================================
  describe("install_conda", () => {
    it("succeeds without downloading when conda is on PATH", async () => {
      const downloader = createFakeDownloader();

      const code = await runInstallConda(["node", "install_conda"], deps({ downloader }));

      expect(code).toBe(0);
      expect(downloader.urls).toEqual([]);
      expect(console.log).toHaveBeenCalledWith("Conda is already installed and accessible!");
    });

    it("warns when conda exists but is not on PATH", async () => {
      runner = createFakeRunner(noConda);
      const condaScript = touch(path.join(home, "miniconda3", "etc", "profile.d", "conda.sh"));

      const code = await runInstallConda(["node", "install_conda"], deps());

      expect(code).toBe(0);
      expect(console.warn).toHaveBeenCalledWith(`  source "${condaScript}"`);
    });

    it("installs into a digit-only directory exactly as typed", async () => {
      runner = createFakeRunner(noConda);

      const code = await runInstallConda(["node", "install_conda", "--dir", "010"], deps());

      expect(code).toBe(0);
      expect(commandLines(runner)).toEqual(["conda --version", `bash ${path.join(home, "miniconda_installer.sh")} -b -p ${path.join(home, "010")}`]);
    });

    it("exits 1 for an unknown installer type", async () => {
      const code = await runInstallConda(["node", "install_conda", "--type", "mambaforge"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Error: --type: Invalid enum value"));
      expect(runner.calls).toEqual([]);
    });

    it("exits 1 on unsupported platforms", async () => {
      runner = createFakeRunner(noConda);

      const code = await runInstallConda(["node", "install_conda", "-t", "anaconda"], deps({ platform: createPlatformDescriptor("linux", "ppc64le") }));

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith("Error: Unsupported system: linux ppc64le (anaconda)");
    });
  });

  // ==========================================================================
  // install_requirements
  // ==========================================================================
  describe("install_requirements", () => {
    it("exits 1 when the manifest is missing", async () => {
      const code = await runInstallRequirements(["node", "install_requirements"], deps());

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(`Error: ${path.join(home, "requirements.txt")} not found!`);
      expect(runner.calls).toEqual([]);
    });

    it("installs a manifest relative to the working directory", async () => {
      const manifest = touch(path.join(home, "reqs", "dev.txt"), "pytest\n");

      const code = await runInstallRequirements(["node", "install_requirements", "-r", "reqs/dev.txt", "-p", "/usr/bin/python3"], deps());

      expect(code).toBe(0);
      expect(commandLines(runner)).toEqual([`/usr/bin/python3 -m pip install -r ${manifest}`]);
    });

    it("prints help and exits 0", async () => {
      const code = await runInstallRequirements(["node", "install_requirements", "--help"], deps());

      expect(code).toBe(0);
      expect(runner.calls).toEqual([]);
    });
  });

  // ==========================================================================
  // conda_bootstrap
  // ==========================================================================
  describe("conda_bootstrap", () => {
    it("runs the whole setup and points at the generated scripts", async () => {
      touch(path.join(home, "envs.json"), envConfig);
      touch(path.join(home, "miniconda3", "etc", "profile.d", "conda.sh"));

      const code = await runBootstrap(["node", "conda_bootstrap", "--skip-conda", "-e", "envA", "-c", "envs.json"], deps());

      expect(code).toBe(0);
      expect(commandLines(runner)).toEqual([
        "conda --version",
        "conda create -n envA python=3.10 -y",
        "conda install -n envA numpy -c conda-forge -y",
        "conda run -n envA pip install requests",
      ]);
      expect(console.log).toHaveBeenCalledWith(`2. Activate environment: source ${path.join(home, "activate.sh")}`);
      expect(console.log).toHaveBeenCalledWith(`3. Load aliases: source ${path.join(home, "aliases.sh")}`);
      expect(fs.statSync(path.join(home, "models")).isDirectory()).toBe(true);
    });
  });
});
