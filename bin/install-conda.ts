#!/usr/bin/env node
import { runInstallConda } from "../cli/install-conda";
import { defaultDeps } from "../cli/shared";

process.exitCode = await runInstallConda(process.argv, defaultDeps());
