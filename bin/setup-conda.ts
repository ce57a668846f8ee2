#!/usr/bin/env node
import { runSetupConda } from "../cli/setup-conda";
import { defaultDeps } from "../cli/shared";

process.exitCode = await runSetupConda(process.argv, defaultDeps());
