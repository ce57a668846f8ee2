#!/usr/bin/env node
import { runInstallRequirements } from "../cli/install-requirements";
import { defaultDeps } from "../cli/shared";

process.exitCode = await runInstallRequirements(process.argv, defaultDeps());
