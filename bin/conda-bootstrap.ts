#!/usr/bin/env node
import { runBootstrap } from "../cli/bootstrap";
import { defaultDeps } from "../cli/shared";

process.exitCode = await runBootstrap(process.argv, defaultDeps());
