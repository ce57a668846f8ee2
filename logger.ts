import createDebug from "debug";

const NAMESPACE = "conda-bootstrap";

/**
 * Debug loggers for different modules
 *
 * Usage:
 *   import { log } from "./logger";
 *   log.runner("Executing: %s %o", command, args);
 *
 * Enable logs via environment variable:
 *   DEBUG=conda-bootstrap:* setup_conda list          # all logs
 *   DEBUG=conda-bootstrap:runner install_conda        # subprocesses only
 *
 * Or pass --verbose to any of the binaries.
 */
export const log = {
  runner: createDebug(`${NAMESPACE}:runner`),
  config: createDebug(`${NAMESPACE}:config`),
  download: createDebug(`${NAMESPACE}:download`),
  installer: createDebug(`${NAMESPACE}:installer`),
  environments: createDebug(`${NAMESPACE}:environments`),
  requirements: createDebug(`${NAMESPACE}:requirements`),
  project: createDebug(`${NAMESPACE}:project`),
  cli: createDebug(`${NAMESPACE}:cli`),
};

export function enableLogs(namespaces: string = `${NAMESPACE}:*`): void {
  createDebug.enable(namespaces);
}

export function disableLogs(): void {
  createDebug.disable();
}

export function isLogEnabled(namespace: string): boolean {
  return createDebug.enabled(namespace);
}
