/**
 * CLI settings from global options and the environment
 *
 * Options win over environment variables:
 *   --root     ANNOSTORE_ROOT       (default ./data)
 *   --user     ANNOSTORE_USER       (default: act as the superuser)
 *   --verbose  ANNOSTORE_CLI_DEBUG  ("1" or "true")
 *              ANNOSTORE_BASE_URL   base of the identifiers in output
 */

import * as path from "node:path";
import { homedir } from "node:os";

const DEFAULT_ROOT = "./data";

export interface GlobalOptions {
  root?: string;
  user?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliSettings {
  /** Absolute data directory */
  root: string;
  user?: string;
  baseUrl?: string;
  verbose: boolean;
}

/**
 * Expand a leading `~` or `~/`; `~user` forms are left alone
 */
export function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(homedir(), input.slice(2));
  }
  return input;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.ANNOSTORE_CLI_DEBUG?.trim().toLowerCase();
  return flag === "1" || flag === "true";
}

export function resolveCliSettings(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CliSettings {
  const root = nonEmpty(options.root) ?? nonEmpty(env.ANNOSTORE_ROOT) ?? DEFAULT_ROOT;
  return {
    root: path.resolve(expandTilde(root)),
    user: nonEmpty(options.user) ?? nonEmpty(env.ANNOSTORE_USER),
    baseUrl: nonEmpty(env.ANNOSTORE_BASE_URL),
    verbose: Boolean(options.verbose) || isVerbose(env),
  };
}
