import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_HOME_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured home path (or default) to an absolute path.
 */
export function resolveHomePath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_HOME_PATH));
}

/** Config file location: explicit path first, then `<home>/config.json`. */
export function resolveConfigPath(options?: {
  configPath?: string;
  homePath?: string;
}): string {
  if (options?.configPath !== undefined) {
    return resolve(expandHomePath(options.configPath));
  }
  return join(resolveHomePath(options?.homePath), "config.json");
}
