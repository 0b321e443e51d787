import { join } from "node:path";
import { homedir } from "node:os";

export const HOME_PATH_ENV = "TREETOOL_HOME";
export const DEFAULT_HOME_PATH = join(homedir(), ".treetool");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_HOME_PATH, "config.json");
