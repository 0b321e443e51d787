import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { ToolConfigSchema, type ToolConfig } from "../schemas/tool-config.js";
import { ConfigError, isErrnoException, toIoError } from "../errors/catalog.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  homePath?: string;
}

/**
 * Reads and validates the config file. A missing file yields the defaults;
 * nothing is written back.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ToolConfig> {
  const configPath = resolveConfigPath(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      // File doesn't exist — defaults apply
    } else {
      throw toIoError(err, configPath);
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      throw new ConfigError(
        configPath,
        err instanceof Error ? err.message : "malformed JSON",
      );
    }
  }

  const result = ToolConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new ConfigError(
      configPath,
      issues.map((i) => `${i.path || "<root>"}: ${i.message}`).join("; "),
      { issues },
    );
  }
  return result.data;
}

export async function saveConfig(
  config: ToolConfig,
  options?: LoadConfigOptions,
): Promise<string> {
  const configPath = resolveConfigPath(options);
  try {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
  } catch (err: unknown) {
    throw toIoError(err, configPath);
  }
  return configPath;
}
