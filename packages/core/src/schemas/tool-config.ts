import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "warn" as const,
    pretty: true,
  },
  digest: {
    algorithm: "sha256" as const,
  },
  walk: {
    symlinks: "within-root" as const,
    concurrency: 1,
  },
};

export const LogLevel = z.enum([
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

export const DigestAlgorithmSchema = z.enum(["sha256", "blake2b"]);

export const SymlinkPolicySchema = z
  .enum(["within-root", "never"])
  .describe(
    "within-root: index symlinked files whose target lies inside the root; never: skip all symlinks",
  );

export const ToolConfigSchema = z.object({
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  digest: z
    .object({
      algorithm: DigestAlgorithmSchema.default(DEFAULTS.digest.algorithm),
    })
    .default(DEFAULTS.digest),
  walk: z
    .object({
      symlinks: SymlinkPolicySchema.default(DEFAULTS.walk.symlinks),
      concurrency: z
        .number()
        .int()
        .min(1)
        .max(64)
        .default(DEFAULTS.walk.concurrency),
    })
    .default(DEFAULTS.walk),
});

export type ToolConfig = z.infer<typeof ToolConfigSchema>;
export type LoggingConfig = ToolConfig["logging"];
export type LogLevel = z.infer<typeof LogLevel>;
export type DigestAlgorithm = z.infer<typeof DigestAlgorithmSchema>;
export type SymlinkPolicy = z.infer<typeof SymlinkPolicySchema>;
