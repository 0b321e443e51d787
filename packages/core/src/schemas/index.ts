export {
  DEFAULTS,
  LogLevel,
  DigestAlgorithmSchema,
  SymlinkPolicySchema,
  ToolConfigSchema,
  type ToolConfig,
  type LoggingConfig,
  type DigestAlgorithm,
  type SymlinkPolicy,
} from "./tool-config.js";
