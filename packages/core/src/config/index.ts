export {
  HOME_PATH_ENV,
  DEFAULT_HOME_PATH,
  DEFAULT_CONFIG_PATH,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveHomePath, resolveConfigPath } from "./paths.js";
