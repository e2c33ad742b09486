export {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  resolveBinarySettings,
} from "./config-loader.js";
export { validateConfig } from "./config-validator.js";
export type { BinaryConfig, DumpConfig, LoadedConfig } from "./types.js";
