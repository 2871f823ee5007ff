/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists } from "./file-exists";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { Tracker } from "./conversion-tracker";
