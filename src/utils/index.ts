/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists, isExecutable } from "./file-exists";
export { findBinary } from "./find-binary";

// Process utilities
export { runCommand } from "./run-command";
export type { CommandOptions, CommandResult } from "./run-command";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";
export type { LoadConfigResult } from "./load-config";

// Errors
export {
  Txt2TexError,
  InputError,
  EncodingError,
  TemplateError,
  ConfigError,
  TypesetError,
} from "./errors";

// Classes
export { Logger } from "./logger";
