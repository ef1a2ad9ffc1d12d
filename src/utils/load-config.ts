/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ZodError } from "zod";
import type { ConversionConfig, PartialConversionConfig } from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";
import { ConfigError } from "./errors";
import { fileExists } from "./file-exists";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("txt2tex", { suffix: "" });

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/txt2tex/config.json or ~/.config/txt2tex/config.json
 * - macOS: ~/Library/Preferences/txt2tex/config.json
 * - Windows: %APPDATA%\txt2tex\config.json
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read a config file and validate it against the given schema
 * JSON syntax and schema errors surface as ConfigError
 */
async function readConfigFile<T>(
  path: string,
  parse: (value: unknown) => T,
): Promise<T> {
  const content = await readFile(path, "utf-8");
  try {
    return parse(JSON.parse(content));
  } catch (error) {
    throw new ConfigError(path, describeError(error));
  }
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  return readConfigFile(defaultConfigPath, (value) =>
    ConversionConfigSchema.parse(value),
  );
}

function loadPartialConfig(path: string): Promise<PartialConversionConfig> {
  return readConfigFile(path, (value) =>
    PartialConversionConfigSchema.parse(value),
  );
}

/**
 * Merge a partial config over a complete one, section by section
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    markup: { ...base.markup, ...override.markup },
    language: { ...base.language, ...override.language },
    template: { ...base.template, ...override.template },
    typesetter: { ...base.typesetter, ...override.typesetter },
    logging: { ...base.logging, ...override.logging },
  };
}

export interface LoadConfigResult {
  config: ConversionConfig;
  // Problems with the user config file; it is skipped, not fatal
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 *
 * A broken user config is reported and skipped. A custom config was asked
 * for explicitly, so any problem with it is thrown.
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push(
        error instanceof ConfigError
          ? error
          : new ConfigError(userConfigPath, describeError(error)),
      );
    }
  }

  if (custom) {
    let customConfig: PartialConversionConfig;
    try {
      customConfig = await loadPartialConfig(custom);
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      throw new ConfigError(custom, describeError(error));
    }
    config = mergeConfig(config, customConfig);
  }

  return { config, errors };
}
