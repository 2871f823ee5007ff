import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./file-exists";
import type {
  ConversionConfig,
  ConfigError,
  PartialConversionConfig,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("ff-gcode-post", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConversionConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConversionConfigSchema.parse(parsed);
}

/**
 * Load user configuration from the OS-specific directory
 * Throws if the file exists but is invalid
 */
async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge two configs
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    markers: {
      header: override.markers?.header ?? base.markers.header,
      config: override.markers?.config ?? base.markers.config,
      thumbnail: override.markers?.thumbnail ?? base.markers.thumbnail,
      executable: override.markers?.executable ?? base.markers.executable,
    },
    triggers: { ...base.triggers, ...override.triggers },
    subroutines: { ...base.subroutines, ...override.subroutines },
    backup: { ...base.backup, ...override.backup },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/ff-gcode-post or ~/.config/ff-gcode-post
 * - macOS: ~/Library/Preferences/ff-gcode-post
 * - Windows: %APPDATA%\ff-gcode-post
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
