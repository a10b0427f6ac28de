/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./fs";
import type {
  ConfigError,
  ConversionConfig,
  PartialConversionConfig,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("mdsite", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/mdsite or ~/.config/mdsite
 * - macOS: ~/Library/Preferences/mdsite
 * - Windows: %APPDATA%\mdsite
 */
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

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is not valid JSON or does not match the schema
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConversionConfigSchema.parse(parsed);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: override.input ?? base.input,
    output: override.output ?? base.output,
    templates: { ...base.templates, ...override.templates },
    markdown: { ...base.markdown, ...override.markdown },
    tokens: { ...base.tokens, ...override.tokens },
    breadcrumbs: { ...base.breadcrumbs, ...override.breadcrumbs },
    files: { ...base.files, ...override.files },
    watch: { ...base.watch, ...override.watch },
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
 * A config file that fails to load or validate is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
