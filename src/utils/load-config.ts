import { readFile } from "fs/promises";
import { join } from "path";
import envPaths from "env-paths";
import defaultConfig from "../config/default.json";
import type { DecorportConfig, PartialDecorportConfig } from "../types";
import { DecorportConfigSchema, PartialDecorportConfigSchema } from "../types";
import { fileExists } from "./fs";

const paths = envPaths("decorport", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Load default configuration with Zod validation
 */
export function loadDefaultConfig(): DecorportConfig {
  return DecorportConfigSchema.parse(defaultConfig);
}

async function loadPartialConfig(configPath: string): Promise<PartialDecorportConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialDecorportConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialDecorportConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: DecorportConfig,
  override: PartialDecorportConfig,
): DecorportConfig {
  return {
    ...base,
    ...override,
    archive: { ...base.archive, ...override.archive },
    convert: { ...base.convert, ...override.convert },
    scan: { ...base.scan, ...override.scan },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: DecorportConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
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
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
