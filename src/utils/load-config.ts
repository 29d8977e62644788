import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  UpdaterConfig,
  PartialUpdaterConfig,
  ConfigError,
} from "../types";
import { UpdaterConfigSchema, PartialUpdaterConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Linux: $XDG_CONFIG_HOME/spindle-speed-updater, macOS: ~/Library/Preferences/..., Windows: %APPDATA%\...
const paths = envPaths("spindle-speed-updater", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<UpdaterConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return UpdaterConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialUpdaterConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialUpdaterConfigSchema.parse(JSON.parse(content));
}

/**
 * Merge a partial layer over a complete config, section by section.
 * The merged speed range is re-validated so a layer cannot invert it.
 */
export function mergeConfig(
  base: UpdaterConfig,
  override: PartialUpdaterConfig,
): UpdaterConfig {
  return UpdaterConfigSchema.parse({
    speed: { ...base.speed, ...override.speed },
    scan: { ...base.scan, ...override.scan },
    locator: { ...base.locator, ...override.locator },
    batch: { ...base.batch, ...override.batch },
    logging: { ...base.logging, ...override.logging },
  });
}

interface LoadConfigResult {
  config: UpdaterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported in errors
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
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
