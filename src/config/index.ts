import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { dirname, join, resolve } from "path";
import { Config, ConfigSchema, DEFAULT_CONFIG } from "./schema.js";

const CONFIG_FILENAME = ".notehook.json";

/** Default config location; `--config` overrides it. */
export function getConfigPath(): string {
  return join(homedir(), CONFIG_FILENAME);
}

const HOME_PREFIXES = ["~/", "$HOME/"];

export function expandPath(path: string): string {
  const prefix = HOME_PREFIXES.find((candidate) => path.startsWith(candidate));
  return prefix ? join(homedir(), path.slice(prefix.length)) : resolve(path);
}

export function configExists(configPath: string = getConfigPath()): boolean {
  return existsSync(expandPath(configPath));
}

/**
 * Read and validate the config. A missing file means every default; fields
 * left out of the file take their defaults too. Schema violations surface
 * as the ZodError.
 */
export function loadConfig(configPath: string = getConfigPath()): Config {
  const path = expandPath(configPath);
  if (!existsSync(path)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${path}`, { cause: error });
    }
    throw error;
  }

  return ConfigSchema.parse(parsed);
}

export function saveConfig(config: Config, configPath: string = getConfigPath()): void {
  const path = expandPath(configPath);
  const validated = ConfigSchema.parse(config);
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(validated, null, 2) + "\n");
}

/**
 * Write the default configuration. Returns false, leaving the file alone,
 * when a config already exists at the path.
 */
export function createConfig(configPath: string = getConfigPath()): boolean {
  if (configExists(configPath)) {
    return false;
  }
  saveConfig(DEFAULT_CONFIG, configPath);
  return true;
}

export function getWorkDirectory(config: Config): string {
  return expandPath(config.workdir);
}

export * from "./schema.js";
