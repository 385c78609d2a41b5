import { existsSync, readFileSync, mkdirSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ConfigSchema, type Config } from "../../types/config.js";
import { ConfigurationError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";

loadEnv();

const DEFAULT_CONFIG_DIR = join(homedir(), ".quarterly-metrics");
const CONFIG_FILE_NAME = "config.json";

// Shape checked before merging; field values are validated by ConfigSchema afterwards
const ConfigFileSchema = z
  .object({ stackExchange: z.record(z.unknown()).optional() })
  .passthrough();

type ConfigInput = z.infer<typeof ConfigFileSchema>;

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return expandPath(env["QUARTERLY_METRICS_DATA_DIR"] ?? DEFAULT_CONFIG_DIR);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), CONFIG_FILE_NAME);
}

export function ensureConfigDir(): void {
  const configDir = getConfigDir();
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    logger.debug(`Created config directory: ${configDir}`);
  }
}

function readConfigFile(configPath: string): ConfigInput {
  if (!existsSync(configPath)) {
    return {};
  }
  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    const config = ConfigFileSchema.parse(parsed);
    logger.debug(`Loaded config from ${configPath}`);
    return config;
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse config file: ${configPath}`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Resolve configuration: defaults < `<dataDir>/config.json` < environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const fileConfig = readConfigFile(getConfigPath(env));
  const envConfig: ConfigInput = {};

  if (env["QUARTERLY_METRICS_DATA_DIR"]) {
    envConfig.dataDir = env["QUARTERLY_METRICS_DATA_DIR"];
  }

  if (env["QUARTERLY_METRICS_VERBOSE"] === "true") {
    envConfig.verbose = true;
  }

  const stackExchange = { ...fileConfig.stackExchange };
  if (env["STACKEXCHANGE_KEY"]) {
    stackExchange["key"] = env["STACKEXCHANGE_KEY"];
  }

  const merged = { ...fileConfig, ...envConfig, stackExchange };

  const result = ConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigurationError(`Invalid configuration: ${errors}`);
  }

  return result.data;
}

export function saveConfig(config: Partial<Config>): void {
  ensureConfigDir();
  const configPath = getConfigPath();
  const merged = { ...readConfigFile(configPath), ...config };
  writeFileSync(configPath, JSON.stringify(merged, null, 2));
  logger.success(`Config saved to ${configPath}`);
}

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}
