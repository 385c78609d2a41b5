import { existsSync } from "node:fs";
import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import type { Config } from "../../types/config.js";
import { loadConfig, saveConfig, getConfigPath, getDefaultConfig } from "../config/loader.js";

export function redactConfig(config: Config): Config {
  if (config.stackExchange.key === undefined) {
    return config;
  }
  return { ...config, stackExchange: { ...config.stackExchange, key: "***" } };
}

export function createConfigCommand(): Command {
  const command = new Command("config").description("View and manage configuration");

  command
    .command("show")
    .description("Show resolved configuration")
    .option("--json", "Output as JSON", false)
    .action((options: { json: boolean }) => {
      const config = redactConfig(loadConfig());

      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      logger.header("Quarterly Metrics - Configuration");
      console.error(pc.dim(`Config file: ${getConfigPath()}`));
      console.error("");
      console.error(JSON.stringify(config, null, 2));
    });

  command
    .command("init")
    .description("Write a configuration file with defaults")
    .option("-f, --force", "Overwrite existing configuration", false)
    .action((options: { force: boolean }) => {
      const configPath = getConfigPath();

      if (!options.force && existsSync(configPath)) {
        console.error(pc.yellow(`Config already exists at ${configPath}`));
        console.error(pc.dim("Use --force to overwrite"));
        return;
      }

      saveConfig(getDefaultConfig());
      console.error(pc.dim(`\nEdit ${configPath} to customize settings`));
    });

  command
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      console.log(getConfigPath());
    });

  return command;
}
