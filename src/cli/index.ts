#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import {
  createIntervalsCommand,
  createFetchCommand,
  createLastYearCommand,
  createPreviewCommand,
  createConfigCommand,
} from "./commands/index.js";
import { logger } from "../infra/logger.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("quarterly-metrics")
  .description(pc.cyan("Quarter-bucketed activity metrics for open source projects"))
  .version(VERSION, "-V, --version", "Output the version number")
  .option("-v, --verbose", "Enable verbose output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ verbose?: boolean }>();
    if (opts.verbose || process.env["QUARTERLY_METRICS_VERBOSE"] === "true") {
      logger.configure({ level: "debug", verbose: true });
    }
  });

program.addCommand(createIntervalsCommand());
program.addCommand(createFetchCommand());
program.addCommand(createLastYearCommand());
program.addCommand(createPreviewCommand());
program.addCommand(createConfigCommand());

program.exitOverride((err) => {
  if (err.code === "commander.help" || err.code === "commander.helpDisplayed") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  logger.error(`Command failed: ${err.message}`);
  process.exit(1);
});

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", error instanceof Error ? error : undefined);
  process.exit(1);
});
