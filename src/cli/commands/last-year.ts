import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import type { MetricsSnapshot } from "../../types/metrics.js";
import { ProjectRepository } from "../../core/project/project-repository.js";
import { loadConfig, expandPath } from "../config/loader.js";
import { parseOffset, parseSection, requireProject } from "./shared.js";

interface LastYearOptions {
  section: string;
  offset?: string;
  strict: boolean;
  json: boolean;
}

export function createLastYearCommand(): Command {
  return new Command("last-year")
    .description("Show trailing-year aggregates of a stored project")
    .argument("<project>", "Project name")
    .option("-s, --section <section>", "Metrics section (community, agility)", "community")
    .option("-o, --offset <quarters>", "Quarters to skip before the trailing year ends")
    .option("--strict", "Fail when fewer than 4 + offset quarters are stored", false)
    .option("--json", "Output as JSON", false)
    .action((name: string, options: LastYearOptions) => {
      try {
        runLastYear(name, options);
      } catch (error) {
        logger.error("Last-year aggregation failed", error);
        process.exit(1);
      }
    });
}

function runLastYear(name: string, options: LastYearOptions): void {
  const config = loadConfig();
  const section = parseSection(options.section);
  const offset =
    options.offset === undefined ? config.aggregation.offset : parseOffset(options.offset);
  const project = requireProject(new ProjectRepository(expandPath(config.dataDir)), name);

  const record = project
    .quarters(section)
    .lastYearAsRecord(offset, { strict: options.strict || config.aggregation.strict });

  if (options.json) {
    console.log(JSON.stringify(record, null, 2));
    return;
  }

  logger.header(`${name} - ${section}, trailing year (offset ${offset})`);
  console.log(renderRecord(record));
}

export function renderRecord(record: MetricsSnapshot): string {
  const width = Math.max(0, ...Object.keys(record).map((name) => name.length));
  return Object.entries(record)
    .map(([name, value]) => `  ${name.padEnd(width)}  ${value}`)
    .join("\n");
}
