import { Command } from "commander";
import pc from "picocolors";
import { logger } from "../../infra/logger.js";
import type { MetricsContainer, MetricsSnapshot } from "../../types/metrics.js";
import { ProjectRepository } from "../../core/project/project-repository.js";
import { formatQuarter } from "../../core/quarters/quarter-key.js";
import type { QuartersStore } from "../../core/quarters/quarters-store.js";
import { loadConfig, expandPath } from "../config/loader.js";
import { parseSection, requireProject } from "./shared.js";

interface PreviewOptions {
  section: string;
  reverse: boolean;
  json: boolean;
}

export interface PreviewRow {
  quarter: string;
  start: number;
  metrics: MetricsSnapshot;
}

export function createPreviewCommand(): Command {
  return new Command("preview")
    .description("Show the quarterly series of a stored project")
    .argument("<project>", "Project name")
    .option("-s, --section <section>", "Metrics section (community, agility)", "community")
    .option("-r, --reverse", "Newest quarter first", false)
    .option("--json", "Output as JSON", false)
    .action((name: string, options: PreviewOptions) => {
      try {
        runPreview(name, options);
      } catch (error) {
        logger.error("Preview failed", error);
        process.exit(1);
      }
    });
}

export function previewRows(
  store: QuartersStore<MetricsContainer>,
  reverse: boolean
): PreviewRow[] {
  const toRow = (start: number, quarter: MetricsContainer): PreviewRow => ({
    quarter: formatQuarter(start),
    start,
    metrics: quarter.toRecord(),
  });
  return reverse ? store.reverseEachSorted(toRow) : store.eachSorted(toRow);
}

function runPreview(name: string, options: PreviewOptions): void {
  const config = loadConfig();
  const section = parseSection(options.section);
  const project = requireProject(new ProjectRepository(expandPath(config.dataDir)), name);
  const rows = previewRows(project.quarters(section), options.reverse);

  if (options.json) {
    console.log(JSON.stringify(rows, null, 2));
    return;
  }

  logger.header(`${name} - ${section}`);
  for (const row of rows) {
    const values = Object.entries(row.metrics)
      .filter(([, value]) => value !== 0)
      .map(([metric, value]) => `${metric}=${value}`);
    console.log(`${pc.cyan(row.quarter)}  ${values.length > 0 ? values.join(", ") : pc.dim("-")}`);
  }
}
