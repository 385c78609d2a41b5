import { Command } from "commander";
import { logger } from "../../infra/logger.js";
import { Project } from "../../core/project/project.js";
import { ProjectRepository } from "../../core/project/project-repository.js";
import { StackExchangeClient } from "../../core/fetch/stack-exchange-client.js";
import { StackOverflowFetcher } from "../../core/fetch/stack-overflow.js";
import { loadConfig, expandPath } from "../config/loader.js";

interface FetchOptions {
  fill: boolean;
}

export function createFetchCommand(): Command {
  return new Command("fetch")
    .description("Collect Stack Overflow activity for a project, by quarter")
    .argument("<project>", "Project name, used as the Stack Overflow tag")
    .option("--no-fill", "Keep missing quarters instead of filling them with empty buckets")
    .action(async (name: string, options: FetchOptions) => {
      try {
        await runFetch(name, options);
      } catch (error) {
        logger.error(`Fetch failed for ${name}`, error);
        process.exit(1);
      }
    });
}

async function runFetch(name: string, options: FetchOptions): Promise<void> {
  const config = loadConfig();
  const repository = new ProjectRepository(expandPath(config.dataDir));
  const project = repository.load(name) ?? new Project(name);

  const client = new StackExchangeClient({
    baseUrl: config.stackExchange.baseUrl,
    key: config.stackExchange.key,
    retry: config.retry,
  });

  logger.info(`Fetching Stack Overflow activity for ${name}`);
  await new StackOverflowFetcher(project, client, { site: config.stackExchange.site }).process();

  if (options.fill) {
    project.fillGaps();
  }

  const path = repository.save(project);
  logger.success(`Saved ${project.community.quarters.size} quarters of ${name} to ${path}`);
}
