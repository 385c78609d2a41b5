import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { SnapshotError } from "../../infra/errors.js";
import { logger } from "../../infra/logger.js";
import { Project, type ProjectOptions } from "./project.js";

const log = logger.child("projects");

export function projectSlug(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Stores project snapshots as one JSON file each under `<dataDir>/projects`.
 */
export class ProjectRepository {
  private readonly projectsDir: string;

  constructor(
    dataDir: string,
    private readonly options: ProjectOptions = {}
  ) {
    this.projectsDir = join(dataDir, "projects");
  }

  pathFor(name: string): string {
    const slug = projectSlug(name);
    if (slug === "") {
      throw new SnapshotError(`Project name "${name}" has no usable characters`);
    }
    return join(this.projectsDir, `${slug}.json`);
  }

  save(project: Project): string {
    if (!existsSync(this.projectsDir)) {
      mkdirSync(this.projectsDir, { recursive: true });
      log.debug(`Created projects directory: ${this.projectsDir}`);
    }

    const path = this.pathFor(project.name);
    writeFileSync(path, JSON.stringify(project.toSnapshot(), null, 2));
    log.debug(`Saved project ${project.name} to ${path}`);
    return path;
  }

  load(name: string): Project | undefined {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      return undefined;
    }
    return this.loadFile(path);
  }

  list(): string[] {
    if (!existsSync(this.projectsDir)) {
      return [];
    }
    return readdirSync(this.projectsDir)
      .filter((file) => file.endsWith(".json"))
      .sort()
      .map((file) => this.loadFile(join(this.projectsDir, file)).name);
  }

  private loadFile(path: string): Project {
    let content: unknown;
    try {
      content = JSON.parse(readFileSync(path, "utf-8")) as unknown;
    } catch (error) {
      throw new SnapshotError(
        `Failed to read project file: ${path}`,
        error instanceof Error ? error : undefined
      );
    }
    return Project.fromSnapshot(content, this.options);
  }
}
