import { InvalidArgumentError, ProjectNotFoundError } from "../../infra/errors.js";
import { PROJECT_SECTIONS, type Project, type ProjectSection } from "../../core/project/project.js";
import type { ProjectRepository } from "../../core/project/project-repository.js";
import type { DateInput } from "../../core/quarters/quarter-key.js";

/** `YYYY-MM-DD` stays a calendar date; a longer run of digits is epoch seconds */
export function parseDateArgument(value: string): DateInput {
  return /^\d{5,}$/.test(value) ? Number(value) : value;
}

export function parseSection(value: string): ProjectSection {
  const section = PROJECT_SECTIONS.find((candidate) => candidate === value);
  if (section === undefined) {
    throw new InvalidArgumentError(
      `Invalid section: ${value}. Valid: ${PROJECT_SECTIONS.join(", ")}`
    );
  }
  return section;
}

export function parseOffset(value: string): number {
  const offset = Number(value);
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidArgumentError(`Offset must be a non-negative integer, got ${value}`);
  }
  return offset;
}

export function requireProject(repository: ProjectRepository, name: string): Project {
  const project = repository.load(name);
  if (project === undefined) {
    throw new ProjectNotFoundError(name);
  }
  return project;
}

export function formatEpoch(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace(".000Z", "Z");
}
