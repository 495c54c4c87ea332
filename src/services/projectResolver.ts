import { ProjectResolutionError } from "../domain/errors";
import type { Settings } from "./configService";
import type { ParsedOptions } from "./optionParser";

export type ProjectSelection = Pick<ParsedOptions, "project" | "projectId">;

/**
 * Effective project id: a `--project` name from the table, else `--project-id`
 * verbatim, else the configured default project's id (possibly undefined).
 */
export function resolveProject(options: ProjectSelection, settings: Settings): number | undefined {
  if (options.project !== undefined) {
    const id = settings.projects.get(options.project);
    if (id === undefined) {
      throw new ProjectResolutionError(options.project);
    }
    return id;
  }
  if (options.projectId !== undefined) {
    return options.projectId;
  }
  if (settings.defaultProject === undefined) {
    return undefined;
  }
  return settings.projects.get(settings.defaultProject);
}
