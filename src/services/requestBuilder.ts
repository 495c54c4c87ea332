import type { Action, ActionRequest, DisplayOptions } from "../domain/actions";
import { UsageError } from "../domain/errors";
import type { StoryFields } from "../domain/types";
import type { Settings } from "./configService";
import type { ParsedOptions } from "./optionParser";

type ActionCheck = [Exclude<Action, "all-stories">, (options: ParsedOptions) => boolean];

// Checked in order; the first action flag present wins.
const ACTION_CHECKS: ActionCheck[] = [
  ["list-projects", (options) => options.listProjects],
  ["show-project", (options) => options.showProject],
  ["show-story", (options) => options.showStory],
  ["search", (options) => options.search !== undefined],
  ["add-story", (options) => options.addStory],
  ["update-story", (options) => options.updateStory],
  ["delete-story", (options) => options.deleteStory],
  ["add-note", (options) => options.addNote !== undefined],
];

export const EMPTY_UPDATE_MESSAGE = "Cannot update a story, without specifying what to update.";
export const NO_PROJECT_MESSAGE =
  "No project selected. Use --project, --project-id or set General.DefaultProject.";

export function selectAction(options: ParsedOptions): Action | undefined {
  const match = ACTION_CHECKS.find(([, isRequested]) => isRequested(options));
  if (!match) {
    return undefined;
  }
  const [action] = match;
  if (action === "show-story" && options.allStories) {
    return "all-stories";
  }
  return action;
}

export function joinLabels(labels: readonly string[]): string {
  return labels.join(",");
}

/** Story fields shared by create and update: only what the user supplied. */
function suppliedFields(options: ParsedOptions): StoryFields {
  const fields: StoryFields = {};
  if (options.story !== undefined) fields.name = options.story;
  if (options.description !== undefined) fields.description = options.description;
  if (options.requestedBy !== undefined) fields.requested_by = options.requestedBy;
  if (options.ownedBy !== undefined) fields.owned_by = options.ownedBy;
  if (options.labels !== undefined) fields.labels = joinLabels(options.labels);
  if (options.estimate !== undefined) fields.estimate = options.estimate;
  if (options.createdAt !== undefined) fields.created_at = options.createdAt;
  if (options.deadline !== undefined) fields.deadline = options.deadline;
  if (options.storyType !== undefined) fields.story_type = options.storyType;
  if (options.state !== undefined) fields.current_state = options.state;
  return fields;
}

export function buildCreateFields(options: ParsedOptions, settings: Settings): StoryFields {
  const fields = suppliedFields(options);
  if (fields.requested_by === undefined && settings.me !== undefined) {
    fields.requested_by = settings.me;
  }
  return fields;
}

export function buildUpdateFields(options: ParsedOptions): StoryFields {
  const fields = suppliedFields(options);
  if (Object.keys(fields).length === 0) {
    throw new UsageError(EMPTY_UPDATE_MESSAGE);
  }
  return fields;
}

function requireStoryId(options: ParsedOptions, purpose: string): number {
  if (options.storyId === undefined) {
    throw new UsageError(`--story-id is required to ${purpose}.`);
  }
  return options.storyId;
}

function requireProject(projectId: number | undefined): number {
  if (projectId === undefined) {
    throw new UsageError(NO_PROJECT_MESSAGE);
  }
  return projectId;
}

function displayOptions(options: ParsedOptions): DisplayOptions {
  return { showNotes: options.showNotes };
}

/**
 * Turns the parsed options into the single request to perform, or `undefined`
 * when no action flag was given. Throws UsageError for missing or empty input.
 */
export function buildRequest(
  options: ParsedOptions,
  settings: Settings,
  projectId: number | undefined,
): ActionRequest | undefined {
  const action = selectAction(options);
  switch (action) {
    case undefined:
      return undefined;
    case "list-projects":
      return { action };
    case "show-project":
      return { action, projectId: requireProject(projectId) };
    case "all-stories":
      return { action, projectId: requireProject(projectId), display: displayOptions(options) };
    case "show-story": {
      if (options.storyId === undefined) {
        throw new UsageError("Either --story-id or --all-stories is required with --show-story.");
      }
      return {
        action,
        projectId: requireProject(projectId),
        storyId: options.storyId,
        display: displayOptions(options),
      };
    }
    case "search": {
      const filter = options.search ?? "";
      if (filter.trim().length === 0) {
        throw new UsageError("A search filter is required.");
      }
      return { action, projectId: requireProject(projectId), filter, display: displayOptions(options) };
    }
    case "add-story": {
      if (options.story === undefined || options.story.trim().length === 0) {
        throw new UsageError("Cannot add a story without a name (--story).");
      }
      return {
        action,
        projectId: requireProject(projectId),
        fields: buildCreateFields(options, settings),
      };
    }
    case "update-story": {
      const storyId = requireStoryId(options, "update a story");
      const fields = buildUpdateFields(options);
      return { action, projectId: requireProject(projectId), storyId, fields };
    }
    case "delete-story":
      return {
        action,
        projectId: requireProject(projectId),
        storyId: requireStoryId(options, "delete a story"),
      };
    case "add-note":
      return {
        action,
        projectId: requireProject(projectId),
        storyId: requireStoryId(options, "add a note"),
        text: options.addNote ?? "",
      };
  }
}
