import type { TrackerApi } from "../adapters/trackerClient";
import type { RemoteActionRequest } from "../domain/actions";
import type { ApiResult } from "../domain/types";
import {
  renderErrors,
  renderMessage,
  renderNote,
  renderProject,
  renderSearchResult,
  renderStories,
  renderStory,
} from "./renderService";

export interface ActionOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function settle<T>(result: ApiResult<T>, render: (payload: T, message?: string) => string): ActionOutcome {
  if (!result.success) {
    return { exitCode: 1, stdout: "", stderr: renderErrors(result.errors) };
  }
  return { exitCode: 0, stdout: render(result.payload, result.message), stderr: "" };
}

/** Performs one remote request and renders its result. */
export class ActionService {
  constructor(private readonly api: TrackerApi) {}

  async execute(request: RemoteActionRequest): Promise<ActionOutcome> {
    switch (request.action) {
      case "show-project":
        return settle(await this.api.getProject(request.projectId), renderProject);
      case "show-story":
        return settle(
          await this.api.getStory(request.projectId, request.storyId, {
            includeNotes: request.display.showNotes,
          }),
          (story) => renderStory(story, request.display),
        );
      case "all-stories":
        return settle(
          await this.api.getStories(request.projectId, { includeNotes: request.display.showNotes }),
          (stories) => renderStories(stories, request.display),
        );
      case "search":
        return settle(
          await this.api.searchStories(request.projectId, request.filter, {
            includeNotes: request.display.showNotes,
          }),
          (stories, message) => renderSearchResult(message, stories, request.display),
        );
      case "add-story":
        return settle(await this.api.createStory(request.projectId, request.fields), (story) =>
          renderStory(story),
        );
      case "update-story":
        return settle(
          await this.api.updateStory(request.projectId, request.storyId, request.fields),
          (story) => renderStory(story),
        );
      case "delete-story":
        return settle(await this.api.deleteStory(request.projectId, request.storyId), renderMessage);
      case "add-note":
        return settle(await this.api.addNote(request.projectId, request.storyId, request.text), renderNote);
    }
  }
}
