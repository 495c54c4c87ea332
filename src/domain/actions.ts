import type { StoryFields } from "./types";

export const actionOrder = [
  "list-projects",
  "show-project",
  "show-story",
  "all-stories",
  "search",
  "add-story",
  "update-story",
  "delete-story",
  "add-note",
] as const;

export type Action = (typeof actionOrder)[number];

export interface DisplayOptions {
  showNotes: boolean;
}

export type ActionRequest =
  | { action: "list-projects" }
  | { action: "show-project"; projectId: number }
  | { action: "show-story"; projectId: number; storyId: number; display: DisplayOptions }
  | { action: "all-stories"; projectId: number; display: DisplayOptions }
  | { action: "search"; projectId: number; filter: string; display: DisplayOptions }
  | { action: "add-story"; projectId: number; fields: StoryFields }
  | { action: "update-story"; projectId: number; storyId: number; fields: StoryFields }
  | { action: "delete-story"; projectId: number; storyId: number }
  | { action: "add-note"; projectId: number; storyId: number; text: string };

export type RemoteActionRequest = Exclude<ActionRequest, { action: "list-projects" }>;
