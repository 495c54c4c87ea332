import type { DisplayOptions } from "../domain/actions";
import type { Note, Project, Story } from "../domain/types";
import { colors, formatHeading, formatId, formatState, renderTable, sortEntries } from "../utils/cliUi";

export const STORY_DIVIDER = "=".repeat(50);
export const ERROR_HEADER = "Unable to process request:";

const DESCRIPTION_LABEL = "Description: ";

function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, "\n").split("\n");
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.length > 0;
}

export function renderProject(project: Project): string {
  const lines = [`Name: ${project.name}`, `Point Scale: ${project.point_scale}`];
  if (isPresent(project.first_iteration_start_time)) {
    lines.push(`Iterations Start: ${project.first_iteration_start_time}`);
  }
  lines.push(`Weeks per Iteration: ${project.iteration_length ?? ""}`);
  return `${lines.join("\n")}\n\n`;
}

function renderNoteHeader(note: Note): string {
  return `${note.author ?? "unknown"} @ ${note.noted_at ?? ""}`.trimEnd();
}

function renderNotesBlock(notes: readonly Note[]): string[] {
  const lines = [formatHeading("Notes:")];
  notes.forEach((note, index) => {
    if (index > 0) {
      lines.push("");
    }
    lines.push(`  ${renderNoteHeader(note)}`);
    for (const line of splitLines(note.text)) {
      lines.push(`    ${line}`);
    }
  });
  return lines;
}

export function renderStory(story: Story, display: DisplayOptions = { showNotes: false }): string {
  const lines = [
    `${formatHeading(`Story ${formatId(story.id)}`)} (${story.story_type ?? "unknown"}) < ${story.url ?? ""} >`,
    `Name: ${story.name}`,
    `Estimate: ${story.estimate ?? "Unestimated"}`,
    `State: ${story.current_state ? formatState(story.current_state) : ""}`,
  ];

  if (isPresent(story.description)) {
    const [first, ...rest] = splitLines(story.description);
    lines.push(`${DESCRIPTION_LABEL}${first}`);
    const indent = " ".repeat(DESCRIPTION_LABEL.length);
    for (const line of rest) {
      lines.push(`${indent}${line}`);
    }
  }

  lines.push(`Requested By: ${story.requested_by ?? ""}`);
  if (isPresent(story.owned_by)) {
    lines.push(`Owned By: ${story.owned_by}`);
  }
  lines.push(`Created: ${story.created_at ?? ""}`);
  if (isPresent(story.deadline)) {
    lines.push(`Deadline: ${story.deadline}`);
  }
  if (story.labels.length > 0) {
    lines.push(`Labels: ${story.labels.join(", ")}`);
  }
  if (display.showNotes && story.notes && story.notes.length > 0) {
    lines.push(...renderNotesBlock(story.notes));
  }
  return `${lines.join("\n")}\n`;
}

export function renderStories(stories: readonly Story[], display?: DisplayOptions): string {
  if (stories.length === 0) {
    return "No stories found.\n";
  }
  return stories.map((story) => renderStory(story, display)).join(`\n${STORY_DIVIDER}\n\n`);
}

export function renderSearchResult(
  message: string | undefined,
  stories: readonly Story[],
  display?: DisplayOptions,
): string {
  const header = message ? `${message}\n` : "";
  if (stories.length === 0) {
    return header.length > 0 ? header : renderStories(stories, display);
  }
  return `${header}\n${renderStories(stories, display)}`;
}

export function renderNote(note: Note): string {
  const lines = [`Note (${formatId(note.id)}) ${renderNoteHeader(note)}`];
  for (const line of splitLines(note.text)) {
    lines.push(`  ${line}`);
  }
  return `${lines.join("\n")}\n`;
}

export function renderMessage(message: string): string {
  return message.endsWith("\n") ? message : `${message}\n`;
}

export function renderErrors(errors: readonly string[]): string {
  const lines = [ERROR_HEADER, ...errors.map((error) => `  ${error}`)];
  return `${lines.join("\n")}\n`;
}

export function renderProjectList(projects: ReadonlyMap<string, number>): string {
  if (projects.size === 0) {
    return "No named projects found.\n";
  }
  const rows = sortEntries([...projects.entries()]).map(([name, id]) => [
    { text: name },
    { text: String(id), align: "right" as const, color: colors.cyan },
  ]);
  return renderTable([{ text: "Name" }, { text: "ID", align: "right" }], rows);
}
