import { describe, expect, it } from "vitest";

import {
  renderErrors,
  renderMessage,
  renderNote,
  renderProject,
  renderProjectList,
  renderSearchResult,
  renderStories,
  renderStory,
  STORY_DIVIDER,
} from "../src/services/renderService";
import { setColorMode } from "../src/utils/cliUi";
import { story } from "./helpers/cliHarness";

describe("renderProject", () => {
  it("prints the labelled lines in order with a trailing blank line", () => {
    expect(
      renderProject({
        id: 1,
        name: "Testing",
        point_scale: "0,1,2,3",
        first_iteration_start_time: "2024-01-01",
        iteration_length: 2,
      }),
    ).toBe(
      "Name: Testing\nPoint Scale: 0,1,2,3\nIterations Start: 2024-01-01\nWeeks per Iteration: 2\n\n",
    );
  });

  it("omits Iterations Start when absent", () => {
    expect(
      renderProject({ id: 1, name: "Testing", point_scale: "0,1,2", iteration_length: 1, first_iteration_start_time: undefined }),
    ).toBe("Name: Testing\nPoint Scale: 0,1,2\nWeeks per Iteration: 1\n\n");
  });
});

describe("renderStory", () => {
  it("renders the minimal story without optional lines", () => {
    expect(renderStory(story({ id: 7, name: "Login page" }))).toBe(
      [
        "Story 7 (feature) < https://tracker.example.com/story/show/7 >",
        "Name: Login page",
        "Estimate: Unestimated",
        "State: unstarted",
        "Requested By: Alice",
        "Created: 2024-01-02T03:04:05Z",
        "",
      ].join("\n"),
    );
  });

  it("indents every description line after the first to the label width", () => {
    const output = renderStory(
      story({ id: 8, name: "Docs", description: "First line\nSecond line\nThird line" }),
    );
    expect(output).toContain(
      "Description: First line\n             Second line\n             Third line\nRequested By: Alice",
    );
  });

  it("renders the optional fields when present", () => {
    const output = renderStory(
      story({
        id: 9,
        name: "Release 1.0",
        story_type: "release",
        estimate: 0,
        owned_by: "Bob",
        deadline: "2024-06-01",
        labels: ["web", "auth"],
      }),
    );
    expect(output).toBe(
      [
        "Story 9 (release) < https://tracker.example.com/story/show/9 >",
        "Name: Release 1.0",
        "Estimate: 0",
        "State: unstarted",
        "Requested By: Alice",
        "Owned By: Bob",
        "Created: 2024-01-02T03:04:05Z",
        "Deadline: 2024-06-01",
        "Labels: web, auth",
        "",
      ].join("\n"),
    );
  });

  const withNotes = story({
    id: 10,
    name: "Noted",
    notes: [
      { id: 1, author: "Alice", noted_at: "2024-01-03", text: "Looks good\nShip it" },
      { id: 2, author: "Bob", noted_at: "2024-01-04", text: "Done" },
    ],
  });

  it("hides notes unless show_notes is set", () => {
    expect(renderStory(withNotes)).not.toContain("Notes:");
  });

  it("separates notes by a blank line and ends without one", () => {
    const output = renderStory(withNotes, { showNotes: true });
    expect(output.endsWith(
      [
        "Created: 2024-01-02T03:04:05Z",
        "Notes:",
        "  Alice @ 2024-01-03",
        "    Looks good",
        "    Ship it",
        "",
        "  Bob @ 2024-01-04",
        "    Done",
        "",
      ].join("\n"),
    )).toBe(true);
  });

  it("omits the Notes block when show_notes is set but there are none", () => {
    expect(renderStory(story({ id: 11, name: "Quiet", notes: [] }), { showNotes: true })).not.toContain(
      "Notes:",
    );
  });

  it("colors the header and state when color is forced", () => {
    setColorMode("always");
    const output = renderStory(story({ id: 12, name: "Colored", current_state: "accepted" }));
    expect(output).toContain("State: \u001b[32maccepted\u001b[0m");
  });
});

describe("renderStories", () => {
  it("separates stories with a divider and no divider before the first", () => {
    const first = story({ id: 1, name: "One" });
    const second = story({ id: 2, name: "Two" });
    const output = renderStories([first, second]);
    expect(output).toBe(`${renderStory(first)}\n${STORY_DIVIDER}\n\n${renderStory(second)}`);
    expect(output.startsWith("Story 1")).toBe(true);
    expect(STORY_DIVIDER).toBe("==================================================");
  });

  it("reports an empty list", () => {
    expect(renderStories([])).toBe("No stories found.\n");
  });
});

describe("renderSearchResult", () => {
  it("prints the message line before the list", () => {
    const only = story({ id: 3, name: "Match" });
    expect(renderSearchResult('Found 1 story matching "Match".', [only])).toBe(
      `Found 1 story matching "Match".\n\n${renderStory(only)}`,
    );
  });

  it("prints only the message when nothing matched", () => {
    expect(renderSearchResult('Found 0 stories matching "x".', [])).toBe(
      'Found 0 stories matching "x".\n',
    );
  });
});

describe("renderNote", () => {
  it("prints the header and indented body", () => {
    expect(
      renderNote({ id: 5, author: "Alice", noted_at: "2024-01-03", text: "First\nSecond" }),
    ).toBe("Note (5) Alice @ 2024-01-03\n  First\n  Second\n");
  });
});

describe("renderMessage", () => {
  it("terminates the message with a newline once", () => {
    expect(renderMessage("Story 4 deleted.")).toBe("Story 4 deleted.\n");
    expect(renderMessage("Story 4 deleted.\n")).toBe("Story 4 deleted.\n");
  });
});

describe("renderErrors", () => {
  it("prints the header and indents each error", () => {
    expect(renderErrors(["Story not found", "Try again"])).toBe(
      "Unable to process request:\n  Story not found\n  Try again\n",
    );
  });
});

describe("renderProjectList", () => {
  it("renders a table sorted by name", () => {
    const output = renderProjectList(
      new Map([
        ["Website", 42],
        ["Testing", 1],
      ]),
    );
    expect(output).toBe(
      ["Name       ID", "-------  ----", "Testing     1", "Website    42", ""].join("\n"),
    );
  });

  it("reports an empty table", () => {
    expect(renderProjectList(new Map())).toBe("No named projects found.\n");
  });
});
