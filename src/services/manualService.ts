import type { Command } from "commander";

import { CONFIG_FILE_NAME } from "../domain/paths";
import { storyStateOrder, storyTypeOrder } from "../domain/types";
import { formatHeading } from "../utils/cliUi";

interface ManualSection {
  title: string;
  lines: string[];
}

function manualSections(name: string): ManualSection[] {
  return [
    {
      title: "Actions",
      lines: [
        "Exactly one action runs per invocation. When several action flags are given the",
        "first of these wins: --list-projects, --show-project, --show-story, --search,",
        "--add-story, --update-story, --delete-story, --add-note. Without any action flag",
        `${name} does nothing and exits 0.`,
        "",
        "Some actions need more input and fail with exit 1 before any request is sent:",
        "--add-story needs --story; --update-story, --delete-story and --add-note need",
        "--story-id; --show-story needs --story-id or --all-stories; --search needs a",
        "non-blank filter.",
      ],
    },
    {
      title: "Project selection",
      lines: [
        "--project <name> is looked up in the Projects table of the config file and fails",
        "with 'Invalid Project Name.' when missing. Otherwise --project-id is used as",
        "given, and without either the General.DefaultProject name is looked up.",
      ],
    },
    {
      title: "Configuration",
      lines: [
        `Settings are read from ~/${CONFIG_FILE_NAME}, then ./${CONFIG_FILE_NAME}, then the`,
        "file given by --config. Later files override earlier ones key by key.",
        "",
        "  General:",
        "    APIKey: <token>            # sent as X-TrackerToken",
        "    Me: <your name>            # default --requested-by for --add-story",
        "    DefaultProject: <name>     # used when no project flag is given",
        "    BaseURL: <url>             # optional API root",
        "    Timeout: 30                # optional request timeout in seconds",
        "  Projects:",
        "    <name>: <numeric id>",
      ],
    },
    {
      title: "Story fields",
      lines: [
        `Types: ${storyTypeOrder.join(", ")}.`,
        `States: ${storyStateOrder.join(", ")}.`,
        "--update-story sends only the fields that were given on the command line.",
        "--label may be repeated and accepts comma-separated lists.",
      ],
    },
    {
      title: "Exit status",
      lines: [
        "0 on success, help and listings; 1 on usage errors, invalid project names,",
        "configuration problems and failed requests.",
      ],
    },
  ];
}

/** Usage followed by the long-form sections printed by --man. */
export function renderManual(program: Command): string {
  const blocks = [program.helpInformation().trimEnd()];
  for (const section of manualSections(program.name())) {
    const body = section.lines.map((line) => (line.length > 0 ? `  ${line}` : "")).join("\n");
    blocks.push(`${formatHeading(section.title)}\n${body}`);
  }
  return `${blocks.join("\n\n")}\n`;
}
