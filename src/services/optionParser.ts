import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { z } from "zod";

import {
  type StoryState,
  type StoryType,
  splitLabelList,
  storyStateOrder,
  storyStateSchema,
  storyTypeOrder,
  storyTypeSchema,
} from "../domain/types";
import { type CliIo, type ColorMode, colorModes } from "../utils/cliUi";
import { renderManual } from "./manualService";

export const PROGRAM_NAME = "trackline";
export const PROGRAM_VERSION = "0.1.0";
export const DEFAULT_TIMEOUT_SECONDS = 30;

const USAGE_HINT = `(run ${PROGRAM_NAME} --help for usage)`;

/**
 * Options of one invocation. Value options stay `undefined` unless the flag
 * was given, so `""` and `0` remain distinguishable from "not supplied".
 */
export interface ParsedOptions {
  man: boolean;
  listProjects: boolean;
  showProject: boolean;
  showStory: boolean;
  allStories: boolean;
  showNotes: boolean;
  search?: string;
  addStory: boolean;
  updateStory: boolean;
  deleteStory: boolean;
  addNote?: string;
  project?: string;
  projectId?: number;
  storyId?: number;
  story?: string;
  description?: string;
  requestedBy?: string;
  ownedBy?: string;
  labels?: string[];
  estimate?: number;
  createdAt?: string;
  deadline?: string;
  storyType?: StoryType;
  state?: StoryState;
  config?: string;
  timeout?: number;
  color?: ColorMode;
  verbose: boolean;
}

export type ParseOutcome =
  | { kind: "options"; options: ParsedOptions }
  | { kind: "exit"; exitCode: number };

function parseInteger(value: string, flag: string, { allowZero }: { allowZero: boolean }): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${flag} must be a ${allowZero ? "non-negative" : "positive"} integer.`);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || (!allowZero && parsed === 0)) {
    throw new InvalidArgumentError(`${flag} must be a ${allowZero ? "non-negative" : "positive"} integer.`);
  }
  return parsed;
}

function positiveInteger(flag: string): (value: string) => number {
  return (value) => parseInteger(value, flag, { allowZero: false });
}

function collectLabels(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), ...splitLabelList(value)];
}

const flag = z.boolean().default(false);

const commanderValuesSchema = z
  .object({
    man: flag,
    listProjects: flag,
    showProject: flag,
    showStory: flag,
    allStories: flag,
    showNotes: flag,
    search: z.string().optional(),
    addStory: flag,
    updateStory: flag,
    deleteStory: flag,
    addNote: z.string().optional(),
    project: z.string().optional(),
    projectId: z.number().int().positive().optional(),
    storyId: z.number().int().positive().optional(),
    story: z.string().optional(),
    description: z.string().optional(),
    requestedBy: z.string().optional(),
    ownedBy: z.string().optional(),
    label: z.array(z.string()).optional(),
    estimate: z.number().int().nonnegative().optional(),
    createdAt: z.string().optional(),
    deadline: z.string().optional(),
    storyType: storyTypeSchema.optional(),
    feature: flag,
    release: flag,
    bug: flag,
    chore: flag,
    state: storyStateSchema.optional(),
    config: z.string().optional(),
    timeout: z.number().int().positive().optional(),
    color: z.enum(colorModes).optional(),
    verbose: flag,
  })
  .transform((values): ParsedOptions => {
    const { label, feature, release, bug, chore, storyType, ...rest } = values;
    const shortcuts: Record<StoryType, boolean> = { feature, release, bug, chore };
    const shortcut = storyTypeOrder.find((type) => shortcuts[type]);
    return {
      ...rest,
      labels: label,
      storyType: storyType ?? shortcut,
    };
  });

/**
 * Declares every flag. Parsing never exits the process: commander reports
 * through `io` and throws a CommanderError carrying the exit code.
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description("Command-line client for a remote story tracker")
    .version(PROGRAM_VERSION, "-V, --version", "print the version and exit")
    .helpOption("-h, --help", "print usage and exit")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .showHelpAfterError(USAGE_HINT)
    .allowExcessArguments(false)
    .option("--man", "print the full manual and exit")
    // actions
    .option("-l, --list-projects", "list the named projects from the config file")
    .option("--show-project", "show details of the selected project")
    .option("--show-story", "show one story (--story-id) or every story (--all-stories)")
    .option("--search <filter>", "list stories matching a search filter")
    .option("--add-story", "create a story named by --story")
    .option("--update-story", "update the story given by --story-id")
    .option("--delete-story", "delete the story given by --story-id")
    .option("--add-note <text>", "add a note to the story given by --story-id")
    // selection
    .option("-p, --project <name>", "project name from the config file")
    .addOption(
      new Option("-P, --project-id <id>", "numeric project id").argParser(
        positiveInteger("--project-id"),
      ),
    )
    .addOption(
      new Option("-i, --story-id <id>", "numeric story id").argParser(positiveInteger("--story-id")),
    )
    .option("-a, --all-stories", "with --show-story, show every story in the project")
    .option("-n, --show-notes", "include notes when showing stories")
    // story fields
    .option("-s, --story <name>", "story name")
    .option("-d, --description <text>", "story description")
    .option("-r, --requested-by <name>", "requester (defaults to General.Me when adding)")
    .option("-o, --owned-by <name>", "story owner")
    .addOption(
      new Option("-L, --label <labels>", "label to apply; repeat or separate with commas").argParser(
        collectLabels,
      ),
    )
    .addOption(
      new Option("-e, --estimate <points>", "point estimate").argParser((value) =>
        parseInteger(value, "--estimate", { allowZero: true }),
      ),
    )
    .option("--created-at <date>", "creation date")
    .option("--deadline <date>", "deadline (release stories)")
    .addOption(
      new Option("-t, --story-type <type>", "story type")
        .choices(storyTypeOrder)
        .conflicts([...storyTypeOrder]),
    );

  // --feature, --bug, ... are mutually exclusive with each other and --story-type
  for (const type of storyTypeOrder) {
    const others = storyTypeOrder.filter((other) => other !== type);
    program.addOption(
      new Option(`--${type}`, `shorthand for --story-type ${type}`).conflicts([
        "storyType",
        ...others,
      ]),
    );
  }

  program
    .addOption(new Option("--state <state>", "story state").choices(storyStateOrder))
    // runtime
    .option("--config <path>", "extra config file layered over ~/.trackline.yml")
    .addOption(
      new Option("--timeout <seconds>", `request timeout (default ${DEFAULT_TIMEOUT_SECONDS})`).argParser(
        positiveInteger("--timeout"),
      ),
    )
    .addOption(new Option("--color <when>", "color output").choices(colorModes))
    .option("--verbose", "trace HTTP requests on stderr");

  program.addHelpText(
    "after",
    [
      "",
      "Examples:",
      `  $ ${PROGRAM_NAME} --list-projects`,
      `  $ ${PROGRAM_NAME} --project Website --show-story --story-id 42 --show-notes`,
      `  $ ${PROGRAM_NAME} --add-story --story "Fix login" --bug --label auth,web`,
      "",
      `Run ${PROGRAM_NAME} --man for configuration details.`,
    ].join("\n"),
  );

  return program;
}

export function parseArguments(argv: readonly string[], io: CliIo): ParseOutcome {
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: "user" });
    if (program.args.length > 0) {
      program.error(
        `error: too many arguments. Expected 0 arguments but got ${program.args.length}.`,
      );
    }
  } catch (error) {
    if (error instanceof CommanderError) {
      return { kind: "exit", exitCode: error.exitCode };
    }
    throw error;
  }

  const parsed = commanderValuesSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    io.stderr(`error: invalid value for ${issue?.path.join(".") ?? "option"}: ${issue?.message ?? "unknown"}\n`);
    io.stderr(`${USAGE_HINT}\n`);
    return { kind: "exit", exitCode: 1 };
  }

  if (parsed.data.man) {
    io.stdout(renderManual(program));
    return { kind: "exit", exitCode: 0 };
  }

  return { kind: "options", options: parsed.data };
}
