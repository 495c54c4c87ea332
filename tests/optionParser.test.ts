import { describe, expect, it } from "vitest";

import { type ParsedOptions, parseArguments } from "../src/services/optionParser";
import { captureIo } from "./helpers/cliHarness";

function parseOk(argv: string[]): ParsedOptions {
  const io = captureIo();
  const outcome = parseArguments(argv, io);
  if (outcome.kind !== "options") {
    throw new Error(`expected options, got exit ${outcome.exitCode}: ${io.err()}`);
  }
  return outcome.options;
}

function parseExit(argv: string[]): { exitCode: number; stdout: string; stderr: string } {
  const io = captureIo();
  const outcome = parseArguments(argv, io);
  if (outcome.kind !== "exit") {
    throw new Error("expected the parser to exit");
  }
  return { exitCode: outcome.exitCode, stdout: io.out(), stderr: io.err() };
}

describe("parseArguments", () => {
  it("leaves unsupplied value options undefined and flags false", () => {
    const options = parseOk([]);
    expect(options.listProjects).toBe(false);
    expect(options.showStory).toBe(false);
    expect(options.search).toBeUndefined();
    expect(options.description).toBeUndefined();
    expect(options.estimate).toBeUndefined();
    expect(options.labels).toBeUndefined();
    expect(options.storyType).toBeUndefined();
  });

  it("keeps empty strings and zero as supplied values", () => {
    const options = parseOk(["--update-story", "--description", "", "--estimate", "0"]);
    expect(options.updateStory).toBe(true);
    expect(options.description).toBe("");
    expect(options.estimate).toBe(0);
  });

  it("accepts --flag=value and --flag value forms", () => {
    const options = parseOk(["--story-id=12", "--project", "Website"]);
    expect(options.storyId).toBe(12);
    expect(options.project).toBe("Website");
  });

  it("accepts combined short flags and attached short values", () => {
    const options = parseOk(["--show-story", "-an", "-i7", "-P", "42"]);
    expect(options.allStories).toBe(true);
    expect(options.showNotes).toBe(true);
    expect(options.storyId).toBe(7);
    expect(options.projectId).toBe(42);
  });

  it("collects repeated and comma-separated labels into one list", () => {
    const repeated = parseOk(["--label", "web", "--label", "auth"]);
    const combined = parseOk(["-L", "web, auth"]);
    expect(repeated.labels).toEqual(["web", "auth"]);
    expect(combined.labels).toEqual(["web", "auth"]);
  });

  it("maps story type shorthands onto storyType", () => {
    expect(parseOk(["--bug"]).storyType).toBe("bug");
    expect(parseOk(["--release"]).storyType).toBe("release");
    expect(parseOk(["-t", "chore"]).storyType).toBe("chore");
  });

  it("accepts every documented state", () => {
    expect(parseOk(["--state", "delivered"]).state).toBe("delivered");
  });

  it("prints usage and exits 0 for --help", () => {
    const result = parseExit(["--help"]);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toContain("Usage: trackline [options]");
    expect(result.stdout).toContain("--add-story");
    expect(result.stderr).toBe("");
  });

  it("prints the manual and exits 0 for --man", () => {
    const result = parseExit(["--man", "--add-story"]);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toContain("Usage: trackline [options]");
    expect(result.stdout).toContain("\nConfiguration\n");
    expect(result.stdout).toContain("    APIKey: <token>            # sent as X-TrackerToken");
    expect(result.stdout).toContain("  --add-story needs --story; --update-story, --delete-story and --add-note need\n");
  });

  it("prints the version for --version", () => {
    const result = parseExit(["--version"]);
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("0.1.0\n");
  });

  it("rejects unknown options with a usage error", () => {
    const result = parseExit(["--frobnicate"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("error: unknown option '--frobnicate'");
    expect(result.stderr).toContain("(run trackline --help for usage)");
  });

  it("rejects stray positional arguments", () => {
    const result = parseExit(["--show-project", "extra"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("error: too many arguments");
  });

  it("rejects a story type outside the closed set", () => {
    const result = parseExit(["--story-type", "epic"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("Allowed choices are feature, release, bug, chore.");
  });

  it("rejects a state outside the closed set", () => {
    const result = parseExit(["--state", "done"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("argument 'done' is invalid");
  });

  it("rejects non-integer ids", () => {
    const result = parseExit(["--story-id", "7a"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("--story-id must be a positive integer.");
  });

  it("rejects a zero project id but accepts a zero estimate", () => {
    expect(parseExit(["--project-id", "0"]).exitCode).toBe(1);
    expect(parseOk(["-e", "0"]).estimate).toBe(0);
  });

  it("rejects conflicting story type flags", () => {
    const result = parseExit(["--bug", "--feature"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("cannot be used with");
  });

  it("rejects --story-type together with a shorthand", () => {
    expect(parseExit(["--story-type", "bug", "--chore"]).exitCode).toBe(1);
  });

  it("rejects a value option given without its value", () => {
    const result = parseExit(["--search"]);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain("argument missing");
  });
});
