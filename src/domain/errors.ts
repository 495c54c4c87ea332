/**
 * Errors that end an invocation. Each carries the exit status the CLI reports;
 * the message is written to stderr as-is.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

/** Bad or missing flags detected after commander accepted the argv. */
export class UsageError extends CliError {
  constructor(message: string) {
    super(message, 1);
    this.name = "UsageError";
  }
}

/** Missing, unreadable or malformed configuration. */
export class ConfigError extends CliError {
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(message, 1);
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

export class ProjectResolutionError extends CliError {
  readonly projectName: string;

  constructor(projectName: string) {
    super("Invalid Project Name.", 1);
    this.name = "ProjectResolutionError";
    this.projectName = projectName;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
