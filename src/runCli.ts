import os from "node:os";

import { TrackerClient, type TrackerApi } from "./adapters/trackerClient";
import { ConfigError, isCliError } from "./domain/errors";
import { CONFIG_FILE_NAME } from "./domain/paths";
import { ActionService } from "./services/actionService";
import {
  type ConfigSource,
  defaultConfigSources,
  emptySettings,
  loadSettings,
  type Settings,
} from "./services/configService";
import { DEFAULT_TIMEOUT_SECONDS, type ParsedOptions, parseArguments } from "./services/optionParser";
import { resolveProject } from "./services/projectResolver";
import { renderProjectList } from "./services/renderService";
import { buildRequest, selectAction } from "./services/requestBuilder";
import { type CliIo, formatDebug, formatWarning, processIo, setColorMode } from "./utils/cliUi";

export interface TrackerFactoryOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
  log?: (line: string) => void;
}

export interface CliDependencies {
  io?: CliIo;
  homeDir?: string;
  cwd?: string;
  configSources?: (options: ParsedOptions) => ConfigSource[];
  createTracker?: (options: TrackerFactoryOptions) => TrackerApi;
}

type SettingsLoad = { ok: true; settings: Settings } | { ok: false; error: ConfigError };

async function tryLoadSettings(sources: ConfigSource[], homeDir: string): Promise<SettingsLoad> {
  try {
    return { ok: true, settings: await loadSettings(sources, homeDir) };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function requireApiKey(settings: Settings): Settings & { apiKey: string } {
  const { apiKey } = settings;
  if (apiKey === undefined || apiKey.length === 0) {
    throw new ConfigError(`No API key configured. Set General.APIKey in ~/${CONFIG_FILE_NAME}.`);
  }
  return { ...settings, apiKey };
}

/**
 * Runs one invocation end to end and resolves to the exit status. Nothing here
 * calls process.exit; the entry point assigns the status once.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? processIo;
  const parsed = parseArguments(argv, io);
  if (parsed.kind === "exit") {
    return parsed.exitCode;
  }
  const { options } = parsed;
  if (options.color !== undefined) {
    setColorMode(options.color);
  }

  const homeDir = deps.homeDir ?? os.homedir();
  const cwd = deps.cwd ?? process.cwd();
  const sources = deps.configSources
    ? deps.configSources(options)
    : defaultConfigSources({ homeDir, cwd, extraPath: options.config });

  try {
    const load = await tryLoadSettings(sources, homeDir);
    const settings = load.ok ? load.settings : emptySettings;

    const action = selectAction(options);
    const remote = action !== undefined && action !== "list-projects";
    if (remote && !load.ok) {
      throw load.error;
    }
    // An unknown --project fails every invocation, including the local ones.
    const projectId = resolveProject(options, settings);
    if (action === undefined) {
      return 0;
    }
    if (action === "list-projects") {
      if (!load.ok && options.verbose) {
        io.stderr(formatWarning(load.error.message));
      }
      io.stdout(renderProjectList(settings.projects));
      return 0;
    }

    const request = buildRequest(options, settings, projectId);
    if (request === undefined || request.action === "list-projects") {
      return 0;
    }
    const configured = requireApiKey(settings);
    const timeoutSeconds = options.timeout ?? configured.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    const createTracker = deps.createTracker ?? ((factory: TrackerFactoryOptions) => new TrackerClient(factory));
    const tracker = createTracker({
      apiKey: configured.apiKey,
      baseUrl: configured.baseUrl,
      timeoutMs: timeoutSeconds * 1000,
      log: options.verbose ? (line) => io.stderr(formatDebug(line)) : undefined,
    });

    const outcome = await new ActionService(tracker).execute(request);
    if (outcome.stdout.length > 0) io.stdout(outcome.stdout);
    if (outcome.stderr.length > 0) io.stderr(outcome.stderr);
    return outcome.exitCode;
  } catch (error) {
    if (isCliError(error)) {
      io.stderr(`${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  }
}
