import path from "node:path";

import { type ConfigDocument, readConfigFile } from "../adapters/configFile";
import { ConfigError } from "../domain/errors";
import { displayConfigPath, localConfigPath, userConfigPath } from "../domain/paths";

export interface Settings {
  readonly apiKey?: string;
  readonly me?: string;
  readonly defaultProject?: string;
  readonly baseUrl?: string;
  readonly timeoutSeconds?: number;
  readonly projects: ReadonlyMap<string, number>;
}

export interface ConfigSource {
  path: string;
  required: boolean;
}

export interface ConfigSourceOptions {
  homeDir: string;
  cwd: string;
  extraPath?: string;
}

interface MergedConfig {
  general: Partial<Record<"APIKey" | "Me" | "DefaultProject" | "BaseURL", string>> & {
    Timeout?: number;
  };
  projects: Map<string, number>;
}

export const emptySettings: Settings = Object.freeze({ projects: new Map<string, number>() });

/**
 * Candidate config files, lowest precedence first: the user file in the home
 * directory, a project-local file in the working directory, then `--config`.
 */
export function defaultConfigSources(options: ConfigSourceOptions): ConfigSource[] {
  const user = userConfigPath(options.homeDir);
  const sources: ConfigSource[] = [{ path: user, required: false }];
  const local = localConfigPath(options.cwd);
  if (local !== user) {
    sources.push({ path: local, required: false });
  }
  if (options.extraPath !== undefined) {
    sources.push({ path: path.resolve(options.cwd, options.extraPath), required: true });
  }
  return sources;
}

function mergeDocument(base: MergedConfig, document: ConfigDocument): MergedConfig {
  const general = { ...base.general };
  const { APIKey, Me, DefaultProject, BaseURL, Timeout } = document.General;
  if (APIKey !== undefined) general.APIKey = APIKey;
  if (Me !== undefined) general.Me = Me;
  if (DefaultProject !== undefined) general.DefaultProject = DefaultProject;
  if (BaseURL !== undefined) general.BaseURL = BaseURL;
  if (Timeout !== undefined) general.Timeout = Timeout;

  const projects = new Map(base.projects);
  for (const [name, id] of Object.entries(document.Projects)) {
    projects.set(name, id);
  }
  return { general, projects };
}

export function foldDocuments(documents: readonly ConfigDocument[]): Settings {
  const merged = documents.reduce<MergedConfig>(mergeDocument, {
    general: {},
    projects: new Map(),
  });
  return Object.freeze({
    apiKey: merged.general.APIKey,
    me: merged.general.Me,
    defaultProject: merged.general.DefaultProject,
    baseUrl: merged.general.BaseURL,
    timeoutSeconds: merged.general.Timeout,
    projects: merged.projects,
  });
}

/**
 * Reads every source in order and folds them into one Settings value; later
 * files override earlier ones key by key within `General` and `Projects`.
 */
export async function loadSettings(sources: readonly ConfigSource[], homeDir: string): Promise<Settings> {
  const documents: ConfigDocument[] = [];
  for (const source of sources) {
    const label = displayConfigPath(source.path, homeDir);
    const result = await readConfigFile(source.path, label);
    if (!result.exists || result.document === undefined) {
      if (source.required) {
        throw new ConfigError(`Config file not found: ${label}`, source.path);
      }
      continue;
    }
    documents.push(result.document);
  }

  if (documents.length === 0) {
    const searched = sources.map((source) => displayConfigPath(source.path, homeDir)).join(", ");
    throw new ConfigError(`No configuration file found (looked for ${searched})`);
  }

  return foldDocuments(documents);
}
