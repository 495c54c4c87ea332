export type { Action, ActionRequest, DisplayOptions } from "./domain/actions";
export { CliError, ConfigError, ProjectResolutionError, UsageError } from "./domain/errors";
export type { ApiResult, Note, Project, Story, StoryFields, StoryState, StoryType } from "./domain/types";
export { TrackerClient, type TrackerApi, type TrackerClientOptions } from "./adapters/trackerClient";
export { loadSettings, defaultConfigSources, type Settings } from "./services/configService";
export { parseArguments, type ParsedOptions } from "./services/optionParser";
export { resolveProject } from "./services/projectResolver";
export { buildRequest, selectAction } from "./services/requestBuilder";
export {
  renderErrors,
  renderNote,
  renderProject,
  renderStories,
  renderStory,
} from "./services/renderService";
export { runCli, type CliDependencies } from "./runCli";
