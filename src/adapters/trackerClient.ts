import type { z } from "zod";

import { describeError } from "../domain/errors";
import {
  type ApiResult,
  deleteResponseSchema,
  errorBodySchema,
  type Note,
  noteSchema,
  type Project,
  projectSchema,
  type Story,
  type StoryFields,
  storySchema,
} from "../domain/types";

export const DEFAULT_BASE_URL = "https://www.pivotaltracker.com/services/v5";
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface StoryReadOptions {
  includeNotes?: boolean;
}

/** The eight remote operations; every call resolves to an ApiResult and never throws. */
export interface TrackerApi {
  getProject(projectId: number): Promise<ApiResult<Project>>;
  getStories(projectId: number, options?: StoryReadOptions): Promise<ApiResult<Story[]>>;
  getStory(projectId: number, storyId: number, options?: StoryReadOptions): Promise<ApiResult<Story>>;
  searchStories(
    projectId: number,
    filter: string,
    options?: StoryReadOptions,
  ): Promise<ApiResult<Story[]>>;
  createStory(projectId: number, fields: StoryFields): Promise<ApiResult<Story>>;
  updateStory(projectId: number, storyId: number, fields: StoryFields): Promise<ApiResult<Story>>;
  deleteStory(projectId: number, storyId: number): Promise<ApiResult<string>>;
  addNote(projectId: number, storyId: number, text: string): Promise<ApiResult<Note>>;
}

export interface TrackerClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  log?: (line: string) => void;
}

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

type QueryParams = Record<string, string | undefined>;

interface RequestSpec<T> {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}${path}`);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

async function safeText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

function failure(errors: string[]): { success: false; errors: string[] } {
  return { success: false, errors };
}

function errorsFromBody(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return [];
  }
  const parsed = errorBodySchema.safeParse(json);
  if (!parsed.success) {
    return [];
  }
  if (parsed.data.errors && parsed.data.errors.length > 0) {
    return parsed.data.errors;
  }
  return parsed.data.error ? [parsed.data.error] : [];
}

function isAbortError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return false;
  }
  return error.name === "TimeoutError" || error.name === "AbortError";
}

// v5 leaves notes out of story bodies unless they are named in `fields`.
function notesQuery(options?: StoryReadOptions): QueryParams {
  return options?.includeNotes ? { fields: ":default,notes" } : {};
}

function pluralizeStories(count: number): string {
  return count === 1 ? "story" : "stories";
}

/**
 * JSON client for the tracker REST API. One instance per invocation; the API
 * key travels in the X-TrackerToken header and nowhere else.
 */
export class TrackerClient implements TrackerApi {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log?: (line: string) => void;

  constructor(options: TrackerClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.log;
  }

  getProject(projectId: number): Promise<ApiResult<Project>> {
    return this.request({ method: "GET", path: `/projects/${projectId}`, schema: projectSchema });
  }

  getStories(projectId: number, options?: StoryReadOptions): Promise<ApiResult<Story[]>> {
    return this.request({
      method: "GET",
      path: `/projects/${projectId}/stories`,
      query: notesQuery(options),
      schema: storySchema.array(),
    });
  }

  getStory(projectId: number, storyId: number, options?: StoryReadOptions): Promise<ApiResult<Story>> {
    return this.request({
      method: "GET",
      path: `/projects/${projectId}/stories/${storyId}`,
      query: notesQuery(options),
      schema: storySchema,
    });
  }

  async searchStories(
    projectId: number,
    filter: string,
    options?: StoryReadOptions,
  ): Promise<ApiResult<Story[]>> {
    const result = await this.request({
      method: "GET",
      path: `/projects/${projectId}/stories`,
      query: { filter, ...notesQuery(options) },
      schema: storySchema.array(),
    });
    if (!result.success) {
      return result;
    }
    const count = result.payload.length;
    return {
      ...result,
      message: `Found ${count} ${pluralizeStories(count)} matching "${filter}".`,
    };
  }

  createStory(projectId: number, fields: StoryFields): Promise<ApiResult<Story>> {
    return this.request({
      method: "POST",
      path: `/projects/${projectId}/stories`,
      body: fields,
      schema: storySchema,
    });
  }

  updateStory(projectId: number, storyId: number, fields: StoryFields): Promise<ApiResult<Story>> {
    return this.request({
      method: "PUT",
      path: `/projects/${projectId}/stories/${storyId}`,
      body: fields,
      schema: storySchema,
    });
  }

  async deleteStory(projectId: number, storyId: number): Promise<ApiResult<string>> {
    const result = await this.request({
      method: "DELETE",
      path: `/projects/${projectId}/stories/${storyId}`,
      schema: deleteResponseSchema,
    });
    if (!result.success) {
      return result;
    }
    return { success: true, payload: result.payload ?? `Story ${storyId} deleted.` };
  }

  addNote(projectId: number, storyId: number, text: string): Promise<ApiResult<Note>> {
    return this.request({
      method: "POST",
      path: `/projects/${projectId}/stories/${storyId}/notes`,
      body: { text },
      schema: noteSchema,
    });
  }

  private async request<T>(spec: RequestSpec<T>): Promise<ApiResult<T>> {
    const url = buildUrl(this.baseUrl, spec.path, spec.query);
    const hasBody = spec.body !== undefined;
    const headers: Record<string, string> = {
      "X-TrackerToken": this.apiKey,
      Accept: "application/json",
    };
    if (hasBody) headers["Content-Type"] = "application/json";

    this.log?.(`${spec.method} ${url}`);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: spec.method,
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
        ...(hasBody ? { body: JSON.stringify(spec.body) } : {}),
      });
    } catch (error) {
      if (isAbortError(error)) {
        return failure([`Request timed out after ${this.timeoutMs / 1000}s: ${spec.method} ${spec.path}`]);
      }
      return failure([`Network error: ${spec.method} ${spec.path}: ${describeError(error)}`]);
    }

    this.log?.(`${res.status} ${res.statusText} ${spec.method} ${spec.path}`);

    const text = await safeText(res);
    if (!res.ok) {
      const errors = errorsFromBody(text);
      return failure(errors.length > 0 ? errors : [`HTTP ${res.status} ${res.statusText}`.trim()]);
    }

    let json: unknown = null;
    if (text.trim().length > 0) {
      try {
        json = JSON.parse(text);
      } catch {
        return failure([`Unexpected non-JSON response from ${spec.method} ${spec.path}`]);
      }
    }

    const parsed = spec.schema.safeParse(json);
    if (!parsed.success) {
      return failure([`Unexpected response shape from ${spec.method} ${spec.path}`]);
    }
    return { success: true, payload: parsed.data };
  }
}
