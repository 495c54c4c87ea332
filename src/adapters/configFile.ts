import fs from "fs-extra";
import YAML from "yaml";
import { z } from "zod";

import { ConfigError, describeError } from "../domain/errors";

const generalSchema = z
  .object({
    APIKey: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .optional(),
    Me: z.string().optional(),
    DefaultProject: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .optional(),
    BaseURL: z.string().url().optional(),
    Timeout: z.number().int().positive().optional(),
  })
  .passthrough();

type GeneralSection = z.output<typeof generalSchema>;

export const configDocumentSchema = z
  .object({
    General: generalSchema.nullish().transform((value): GeneralSection => value ?? {}),
    Projects: z
      .record(z.string(), z.coerce.number().int().positive())
      .nullish()
      .transform((value): Record<string, number> => value ?? {}),
  })
  .passthrough();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export interface ConfigFileReadResult {
  exists: boolean;
  document?: ConfigDocument;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "document";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

export function parseConfigDocument(raw: string, label: string): ConfigDocument {
  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Malformed config file ${label}: ${describeError(error)}`, label);
  }
  if (data === null || data === undefined) {
    data = {};
  }
  if (typeof data !== "object" || Array.isArray(data)) {
    throw new ConfigError(`Malformed config file ${label}: expected a mapping at the top level`, label);
  }
  const parsed = configDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Malformed config file ${label}: ${describeIssues(parsed.error)}`, label);
  }
  return parsed.data;
}

export async function readConfigFile(filePath: string, label = filePath): Promise<ConfigFileReadResult> {
  if (!(await fs.pathExists(filePath))) {
    return { exists: false };
  }
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read config file ${label}: ${describeError(error)}`, label);
  }
  return { exists: true, document: parseConfigDocument(raw, label) };
}
