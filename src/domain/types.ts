import { z } from "zod";

export const storyTypeOrder = ["feature", "release", "bug", "chore"] as const;

export const storyStateOrder = [
  "unscheduled",
  "unstarted",
  "started",
  "finished",
  "delivered",
  "accepted",
  "rejected",
] as const;

export const storyTypeSchema = z.enum(storyTypeOrder);
export const storyStateSchema = z.enum(storyStateOrder);

export type StoryType = (typeof storyTypeOrder)[number];
export type StoryState = (typeof storyStateOrder)[number];

/**
 * Fields accepted by the create and update story endpoints. A key is present
 * only when the user supplied the matching option.
 */
export interface StoryFields {
  name?: string;
  description?: string;
  requested_by?: string;
  owned_by?: string;
  labels?: string;
  estimate?: number;
  created_at?: string;
  deadline?: string;
  story_type?: StoryType;
  current_state?: StoryState;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

// v5 bodies carry person_id and created_at where older ones carry author and noted_at.
export const noteSchema = z
  .object({
    id: z.number().int(),
    text: z
      .string()
      .nullish()
      .transform((value) => value ?? ""),
    author: optionalText,
    noted_at: optionalText,
    person_id: optionalNumber,
    created_at: optionalText,
  })
  .transform(({ id, text, author, noted_at, person_id, created_at }) => ({
    id,
    text,
    author: author ?? (person_id === undefined ? undefined : `person ${person_id}`),
    noted_at: noted_at ?? created_at,
  }));

export type Note = z.infer<typeof noteSchema>;

// v5 returns labels as resources: { id, kind: "label", name }.
const labelObjectSchema = z.object({ name: z.string() });

export const storySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  url: optionalText,
  story_type: optionalText,
  current_state: optionalText,
  estimate: optionalNumber,
  description: optionalText,
  requested_by: optionalText,
  owned_by: optionalText,
  created_at: optionalText,
  deadline: optionalText,
  labels: z
    .union([z.array(z.union([z.string(), labelObjectSchema])), z.string()])
    .nullish()
    .transform((value): string[] => {
      if (value === null || value === undefined) {
        return [];
      }
      if (typeof value === "string") {
        return splitLabelList(value);
      }
      return value.map((label) => (typeof label === "string" ? label : label.name));
    }),
  notes: z.array(noteSchema).optional(),
});

export type Story = z.infer<typeof storySchema>;

export const projectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  point_scale: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  first_iteration_start_time: optionalText,
  iteration_length: optionalNumber,
});

export type Project = z.infer<typeof projectSchema>;

export const deleteResponseSchema = z
  .object({ message: optionalText })
  .nullish()
  .transform((value) => value?.message);

export const errorBodySchema = z.object({
  errors: z.array(z.string()).optional(),
  error: z.string().optional(),
});

export type ApiResult<T> =
  | { success: true; payload: T; message?: string }
  | { success: false; errors: string[] };

export function splitLabelList(value: string): string[] {
  return value
    .split(",")
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}
