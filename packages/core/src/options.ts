import { z } from "zod";

import {
  DEFAULT_FILE_NAME_PREFIX,
  DEFAULT_GENERATE_MAIN_LABEL,
  DEFAULT_INDEX_MAIN_LABEL,
  DEFAULT_LABEL_PAGE_SIZE,
} from "./defaults.js";
import { InvalidConfigurationError } from "./errors.js";
import { IDENTIFIER_PATTERN } from "./labels/normalize.js";

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

const DirSchema = z.string().trim().min(1, "directory path is required");
const PageSizeSchema = z
  .number()
  .int("label page size must be an integer")
  .positive("label page size must be a positive integer")
  .default(DEFAULT_LABEL_PAGE_SIZE);
const OptionalLabelSchema = z.string().trim().nullish();

export const IndexOptionsSchema = z.object({
  inputDir: DirSchema,
  outputDir: DirSchema.nullish(),
  mainLabel: OptionalLabelSchema.transform((v) => v || DEFAULT_INDEX_MAIN_LABEL),
  labelPageSize: PageSizeSchema,
  fileNamePrefix: z
    .string()
    .trim()
    .regex(IDENTIFIER_PATTERN, "file name prefix must start with a letter or _ and use only letters, digits and _")
    .default(DEFAULT_FILE_NAME_PREFIX),
});

export const GenerateOptionsSchema = z.object({
  inputDir: DirSchema,
  outputDir: DirSchema.nullish(),
  mainLabel: OptionalLabelSchema.transform((v) => v || DEFAULT_GENERATE_MAIN_LABEL),
  labelPageSize: PageSizeSchema,
  configPath: z.string().trim().min(1).nullish(),
  requireLabels: z.boolean().default(false),
  registerMod: z.boolean().default(false),
});

export type IndexOptionsInput = z.input<typeof IndexOptionsSchema>;
export type IndexOptions = z.output<typeof IndexOptionsSchema>;
export type GenerateOptionsInput = z.input<typeof GenerateOptionsSchema>;
export type GenerateOptions = z.output<typeof GenerateOptionsSchema>;

export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: z.input<S>): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) throw new InvalidConfigurationError(`Invalid options: ${formatIssues(result.error)}`);
  return result.data;
}
