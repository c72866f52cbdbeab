import { z } from "zod";

export const DEFAULT_OUTPUT_FILE = "composition_extraction.xlsx";
export const DEFAULT_LOG_FILE = "composition_extraction.log";
export const DEFAULT_INCLUDE_GLOBS = ["**/*.yaml", "**/*.yml"];
export const DEFAULT_MAX_COLUMN_WIDTH = 120;

const GlobListSchema = z.array(z.string().trim().min(1));

// Keys a config file may set. `root` always comes from the command line.
export const ConfigFileSchema = z
  .object({
    output: z.string().trim().min(1).optional(),
    log_file: z.string().trim().min(1).optional(),
    verbose: z.boolean().optional(),
    include: GlobListSchema.optional(),
    exclude: GlobListSchema.optional(),
    max_column_width: z.number().int().positive().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const RunConfigSchema = z
  .object({
    root: z.string().trim().min(1),
    output: z.string().trim().min(1).default(DEFAULT_OUTPUT_FILE),
    log_file: z.string().trim().min(1).default(DEFAULT_LOG_FILE),
    verbose: z.boolean().default(false),
    include: GlobListSchema.min(1).default(DEFAULT_INCLUDE_GLOBS),
    exclude: GlobListSchema.default([]),
    max_column_width: z.number().int().positive().default(DEFAULT_MAX_COLUMN_WIDTH),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
