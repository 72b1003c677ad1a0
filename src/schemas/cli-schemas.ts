import { z } from 'zod';

export const OUTPUT_FORMATS = ['json', 'yaml', 'ini'] as const;

// Options for the resolve command
export const RESOLVE_OPTIONS_SCHEMA = z.object({
  output: z.enum(OUTPUT_FORMATS).default('json'),
  quiet: z.boolean().default(false),
  skipVardirCheck: z.boolean().default(false),
});

// Validate command options schema
export const VALIDATE_OPTIONS_SCHEMA = z.object({
  skipVardirCheck: z.boolean().default(false),
});

// Options for the init command
export const INIT_OPTIONS_SCHEMA = z.object({
  force: z.boolean().default(false),
});

// Inferred types
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type ResolveOptions = z.infer<typeof RESOLVE_OPTIONS_SCHEMA>;
export type ValidateOptions = z.infer<typeof VALIDATE_OPTIONS_SCHEMA>;
export type InitOptions = z.infer<typeof INIT_OPTIONS_SCHEMA>;
