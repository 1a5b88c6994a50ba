/**
 * Schema for `.bracecheck.yaml`.
 */
import { z } from 'zod';

/** Report output format. */
export const OutputFormatSchema = z.enum(['human', 'json']);

/** Diagnostic log level. */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const ConfigObjectSchema = z.object({
  /** File scanned when no path is given on the command line */
  target: z.string().min(1).optional(),
  format: OutputFormatSchema.default('human'),
  /** Color the summary line */
  colors: z.boolean().default(false),
  log_level: LogLevelSchema.default('warn'),
});

/**
 * Complete config schema.
 * An empty document (null) is treated as `{}` so every default applies.
 */
export const ConfigSchema = z.preprocess((val) => val ?? {}, ConfigObjectSchema);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type ConfigLogLevel = z.infer<typeof LogLevelSchema>;
export type Config = z.infer<typeof ConfigSchema>;
