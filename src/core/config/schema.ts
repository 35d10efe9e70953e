/**
 * @arch fmtkit.core.domain.schema
 */
import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Line-ending policy applied to formatted output. */
export const LineEndingSchema = z.preprocess(
  (val) => (typeof val === 'string' ? val.toUpperCase() : val),
  z.enum(['AUTO', 'KEEP', 'LF', 'CRLF', 'CR'])
);

/** Where imports matching no configured group are placed. */
export const UnmatchedImportsSchema = z.enum(['first', 'last']);

/** Compiler versions, used as the default Java option set. */
export const CompilerSettingsSchema = z.object({
  source: z.coerce.string().default('1.8'),
  compliance: z.coerce.string().default('1.8'),
  target: z.coerce.string().default('1.8'),
});

/** Settings shared by every language section. */
const LanguageSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Key/value option file for the engine; null uses compiler defaults */
  config_file: z.string().nullable().default(null),
});

export const JavaSettingsSchema = LanguageSettingsSchema.extend({
  /** `index=prefix` import order file; null uses the built-in order */
  import_order_file: z.string().nullable().default(null),
  unmatched_imports: UnmatchedImportsSchema.default('last'),
});

export const JavaScriptSettingsSchema = LanguageSettingsSchema;

/** Source discovery. */
export const FilesSettingsSchema = z.object({
  directories: z.array(z.string()).default(['src', 'test']),
  include: z.array(z.string()).default(['**/*.java', '**/*.js']),
  exclude: z.array(z.string()).default([]),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  skip: z.boolean().default(false),
  /** Text encoding; unset means utf-8 with a warning */
  encoding: z.string().optional(),
  line_ending: LineEndingSchema.default('AUTO'),
  /** Directory holding the cache store, relative to the project root */
  target_directory: z.string().default('target'),
  /** Parallel file pipelines (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
  compiler: withDefaults(CompilerSettingsSchema),
  java: withDefaults(JavaSettingsSchema),
  javascript: withDefaults(JavaScriptSettingsSchema),
  files: withDefaults(FilesSettingsSchema),
});

/**
 * Formatter option files: a flat mapping of scalar values.
 * Values are kept as strings; each formatter interprets the keys it knows.
 */
export const FormatterOptionsFileSchema = z.preprocess(
  (val) => val ?? {},
  z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
);

// Type exports (inferred from schemas)
export type LineEnding = z.infer<typeof LineEndingSchema>;
export type UnmatchedImports = z.infer<typeof UnmatchedImportsSchema>;
export type CompilerSettings = z.infer<typeof CompilerSettingsSchema>;
export type JavaSettings = z.infer<typeof JavaSettingsSchema>;
export type JavaScriptSettings = z.infer<typeof JavaScriptSettingsSchema>;
export type FilesSettings = z.infer<typeof FilesSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
