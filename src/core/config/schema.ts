/**
 * Configuration schema for `.checksum-utils.yaml`.
 */
import { z } from 'zod';

/**
 * Optional object section whose inner defaults apply when it is missing.
 * `undefined` and `null` both count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Progress bar shown while a file is hashed. */
export const ProgressSettingsSchema = z.object({
  /** Only takes effect when stdout is a terminal */
  enabled: z.boolean().default(true),
  interval_ms: z.number().int().min(10).default(120),
  /** Number of cells in the bar */
  width: z.number().int().min(1).max(80).default(10),
});

/** Result output settings. */
export const OutputSettingsSchema = z.object({
  /** Append the elapsed hashing time to each per-file line */
  show_timing: z.boolean().default(true),
});

/** Directory walk settings. */
export const WalkSettingsSchema = z.object({
  /** gitignore-style patterns, relative to each walked directory argument */
  exclude: z.array(z.string()).default([]),
  /** Descend into symlinked directories */
  follow_symlinks: z.boolean().default(false),
});

/** An empty config file parses to null and means "all defaults". */
export const ConfigSchema = withDefaults(z.object({
  progress: withDefaults(ProgressSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  walk: withDefaults(WalkSettingsSchema),
}));

export type Config = z.output<typeof ConfigSchema>;
export type ProgressSettings = z.output<typeof ProgressSettingsSchema>;
export type WalkSettings = z.output<typeof WalkSettingsSchema>;
