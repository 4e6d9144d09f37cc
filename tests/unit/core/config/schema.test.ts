/**
 * Tests for config schema Zod validation.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  ProgressSettingsSchema,
  WalkSettingsSchema,
} from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill every section with defaults', () => {
    expect(ConfigSchema.parse({})).toEqual({
      progress: { enabled: true, interval_ms: 120, width: 10 },
      output: { show_timing: true },
      walk: { exclude: [], follow_symlinks: false },
    });
  });

  it('should treat null as an empty document', () => {
    expect(ConfigSchema.parse(null)).toEqual(ConfigSchema.parse({}));
  });

  it('should treat a null section as all defaults', () => {
    expect(ConfigSchema.parse({ walk: null }).walk).toEqual({ exclude: [], follow_symlinks: false });
  });

  it('should keep given values', () => {
    const config = ConfigSchema.parse({
      progress: { enabled: false },
      walk: { exclude: ['*.tmp'], follow_symlinks: true },
    });

    expect(config.progress).toEqual({ enabled: false, interval_ms: 120, width: 10 });
    expect(config.walk).toEqual({ exclude: ['*.tmp'], follow_symlinks: true });
  });
});

describe('ProgressSettingsSchema', () => {
  it('should reject an interval below 10ms', () => {
    expect(ProgressSettingsSchema.safeParse({ interval_ms: 5 }).success).toBe(false);
  });

  it('should reject fractional or oversized widths', () => {
    expect(ProgressSettingsSchema.safeParse({ width: 2.5 }).success).toBe(false);
    expect(ProgressSettingsSchema.safeParse({ width: 81 }).success).toBe(false);
    expect(ProgressSettingsSchema.safeParse({ width: 80 }).success).toBe(true);
  });
});

describe('WalkSettingsSchema', () => {
  it('should require string patterns', () => {
    expect(WalkSettingsSchema.safeParse({ exclude: [1] }).success).toBe(false);
  });
});
