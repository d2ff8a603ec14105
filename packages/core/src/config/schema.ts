import { z } from "zod";

// ============================================
// Logging
// ============================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

// ============================================
// Plugin Sources
// ============================================

/**
 * Where plugin descriptors are looked up and which ones are skipped.
 * `dirs` are searched before the default project/user/builtin paths.
 */
export const PluginsConfigSchema = z.object({
  dirs: z.array(z.string().min(1)).optional().default([]),
  disabled: z.array(z.string().min(1)).optional().default([]),
  /** Skip the descriptors shipped with ali */
  skipBuiltin: z.boolean().optional().default(false),
});

export type PluginsConfig = z.infer<typeof PluginsConfigSchema>;

// ============================================
// Template Resolution
// ============================================

/**
 * Bounds for template resolution. Both are safety limits against
 * self-referencing or chained service templates.
 */
export const TemplateConfigSchema = z.object({
  /** Nested re-scans (name splices and service expansions) per marker chain */
  maxPasses: z.number().int().min(1).max(50).optional().default(5),
  /** Cross-plugin service hops resolved automatically */
  maxServiceHops: z.number().int().min(0).max(10).optional().default(1),
});

export type TemplateConfig = z.infer<typeof TemplateConfigSchema>;

// ============================================
// Complete Configuration
// ============================================

export const ConfigSchema = z.object({
  logLevel: LogLevelSchema.optional().default("warn"),
  /** Emit log lines as JSON */
  logJson: z.boolean().optional().default(false),
  /** Treat leftover tokens as fatal for every plugin */
  strict: z.boolean().optional().default(false),
  /** Caller identity reported in the invocation context */
  caller: z.string().optional().default("cli"),
  plugins: PluginsConfigSchema.optional().default({}),
  template: TemplateConfigSchema.optional().default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Input accepted before defaults are applied */
export type PartialConfig = z.input<typeof ConfigSchema>;
