/**
 * Plugin descriptor schema definitions
 *
 * Defines the Zod schema for validating plugin.yaml descriptor files.
 * A descriptor declares a tool's vocabulary, grammar, inference rules,
 * command templates, services and selectors as plain data.
 *
 * @module plugin/manifest
 */

import { z } from "zod";

// =============================================================================
// Patterns - Validation patterns for descriptor fields
// =============================================================================

/**
 * Kebab-case pattern for plugin names
 *
 * @example "tmux", "broot", "file-manager"
 */
const kebabCasePattern = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

/**
 * Semantic version pattern
 *
 * @example "1.0.0", "2.1.0-beta.1", "1.0.0+build.123"
 */
const semverPattern = /^\d+\.\d+\.\d+(-[a-zA-Z0-9.-]+)?(\+[a-zA-Z0-9.-]+)?$/;

/**
 * Field and service identifiers. Services may carry a leading underscore
 * (internal) and hyphens.
 */
const identifierPattern = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Condition keys: a state field, or a `ctx.` key read from the invocation context.
 *
 * @example "target", "ctx.caller", "ctx.env.TMUX"
 */
const conditionKeyPattern = /^(ctx\.[A-Za-z0-9_.]+|[A-Za-z_][A-Za-z0-9_-]*)$/;

const IdentifierSchema = z
  .string()
  .regex(identifierPattern, "Must start with a letter or underscore and contain only [A-Za-z0-9_-]");

/** Scalars YAML may produce for a value; stored as strings */
const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/** Capability names, as a list or as the keys of a map */
const CapabilityListSchema = z
  .union([z.array(z.string().min(1)), z.record(z.string(), z.unknown())])
  .transform((value) => (Array.isArray(value) ? value : Object.keys(value)))
  .default([]);

// =============================================================================
// Vocabulary
// =============================================================================

export const VocabularySchema = z.object({
  /** Verbs this plugin serves */
  verbs: z.array(z.string().min(1)).default([]),

  /** Alias -> canonical verb */
  aliases: z.record(z.string().min(1), z.string().min(1)).default({}),

  /** Object keywords; default allowed values of `values` fields without a list */
  objects: z.array(z.string().min(1)).default([]),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

// =============================================================================
// Grammar
// =============================================================================

export const FieldTypeSchema = z.enum(["string", "values", "pattern"]);

export type FieldType = z.infer<typeof FieldTypeSchema>;

export const FieldTransformSchema = z.enum(["lower", "upper"]);

export type FieldTransform = z.infer<typeof FieldTransformSchema>;

export const GrammarFieldSchema = z
  .object({
    type: FieldTypeSchema,
    values: z.array(ScalarSchema).optional(),
    pattern: z.string().min(1).optional(),
    transform: FieldTransformSchema.optional(),
    description: z.string().optional(),
  })
  .refine((field) => field.type !== "pattern" || field.pattern !== undefined, {
    message: "Pattern fields require a pattern",
    path: ["pattern"],
  });

export type GrammarFieldManifest = z.infer<typeof GrammarFieldSchema>;

export const GrammarSchema = z
  .record(IdentifierSchema, GrammarFieldSchema)
  .refine((grammar) => !Object.hasOwn(grammar, "verb"), {
    message: "'verb' is reserved and cannot be a grammar field",
  })
  .default({});

// =============================================================================
// Conditions, inference and commands
// =============================================================================

/**
 * Condition map shared by inference guards and command predicates.
 *
 * Values: `present`, `absent` or null, a `^regex`, anything else is
 * compared for equality as a string.
 */
export const ConditionMapSchema = z
  .record(
    z.string().regex(conditionKeyPattern, "Condition keys must be field names or ctx.* keys"),
    z.union([z.string(), z.number(), z.boolean(), z.null()])
  )
  .default({});

export type ConditionMap = z.infer<typeof ConditionMapSchema>;

export const RewriteSchema = z.union([
  z.string(),
  z.object({
    from: z.string().min(1),
    to: z.string().default(""),
  }),
]);

export type RewriteManifest = z.infer<typeof RewriteSchema>;

export const InferenceRuleSchema = z
  .object({
    when: ConditionMapSchema,
    set: z.record(IdentifierSchema, ScalarSchema).optional(),
    transform: z.record(IdentifierSchema, RewriteSchema).optional(),
    description: z.string().optional(),
  })
  .refine((rule) => rule.set !== undefined || rule.transform !== undefined, {
    message: "Inference rules need a set or transform effect",
  });

export type InferenceRuleManifest = z.infer<typeof InferenceRuleSchema>;

export const CommandSchema = z.object({
  match: ConditionMapSchema,
  exec: z.string().min(1),
  description: z.string().optional(),
});

export type CommandManifest = z.infer<typeof CommandSchema>;

// =============================================================================
// Services, selectors and context
// =============================================================================

export const SelectorKindSchema = z.enum(["stream", "action"]);

export type SelectorKind = z.infer<typeof SelectorKindSchema>;

export const SelectorSchema = z.object({
  kind: SelectorKindSchema,
  exec: z.string().min(1),
  description: z.string().optional(),
});

export const ContextRequirementsSchema = z
  .object({
    requires_env: z
      .union([z.string().min(1), z.array(z.string().min(1))])
      .transform((value) => (typeof value === "string" ? [value] : value))
      .default([]),
  })
  .default({});

// =============================================================================
// PluginDescriptorSchema - Main descriptor schema
// =============================================================================

/**
 * Schema for plugin descriptors (plugin.yaml)
 *
 * @example
 * ```yaml
 * name: tmux
 * version: 1.0.0
 * provides: [pane]
 * patterns: ["."]
 * vocabulary:
 *   verbs: [SPLIT]
 * grammar:
 *   direction: { type: values, values: [left, right], transform: lower }
 * commands:
 *   - match: { verb: SPLIT }
 *     exec: "tmux split-window {direction[left:-h -b,right:-h]}"
 * services:
 *   split: "tmux split-window {direction[left:-h -b,right:-h,default:-h]}"
 * ```
 */
export const PluginDescriptorSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(100)
    .regex(
      kebabCasePattern,
      'Plugin name must be kebab-case (lowercase letters, numbers, hyphens). Example: "my-plugin"'
    ),

  version: z
    .string()
    .regex(semverPattern, 'Version must follow semver format. Example: "1.0.0" or "2.0.0-beta.1"')
    .default("0.0.0"),

  description: z.string().max(2048).optional(),

  /** Leftover tokens are fatal when set */
  strict: z.boolean().default(false),

  provides: CapabilityListSchema,

  requires: CapabilityListSchema,

  /** Syntax prefixes owned by this plugin, e.g. "." or "@" */
  patterns: z.array(z.string().min(1)).default([]),

  vocabulary: VocabularySchema.default({}),

  grammar: GrammarSchema,

  inference: z.array(InferenceRuleSchema).default([]),

  commands: z.array(CommandSchema).default([]),

  services: z.record(IdentifierSchema, z.string()).default({}),

  selectors: z.record(z.string().min(1), SelectorSchema).default({}),

  context: ContextRequirementsSchema,
});

/** Validated descriptor data, before normalisation */
export type PluginManifest = z.infer<typeof PluginDescriptorSchema>;

/** Descriptor data as written by authors */
export type PluginManifestInput = z.input<typeof PluginDescriptorSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validates descriptor data without throwing.
 */
export const safeParsePluginManifest = (data: unknown) => {
  return PluginDescriptorSchema.safeParse(data);
};

/**
 * Formats zod issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}
