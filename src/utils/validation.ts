/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and output records at runtime.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Scan Configuration Schema
// =============================================================================

/**
 * Framework base types whose subclasses may dispatch hooks.
 */
export const DEFAULT_RECOGNIZED_TYPES: readonly string[] = [
  "Oxide.Core.Interface",
  "Oxide.Core.OxideMod",
  "Oxide.Core.Libraries.Plugins",
  "Oxide.Core.Plugins.Plugin",
  "Oxide.Core.Plugins.PluginManager",
  "Oxide.Plugins.CSharpPlugin",
];

/**
 * Member names that all dispatch a hook by name.
 */
export const DEFAULT_CALL_ALIASES: readonly string[] = [
  "CallHook",
  "DirectCallHook",
  "OnCallHook",
  "Call",
];

export const DEFAULT_PLACEHOLDER_CLASS_NAME = "UnknownClass";

export const GeneratorModeSchema = z.enum(["full", "update-only"]);

export type GeneratorMode = z.infer<typeof GeneratorModeSchema>;

/**
 * Engine configuration. Every field has a default, so `{}` is valid.
 */
export const ScanConfigSchema = z.object({
  /** Fully qualified names of the recognized framework types */
  recognizedTypes: z.array(z.string().min(1)).min(1).default([...DEFAULT_RECOGNIZED_TYPES]),

  /** Hook dispatch member names */
  callAliases: z.array(z.string().min(1)).min(1).default([...DEFAULT_CALL_ALIASES]),

  /** Class name recorded when a module declares no class at all */
  placeholderClassName: z.string().min(1).default(DEFAULT_PLACEHOLDER_CLASS_NAME),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;

/**
 * Configuration file shape: engine settings plus optional CLI defaults.
 */
export const ConfigFileSchema = ScanConfigSchema.extend({
  output: z.string().min(1).optional(),
  mode: GeneratorModeSchema.optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// =============================================================================
// Serialized Hook Record Schema
// =============================================================================

export const SerializedParameterSchema = z.object({
  Type: z.string().min(1),
  Name: z.string().min(1),
});

/**
 * Shape of one entry of hooks.json
 */
export const SerializedHookRecordSchema = z.object({
  HookSignature: z.string().min(3),
  MethodSignature: z.string().min(2),
  MethodParameters: z.array(SerializedParameterSchema),
  MethodSourceCode: z.string(),
  ClassName: z.string().min(1),
  HookLineInvoke: z.number().int().positive(),
});

export type SerializedHookRecord = z.infer<typeof SerializedHookRecordSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
