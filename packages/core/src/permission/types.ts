/**
 * Permission types: decisions, tool annotations and the context a check runs in.
 */

import { z } from "zod";

// ============================================
// Permission Result
// ============================================

export const AllowResultSchema = z.object({
  decision: z.literal("allow"),
  message: z.string().optional(),
});

export const DenyResultSchema = z.object({
  decision: z.literal("deny"),
  reason: z.string().min(1),
  /** Terminate the whole run, not only this call */
  interrupt: z.boolean().default(false),
});

export const PermissionResultSchema = z.discriminatedUnion("decision", [
  AllowResultSchema,
  DenyResultSchema,
]);

export type PermissionResult = z.output<typeof PermissionResultSchema>;

/**
 * What a custom permission callback may return (`interrupt` is optional).
 */
export type PermissionResultInput = z.input<typeof PermissionResultSchema>;

export function allow(message?: string): PermissionResult {
  return message === undefined ? { decision: "allow" } : { decision: "allow", message };
}

export function deny(reason: string, options: { interrupt?: boolean } = {}): PermissionResult {
  return { decision: "deny", reason, interrupt: options.interrupt ?? false };
}

// ============================================
// Tool Annotations
// ============================================

/**
 * Capability hints a tool declares about itself.
 */
export const ToolAnnotationsSchema = z.object({
  readOnly: z.boolean().optional(),
  destructive: z.boolean().optional(),
  openWorld: z.boolean().optional(),
  idempotent: z.boolean().optional(),
});

export type ToolAnnotations = z.infer<typeof ToolAnnotationsSchema>;

// ============================================
// Check Context
// ============================================

export type ToolInput = Readonly<Record<string, unknown>>;

export interface PermissionContext {
  /** Relative tool paths resolve against this directory */
  workingDir: string;
  annotations?: ToolAnnotations;
}

/**
 * Custom decision callback. Throwing, or returning anything that is not a
 * permission result, denies the call.
 */
export type PermissionCallback = (
  toolName: string,
  toolInput: ToolInput,
  context: PermissionContext
) => PermissionResultInput | undefined | Promise<PermissionResultInput | undefined>;

// ============================================
// Modes
// ============================================

/**
 * - default: capability rules apply
 * - acceptEdits: file edits that `fileWrite` permits are accepted without asking
 * - readOnly: write and execute tools are denied, everything else is allowed
 * - bypassAll: everything not on the deny list is allowed
 */
export const PermissionModeSchema = z.enum(["default", "acceptEdits", "readOnly", "bypassAll"]);
export type PermissionMode = z.infer<typeof PermissionModeSchema>;
