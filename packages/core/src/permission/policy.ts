/**
 * Immutable permission and budget policy.
 *
 * A policy is validated and deep-frozen once, before any run starts. Nothing
 * reachable from a tool call can widen it afterwards.
 */

import * as path from "node:path";
import { ErrorCode } from "@helmsman/shared";
import { z } from "zod";
import { ConfigurationError } from "../errors/index.js";
import { type PermissionCallback, type PermissionMode, PermissionModeSchema } from "./types.js";

// ============================================
// Schema
// ============================================

export const PolicySettingsSchema = z
  .object({
    mode: PermissionModeSchema.default("default"),
    fileRead: z.boolean().default(true),
    /** `true`, `false`, or the only directory writes may land in */
    fileWrite: z.union([z.boolean(), z.string().min(1)]).default(false),
    shell: z.boolean().default(false),
    codeExec: z.boolean().default(true),
    web: z.boolean().default(false),
    packageInstall: z.boolean().default(false),
    allowedTools: z.array(z.string().min(1)).optional(),
    deniedTools: z.array(z.string().min(1)).default([]),
    /** `null` means unlimited */
    maxTurns: z.number().int().positive().nullable().default(25),
    maxCostUsd: z.number().positive().nullable().default(null),
  })
  .strict();

export type PolicySettings = z.input<typeof PolicySettingsSchema>;

export interface PolicyInput extends PolicySettings {
  canUseTool?: PermissionCallback;
}

export interface Policy {
  readonly mode: PermissionMode;
  readonly fileRead: boolean;
  readonly fileWrite: boolean | string;
  readonly shell: boolean;
  readonly codeExec: boolean;
  readonly web: boolean;
  readonly packageInstall: boolean;
  readonly allowedTools?: readonly string[];
  readonly deniedTools: readonly string[];
  readonly canUseTool?: PermissionCallback;
  readonly maxTurns: number | null;
  readonly maxCostUsd: number | null;
}

// ============================================
// Construction
// ============================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Reflect.ownKeys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Validate settings and return a frozen policy.
 *
 * @throws ConfigurationError when a setting is invalid or unknown
 *
 * @example
 * ```typescript
 * const policy = createPolicy({ fileWrite: "/work", deniedTools: ["run_bash"], maxCostUsd: 2 });
 * ```
 */
export function createPolicy(input: PolicyInput = {}): Policy {
  const { canUseTool, ...settings } = input;
  const parsed = PolicySettingsSchema.safeParse(settings);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid policy: ${issues}`, ErrorCode.POLICY_INVALID, {
      cause: parsed.error,
    });
  }

  const { fileWrite, allowedTools, deniedTools, ...rest } = parsed.data;
  const policy: Policy = {
    ...rest,
    fileWrite: typeof fileWrite === "string" ? path.resolve(fileWrite) : fileWrite,
    allowedTools: allowedTools ? [...allowedTools] : undefined,
    deniedTools: [...deniedTools],
    canUseTool,
  };

  return deepFreeze(policy);
}

/**
 * Return a new policy with some settings replaced. The original is untouched.
 */
export function derivePolicy(base: Policy, changes: PolicyInput): Policy {
  return createPolicy({
    mode: base.mode,
    fileRead: base.fileRead,
    fileWrite: base.fileWrite,
    shell: base.shell,
    codeExec: base.codeExec,
    web: base.web,
    packageInstall: base.packageInstall,
    allowedTools: base.allowedTools ? [...base.allowedTools] : undefined,
    deniedTools: [...base.deniedTools],
    maxTurns: base.maxTurns,
    maxCostUsd: base.maxCostUsd,
    canUseTool: base.canUseTool,
    ...changes,
  });
}

// ============================================
// Presets
// ============================================

/**
 * Read-only mode: write, execute and install tools are denied.
 */
export function readOnlyPolicy(options: { maxTurns?: number | null } = {}): Policy {
  return createPolicy({
    mode: "readOnly",
    fileRead: true,
    fileWrite: false,
    shell: false,
    codeExec: false,
    web: false,
    packageInstall: false,
    maxTurns: options.maxTurns === undefined ? 25 : options.maxTurns,
  });
}

/**
 * Reads anywhere, writes inside `workingDir`, runs code but not shell commands.
 */
export function standardPolicy(
  workingDir: string = process.cwd(),
  options: { maxTurns?: number | null; maxCostUsd?: number | null } = {}
): Policy {
  return createPolicy({
    mode: "default",
    fileRead: true,
    fileWrite: workingDir,
    shell: false,
    codeExec: true,
    web: false,
    packageInstall: false,
    maxTurns: options.maxTurns === undefined ? 25 : options.maxTurns,
    maxCostUsd: options.maxCostUsd ?? null,
  });
}

/**
 * Everything allowed. Only the deny list still applies.
 */
export function fullAccessPolicy(
  options: { maxTurns?: number | null; maxCostUsd?: number | null } = {}
): Policy {
  return createPolicy({
    mode: "bypassAll",
    fileRead: true,
    fileWrite: true,
    shell: true,
    codeExec: true,
    web: true,
    packageInstall: true,
    maxTurns: options.maxTurns === undefined ? 50 : options.maxTurns,
    maxCostUsd: options.maxCostUsd ?? null,
  });
}

export interface PolicyDescription extends Omit<Policy, "canUseTool" | "allowedTools" | "deniedTools"> {
  allowedTools: string[] | null;
  deniedTools: string[];
  hasCallback: boolean;
}

/**
 * Plain-data view of a policy, safe to hand to hooks running in a worker.
 */
export function describePolicy(policy: Policy): PolicyDescription {
  return {
    mode: policy.mode,
    fileRead: policy.fileRead,
    fileWrite: policy.fileWrite,
    shell: policy.shell,
    codeExec: policy.codeExec,
    web: policy.web,
    packageInstall: policy.packageInstall,
    allowedTools: policy.allowedTools ? [...policy.allowedTools] : null,
    deniedTools: [...policy.deniedTools],
    hasCallback: policy.canUseTool !== undefined,
    maxTurns: policy.maxTurns,
    maxCostUsd: policy.maxCostUsd,
  };
}
