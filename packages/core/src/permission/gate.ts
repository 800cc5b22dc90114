// ============================================
// Permission Gate
// ============================================

import * as path from "node:path";
import { errorMessage } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import { hasPathTraversal, isPathWithin } from "./path-guard.js";
import type { Policy } from "./policy.js";
import {
  classifyTool,
  isWriteLikeTool,
  matchesToolName,
  normalizeToolName,
  PERMISSION_PROMPT_TOOL,
} from "./tool-classes.js";
import {
  allow,
  deny,
  type PermissionContext,
  type PermissionResult,
  PermissionResultSchema,
  type ToolAnnotations,
  type ToolInput,
} from "./types.js";

/** Reason used whenever a custom callback cannot produce a usable decision */
export const CALLBACK_FAILURE_REASON = "Permission callback failed";

const PATH_KEYS = ["path", "file_path", "filePath"] as const;

export interface PermissionGateOptions {
  logger?: Logger;
}

/**
 * Decides whether a tool call may run, from the tool name, its input and the
 * immutable policy. Evaluation order, first match wins:
 *
 * 0. The permission-prompt tool (`ask_user`) is always allowed
 * 1. Deny list
 * 2. `bypassAll` mode
 * 3. Allow list
 * 4. `readOnly` mode (annotations, then write/execute tool names)
 * 5. Custom callback (fails closed)
 * 6. Capability rules, then annotations for unknown tools, then allow
 *
 * @example
 * ```typescript
 * const gate = new PermissionGate(createPolicy({ fileWrite: false }));
 * const result = await gate.check("write_file", { path: "x.txt" }, { workingDir: "/work" });
 * // { decision: "deny", reason: "File writing is not allowed", interrupt: false }
 * ```
 */
export class PermissionGate {
  readonly #policy: Policy;
  readonly #logger: Logger;

  constructor(policy: Policy, options: PermissionGateOptions = {}) {
    this.#policy = policy;
    this.#logger = options.logger ?? createSilentLogger();
  }

  get policy(): Policy {
    return this.#policy;
  }

  async check(
    toolName: string,
    toolInput: ToolInput,
    context: PermissionContext
  ): Promise<PermissionResult> {
    const result = await this.#evaluate(toolName, toolInput, context);
    if (result.decision === "deny") {
      this.#logger.debug("Tool call denied", { toolName, reason: result.reason });
    }
    return result;
  }

  async #evaluate(
    toolName: string,
    toolInput: ToolInput,
    context: PermissionContext
  ): Promise<PermissionResult> {
    const policy = this.#policy;

    // Ahead of the deny list on purpose: the operator can always be asked.
    if (normalizeToolName(toolName) === PERMISSION_PROMPT_TOOL) {
      return allow();
    }

    if (matchesToolName(toolName, policy.deniedTools)) {
      return deny(`Tool '${toolName}' is on the deny list`);
    }

    if (policy.mode === "bypassAll") {
      return allow();
    }

    if (policy.allowedTools && !matchesToolName(toolName, policy.allowedTools)) {
      return deny(`Tool '${toolName}' is not in the allowed tools list`);
    }

    if (policy.mode === "readOnly") {
      return this.#checkReadOnly(toolName, context.annotations);
    }

    if (policy.canUseTool) {
      return this.#runCallback(toolName, toolInput, context);
    }

    return this.#checkCapabilities(toolName, toolInput, context);
  }

  /** Decides every call in read-only mode; capability flags and the callback are not consulted */
  #checkReadOnly(toolName: string, annotations: ToolAnnotations | undefined): PermissionResult {
    if (annotations?.readOnly) {
      return allow();
    }
    if (annotations?.destructive) {
      return deny("Permission denied: tool is destructive and read-only mode is active");
    }
    if (isWriteLikeTool(toolName)) {
      return deny("Permission denied: read-only mode is active");
    }
    return allow();
  }

  async #runCallback(
    toolName: string,
    toolInput: ToolInput,
    context: PermissionContext
  ): Promise<PermissionResult> {
    const callback = this.#policy.canUseTool;
    if (!callback) {
      return deny(CALLBACK_FAILURE_REASON);
    }

    try {
      const raw: unknown = await callback(toolName, toolInput, context);
      const parsed = PermissionResultSchema.safeParse(raw);
      if (parsed.success) {
        return parsed.data;
      }
      this.#logger.warn("Permission callback returned an invalid result", { toolName, raw });
    } catch (error) {
      this.#logger.warn("Permission callback threw", { toolName, error: errorMessage(error) });
    }
    return deny(CALLBACK_FAILURE_REASON);
  }

  async #checkCapabilities(
    toolName: string,
    toolInput: ToolInput,
    context: PermissionContext
  ): Promise<PermissionResult> {
    const policy = this.#policy;

    switch (classifyTool(toolName)) {
      case "fileRead":
        return policy.fileRead ? allow() : deny("File reading is not allowed");
      case "fileWrite":
        return this.#checkFileWrite(toolInput, context);
      case "shell":
        return policy.shell ? allow() : deny("Shell command execution is not allowed");
      case "codeExec":
        return policy.codeExec ? allow() : deny("Code execution is not allowed");
      case "web":
        return policy.web ? allow() : deny("Web access is not allowed");
      case "packageInstall":
        return policy.packageInstall ? allow() : deny("Package installation is not allowed");
      case undefined:
        return this.#checkAnnotations(context.annotations);
    }
  }

  async #checkFileWrite(toolInput: ToolInput, context: PermissionContext): Promise<PermissionResult> {
    const { fileWrite } = this.#policy;

    if (fileWrite === false) {
      return deny("File writing is not allowed");
    }
    if (typeof fileWrite !== "string") {
      return allow();
    }

    const target = PATH_KEYS.map((key) => toolInput[key]).find(
      (value): value is string => typeof value === "string" && value.length > 0
    );
    if (target === undefined) {
      return deny(`File writing only allowed in: ${fileWrite}`);
    }
    if (hasPathTraversal(target)) {
      return deny("Path traversal patterns not allowed in file paths");
    }

    try {
      const inside = await isPathWithin(path.resolve(context.workingDir, target), fileWrite);
      return inside ? allow() : deny(`File writing only allowed in: ${fileWrite}`);
    } catch (error) {
      this.#logger.warn("Could not resolve write target", { target, error: errorMessage(error) });
      return deny(`File writing only allowed in: ${fileWrite}`);
    }
  }

  #checkAnnotations(annotations: ToolAnnotations | undefined): PermissionResult {
    const policy = this.#policy;

    if (annotations?.destructive && policy.fileWrite === false && !policy.shell) {
      return deny("Tool is marked as destructive and write operations are disabled");
    }
    if (annotations?.readOnly) {
      return allow();
    }
    if (annotations?.openWorld && !policy.web) {
      return deny("Tool can access external resources but web access is disabled");
    }
    return allow();
  }
}
