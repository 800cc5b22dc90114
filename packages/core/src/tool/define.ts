/**
 * Tool definitions: typed parameters, capability annotations and execution.
 */

import type { z } from "zod";
import type { ToolAnnotations } from "../permission/types.js";

// =============================================================================
// Execution Context and Outcome
// =============================================================================

export interface ToolContext {
  /** Relative paths resolve against this directory */
  workingDir: string;
  /** Id of the tool request being served */
  requestId: string;
  /** Aborted when the run is cancelled */
  signal: AbortSignal;
}

export type ToolOutcome<T> = { success: true; output: T } | { success: false; error: string };

/**
 * @example
 * ```typescript
 * return ok({ files: ["a.txt", "b.txt"] });
 * ```
 */
export function ok<T>(output: T): ToolOutcome<T> {
  return { success: true, output };
}

export function fail(error: string): ToolOutcome<never> {
  return { success: false, error };
}

// =============================================================================
// Tool
// =============================================================================

/**
 * @template TInput - Zod schema of the arguments
 * @template TOutput - Value returned on success
 */
export interface Tool<TInput extends z.ZodTypeAny = z.ZodTypeAny, TOutput = unknown> {
  readonly name: string;
  /** Shown to the model */
  readonly description: string;
  readonly parameters: TInput;
  /** Consumed by the permission gate */
  readonly annotations: Readonly<ToolAnnotations>;
  execute(input: z.infer<TInput>, context: ToolContext): Promise<ToolOutcome<TOutput>>;
}

export interface DefineToolConfig<TInput extends z.ZodTypeAny, TOutput> {
  name: string;
  description: string;
  parameters: TInput;
  annotations?: ToolAnnotations;
  execute: (input: z.infer<TInput>, context: ToolContext) => Promise<ToolOutcome<TOutput>>;
}

const TOOL_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

/**
 * Create a typed tool. Argument types are inferred from the parameter schema.
 *
 * @example
 * ```typescript
 * const readFile = defineTool({
 *   name: "read_file",
 *   description: "Read a UTF-8 text file",
 *   parameters: z.object({ path: z.string() }),
 *   annotations: { readOnly: true },
 *   async execute({ path }, ctx) {
 *     return ok(await fs.readFile(resolve(ctx.workingDir, path), "utf-8"));
 *   },
 * });
 * ```
 */
export function defineTool<TInput extends z.ZodTypeAny, TOutput>(
  config: DefineToolConfig<TInput, TOutput>
): Tool<TInput, TOutput> {
  if (!TOOL_NAME_PATTERN.test(config.name)) {
    throw new Error(`Invalid tool name: '${config.name}'`);
  }

  return {
    name: config.name,
    description: config.description,
    parameters: config.parameters,
    annotations: Object.freeze({ ...config.annotations }),
    execute: config.execute,
  };
}
