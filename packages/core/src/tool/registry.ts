// ============================================
// Tool Registry
// ============================================

import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import { errorMessage } from "../errors/index.js";
import type { ToolRequest, ToolResult, ToolSpec } from "../provider/types.js";
import type { Tool, ToolContext } from "./define.js";

export type AnyTool = Tool<z.ZodTypeAny, unknown>;

/**
 * Tools available to one agent.
 *
 * Lookup is case-insensitive; the registered casing is what the model sees.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry([readFileTool, writeFileTool]);
 *
 * registry.get("READ_FILE"); // readFileTool
 * provider.setTools(registry.specs());
 * ```
 */
export class ToolRegistry {
  /** lowercase name -> tool */
  readonly #tools = new Map<string, AnyTool>();

  constructor(tools: readonly AnyTool[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * @throws Error if a tool with the same name (ignoring case) exists
   */
  register(tool: AnyTool): void {
    const key = tool.name.toLowerCase();
    if (this.#tools.has(key)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.#tools.set(key, tool);
  }

  get(name: string): AnyTool | undefined {
    return this.#tools.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.#tools.has(name.toLowerCase());
  }

  list(): AnyTool[] {
    return Array.from(this.#tools.values());
  }

  names(): string[] {
    return this.list().map((tool) => tool.name);
  }

  get size(): number {
    return this.#tools.size;
  }

  /**
   * Tool descriptions for the model, parameters converted to JSON Schema.
   */
  specs(): ToolSpec[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: {
        ...zodToJsonSchema(tool.parameters, { target: "openApi3", $refStrategy: "none" }),
      },
    }));
  }

  /**
   * Validate the request's arguments and run the tool. Never throws: unknown
   * tools, invalid arguments and tool failures all become error results.
   */
  async execute(request: ToolRequest, context: ToolContext): Promise<ToolResult> {
    const base = { requestId: request.id, toolName: request.name };
    const tool = this.get(request.name);
    if (!tool) {
      return { ...base, ok: false, error: `Unknown tool: ${request.name}` };
    }

    const parsed = tool.parameters.safeParse(request.arguments);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
      return { ...base, ok: false, error: `Invalid arguments for ${tool.name}: ${details}` };
    }

    try {
      const outcome = await tool.execute(parsed.data, context);
      return outcome.success
        ? { ...base, ok: true, value: outcome.output }
        : { ...base, ok: false, error: outcome.error };
    } catch (error) {
      return { ...base, ok: false, error: errorMessage(error) };
    }
  }
}
