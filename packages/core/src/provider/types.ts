/**
 * Contract between the execution loop and a language-model transport.
 *
 * The transport owns the conversation history. The loop only sends input,
 * reads turns back and asks for usage totals.
 */

import type { ToolInput } from "../permission/types.js";

// ============================================
// Conversation Records
// ============================================

export type Role = "user" | "assistant" | "system";

/**
 * The model's request to call a tool. Consumed exactly once by the loop.
 */
export interface ToolRequest {
  readonly id: string;
  readonly name: string;
  readonly arguments: ToolInput;
}

/**
 * Outcome of one tool request, sent back to the model.
 */
export type ToolResult = {
  /** Id of the {@link ToolRequest} this answers */
  readonly requestId: string;
  readonly toolName: string;
} & ({ readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly error: string });

export type ContentItem =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "tool_request"; readonly request: ToolRequest }
  | { readonly type: "tool_result"; readonly result: ToolResult };

/**
 * Token and cost accounting. On a turn it covers that turn; from
 * {@link ChatProvider.usage} it is the running total.
 */
export interface Usage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cachedTokens: number;
  /** USD */
  readonly cost: number;
}

export interface Turn {
  readonly role: Role;
  readonly contents: readonly ContentItem[];
  readonly usage?: Usage;
}

export const EMPTY_USAGE: Usage = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
  cachedTokens: 0,
  cost: 0,
});

export function addUsage(a: Usage, b: Usage): Usage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    cachedTokens: a.cachedTokens + b.cachedTokens,
    cost: a.cost + b.cost,
  };
}

export function turnText(turn: Turn): string {
  return turn.contents
    .flatMap((item) => (item.type === "text" ? [item.text] : []))
    .join("");
}

export function turnToolRequests(turn: Turn): ToolRequest[] {
  return turn.contents.flatMap((item) => (item.type === "tool_request" ? [item.request] : []));
}

// ============================================
// Provider Interface
// ============================================

/**
 * What the loop sends: the user's prompt, or the results of the tool calls
 * the model asked for in its previous turn.
 */
export type ProviderInput =
  | { readonly kind: "prompt"; readonly text: string }
  | { readonly kind: "tool_results"; readonly results: readonly ToolResult[] };

export interface ProviderCallOptions {
  signal?: AbortSignal;
}

/**
 * Incremental text of one assistant turn. `turn()` resolves to the finished
 * turn once the text has been consumed (and drains it if it has not).
 */
export interface ProviderStream extends AsyncIterable<string> {
  turn(): Promise<Turn>;
}

/**
 * Tool description advertised to the model.
 */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  /** JSON Schema of the arguments */
  readonly inputSchema: Record<string, unknown>;
}

export type ToolRequestListener = (request: ToolRequest) => void;
export type ToolResultListener = (result: ToolResult) => void;

export interface ChatProvider {
  readonly name: string;
  readonly model: string;

  /** Send input and stream the assistant's reply */
  stream(input: ProviderInput, options?: ProviderCallOptions): ProviderStream;
  /** Send input and wait for the assistant's complete reply text */
  chat(input: ProviderInput, options?: ProviderCallOptions): Promise<string>;

  /**
   * Called once per tool request the provider parses out of a reply.
   * Returns an unsubscribe function.
   */
  onToolRequest(listener: ToolRequestListener): () => void;
  /** Called when a tool result is about to be sent back to the model */
  onToolResult(listener: ToolResultListener): () => void;

  setTools(tools: readonly ToolSpec[]): void;
  getSystemPrompt(): string | undefined;
  setSystemPrompt(prompt: string | undefined): void;
  getTurns(): readonly Turn[];
  setTurns(turns: readonly Turn[]): void;
  /** Running totals for this conversation */
  usage(): Usage;
  /** Same transport and model with an independent, empty conversation */
  clone(): ChatProvider;
}
