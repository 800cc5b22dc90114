/**
 * ScriptedProvider - deterministic chat provider for tests and offline runs
 *
 * Replies come from a script, one entry per assistant turn. Clones share the
 * script cursor, so a delegated sub-agent or a compaction summary simply takes
 * the next entry.
 *
 * @module @helmsman/core/provider
 */

import { ErrorCode } from "@helmsman/shared";
import { ProviderError } from "../errors/index.js";
import type { ToolInput } from "../permission/types.js";
import {
  addUsage,
  type ChatProvider,
  type ContentItem,
  EMPTY_USAGE,
  type ProviderCallOptions,
  type ProviderInput,
  type ProviderStream,
  type ToolRequest,
  type ToolRequestListener,
  type ToolResultListener,
  type ToolSpec,
  type Turn,
  type Usage,
} from "./types.js";

// =============================================================================
// Script Types
// =============================================================================

export interface ScriptedToolCall {
  /** Defaults to `call_<n>` */
  id?: string;
  name: string;
  arguments?: ToolInput;
}

export interface ScriptedResponse {
  text?: string;
  /** Split the streamed text this way (default: one chunk) */
  chunks?: string[];
  toolCalls?: ScriptedToolCall[];
  /** Cost of this turn in USD, added to the running total */
  cost?: number;
  inputTokens?: number;
  outputTokens?: number;
  /** Streaming this entry fails with this error; the blocking call still answers */
  streamError?: Error;
  /** The blocking call for this entry fails with this error */
  chatError?: Error;
  /** Simulated latency before the reply, in ms */
  delay?: number;
}

/**
 * Position in a script, shared between a provider and its clones.
 */
export interface ScriptCursor {
  readonly responses: readonly ScriptedResponse[];
  index: number;
  toolCallCount: number;
}

export interface ScriptedProviderOptions {
  name?: string;
  model?: string;
  systemPrompt?: string;
}

// =============================================================================
// Stream
// =============================================================================

class ScriptedStream implements ProviderStream {
  readonly #iterator: AsyncGenerator<string, Turn>;
  #turn: Turn | undefined;

  constructor(generate: () => AsyncGenerator<string, Turn>) {
    this.#iterator = generate();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    while (true) {
      const step = await this.#iterator.next();
      if (step.done) {
        this.#turn = step.value;
        return;
      }
      yield step.value;
    }
  }

  async turn(): Promise<Turn> {
    if (!this.#turn) {
      for await (const _chunk of this) {
        // drain so the finished turn is recorded
      }
    }
    if (!this.#turn) {
      throw new ProviderError("Stream ended without a turn", ErrorCode.PROVIDER_INVALID_RESPONSE);
    }
    return this.#turn;
  }
}

// =============================================================================
// ScriptedProvider
// =============================================================================

/**
 * @example
 * ```typescript
 * const provider = new ScriptedProvider([
 *   { text: "Let me look.", toolCalls: [{ name: "read_file", arguments: { path: "a.txt" } }], cost: 0.01 },
 *   { text: "The file says hello.", cost: 0.01 },
 * ]);
 * ```
 */
export class ScriptedProvider implements ChatProvider {
  readonly name: string;
  readonly model: string;
  /** Every input received, in order (streamed attempts included) */
  readonly inputs: ProviderInput[] = [];

  readonly #cursor: ScriptCursor;
  readonly #requestListeners = new Set<ToolRequestListener>();
  readonly #resultListeners = new Set<ToolResultListener>();
  #turns: Turn[] = [];
  #tools: ToolSpec[] = [];
  #systemPrompt: string | undefined;
  #usage: Usage = EMPTY_USAGE;

  constructor(
    script: readonly ScriptedResponse[] | ScriptCursor,
    options: ScriptedProviderOptions = {}
  ) {
    this.#cursor = "responses" in script ? script : { responses: script, index: 0, toolCallCount: 0 };
    this.name = options.name ?? "scripted";
    this.model = options.model ?? "scripted-model";
    this.#systemPrompt = options.systemPrompt;
  }

  /** Entries not consumed yet */
  get remaining(): number {
    return this.#cursor.responses.length - this.#cursor.index;
  }

  get tools(): readonly ToolSpec[] {
    return this.#tools;
  }

  stream(input: ProviderInput, options: ProviderCallOptions = {}): ProviderStream {
    this.inputs.push(input);
    return new ScriptedStream(() => this.#generate(input, options));
  }

  async chat(input: ProviderInput, options: ProviderCallOptions = {}): Promise<string> {
    this.inputs.push(input);
    this.#throwIfAborted(options.signal);
    const response = this.#advance();
    if (response.chatError) {
      throw response.chatError;
    }
    await pause(response.delay);
    this.#commit(input, response);
    return response.text ?? "";
  }

  onToolRequest(listener: ToolRequestListener): () => void {
    this.#requestListeners.add(listener);
    return () => this.#requestListeners.delete(listener);
  }

  onToolResult(listener: ToolResultListener): () => void {
    this.#resultListeners.add(listener);
    return () => this.#resultListeners.delete(listener);
  }

  setTools(tools: readonly ToolSpec[]): void {
    this.#tools = [...tools];
  }

  getSystemPrompt(): string | undefined {
    return this.#systemPrompt;
  }

  setSystemPrompt(prompt: string | undefined): void {
    this.#systemPrompt = prompt;
  }

  getTurns(): readonly Turn[] {
    return this.#turns;
  }

  setTurns(turns: readonly Turn[]): void {
    this.#turns = [...turns];
  }

  usage(): Usage {
    return this.#usage;
  }

  clone(): ScriptedProvider {
    return new ScriptedProvider(this.#cursor, { name: this.name, model: this.model });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  async *#generate(input: ProviderInput, options: ProviderCallOptions): AsyncGenerator<string, Turn> {
    const response = this.#peek();
    this.#throwIfAborted(options.signal);
    if (response.streamError) {
      throw response.streamError;
    }
    await pause(response.delay);
    for (const chunk of response.chunks ?? [response.text ?? ""]) {
      yield chunk;
    }
    return this.#commit(input, this.#advance());
  }

  #peek(): ScriptedResponse {
    const response = this.#cursor.responses[this.#cursor.index];
    if (!response) {
      throw new ProviderError(
        `Script exhausted after ${this.#cursor.responses.length} responses`,
        ErrorCode.PROVIDER_ERROR
      );
    }
    return response;
  }

  #advance(): ScriptedResponse {
    const response = this.#peek();
    this.#cursor.index += 1;
    return response;
  }

  #throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new ProviderError("Request aborted", ErrorCode.PROVIDER_ERROR);
    }
  }

  #commit(input: ProviderInput, response: ScriptedResponse): Turn {
    this.#turns.push(this.#inputTurn(input));

    const requests: ToolRequest[] = (response.toolCalls ?? []).map((call) => {
      this.#cursor.toolCallCount += 1;
      return {
        id: call.id ?? `call_${this.#cursor.toolCallCount}`,
        name: call.name,
        arguments: call.arguments ?? {},
      };
    });

    const usage: Usage = {
      inputTokens: response.inputTokens ?? 0,
      outputTokens: response.outputTokens ?? 0,
      cachedTokens: 0,
      cost: response.cost ?? 0,
    };
    const contents: ContentItem[] = [];
    if (response.text) {
      contents.push({ type: "text", text: response.text });
    }
    for (const request of requests) {
      contents.push({ type: "tool_request", request });
    }

    const turn: Turn = { role: "assistant", contents, usage };
    this.#turns.push(turn);
    this.#usage = addUsage(this.#usage, usage);

    for (const request of requests) {
      for (const listener of this.#requestListeners) {
        listener(request);
      }
    }
    return turn;
  }

  #inputTurn(input: ProviderInput): Turn {
    if (input.kind === "prompt") {
      return { role: "user", contents: [{ type: "text", text: input.text }] };
    }
    for (const result of input.results) {
      for (const listener of this.#resultListeners) {
        listener(result);
      }
    }
    return {
      role: "user",
      contents: input.results.map((result) => ({ type: "tool_result", result })),
    };
  }
}

async function pause(ms: number | undefined): Promise<void> {
  if (ms && ms > 0) {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
