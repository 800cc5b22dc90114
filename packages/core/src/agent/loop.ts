// ============================================
// Agent Loop Core
// ============================================

import { createId, ErrorCode } from "@helmsman/shared";
import type { z } from "zod";
import { errorMessage, HelmsmanError, isHelmsmanError, ProviderError } from "../errors/index.js";
import { type AgentEvent, type AgentEventInput, type CostSummary, stampEvent } from "../events/agent-events.js";
import { EventStream } from "../events/stream.js";
import { BudgetTracker, type BudgetSnapshot } from "../budget/index.js";
import { HookPipeline, requestsStop } from "../hooks/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import { PermissionGate } from "../permission/gate.js";
import { describePolicy, standardPolicy, type Policy } from "../permission/policy.js";
import {
  type ChatProvider,
  EMPTY_USAGE,
  type ProviderInput,
  type ToolRequest,
  type ToolResult,
  type Turn,
  turnText,
  type Usage,
} from "../provider/types.js";
import { type AskUserCallback, createAskUserTool } from "../tool/ask-user.js";
import { type AnyTool, ToolRegistry } from "../tool/registry.js";
import { compactConversation, type CompactionOutcome, type CompactOptions } from "./compaction.js";
import {
  type AgentDefinition,
  buildDelegationPrompt,
  createDelegateTool,
  type DelegationHost,
} from "./delegation.js";
import { type AgentResult, costSummary } from "./result.js";
import { StallDetector } from "./stall-detector.js";
import { type RunState, RunStateMachine, type StopReason } from "./state.js";
import { outputInstructions, parseStructuredOutput } from "./structured-output.js";

/**
 * Configuration for the AgentLoop.
 */
export interface AgentLoopOptions {
  provider: ChatProvider;
  tools?: readonly AnyTool[];
  /** Defaults to {@link standardPolicy} for the working directory */
  policy?: Policy;
  hooks?: HookPipeline;
  /** Defaults to `process.cwd()` */
  workingDir?: string;
  systemPrompt?: string;
  logger?: Logger;
  /** Identical responses in a row before a stall warning (minimum 2) */
  stallWindow?: number;
  /** Registers the `ask_user` tool when given */
  askUser?: AskUserCallback;
  /** Registers the `delegate_to_agent` tool when non-empty */
  subAgents?: readonly AgentDefinition[];
  /** Shown in logs; sub-agents take their definition's name */
  name?: string;
  /** Events buffered before the loop waits for the consumer */
  streamCapacity?: number;
}

export interface RunOptions<T = unknown> {
  /** Overrides the policy's turn limit; `null` removes it */
  maxTurns?: number | null;
  /** Emit `text_chunk` events while the reply streams (default: true) */
  includePartial?: boolean;
  signal?: AbortSignal;
  /** Ask for JSON matching this schema and parse the final reply with it */
  outputSchema?: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * A run in progress. Iterate it for events; `result` settles once the
 * run has stopped.
 *
 * Events are buffered up to the stream capacity, after which the loop waits
 * for the consumer. Callers that only want the result should use
 * {@link AgentLoop.runSync}. Leaving the iteration early cancels the run.
 */
export interface AgentRun<T = unknown> extends AsyncIterable<AgentEvent> {
  readonly events: EventStream<AgentEvent>;
  readonly result: Promise<AgentResult<T>>;
  cancel(): void;
}

interface ToolCallOutcome {
  result: ToolResult;
  interrupt: boolean;
}

interface RunScope {
  signal: AbortSignal;
  includePartial: boolean;
  emit: (event: AgentEventInput) => Promise<void>;
}

function errorResult(request: ToolRequest, error: string): ToolResult {
  return { requestId: request.id, toolName: request.name, ok: false, error };
}

function lastAssistantTurn(turns: readonly Turn[], fallbackText: string): Turn {
  for (let index = turns.length - 1; index >= 0; index--) {
    const turn = turns[index];
    if (turn?.role === "assistant") {
      return turn;
    }
  }
  return { role: "assistant", contents: fallbackText ? [{ type: "text", text: fallbackText }] : [] };
}

/**
 * Drives one conversation with a model: sends the task, answers tool
 * requests through the permission gate, hooks and tool registry, and stops
 * on completion, a budget breach, a hook's request or cancellation.
 *
 * One run at a time per instance. The conversation itself lives in the
 * provider and carries over between runs.
 *
 * @example
 * ```typescript
 * const agent = new AgentLoop({
 *   provider,
 *   tools: [readFile],
 *   policy: standardPolicy("/work", { maxCostUsd: 1 }),
 * });
 *
 * for await (const event of agent.run("Summarize README.md")) {
 *   if (event.type === "text_chunk") process.stdout.write(event.text);
 * }
 * ```
 */
export class AgentLoop implements DelegationHost {
  readonly name: string;
  readonly policy: Policy;
  readonly hooks: HookPipeline;
  readonly workingDir: string;
  readonly logger: Logger;
  readonly tools: ToolRegistry;

  readonly #provider: ChatProvider;
  readonly #gate: PermissionGate;
  readonly #budget: BudgetTracker;
  readonly #stall: StallDetector;
  readonly #streamCapacity?: number;
  #machine = new RunStateMachine();
  #log: Logger;
  #running = false;
  #stopRequested = false;

  constructor(options: AgentLoopOptions) {
    this.name = options.name ?? "agent";
    this.workingDir = options.workingDir ?? process.cwd();
    this.policy = options.policy ?? standardPolicy(this.workingDir);
    this.logger = (options.logger ?? createSilentLogger()).child({ agent: this.name });
    this.#log = this.logger;
    this.hooks = options.hooks ?? new HookPipeline({ logger: this.logger });
    this.#provider = options.provider;
    this.#gate = new PermissionGate(this.policy, { logger: this.logger });
    this.#budget = new BudgetTracker({ maxTurns: this.policy.maxTurns, maxCostUsd: this.policy.maxCostUsd });
    this.#stall = new StallDetector({ windowSize: options.stallWindow });
    this.#streamCapacity = options.streamCapacity;

    this.tools = new ToolRegistry(options.tools);
    if (options.askUser) {
      this.tools.register(createAskUserTool(options.askUser));
    }

    const subAgents = options.subAgents ?? [];
    let systemPrompt = options.systemPrompt;
    if (subAgents.length > 0) {
      this.tools.register(createDelegateTool(subAgents, this));
      systemPrompt = buildDelegationPrompt(systemPrompt, subAgents);
    }
    if (systemPrompt !== undefined) {
      this.#provider.setSystemPrompt(systemPrompt);
    }
    this.#provider.setTools(this.tools.specs());
  }

  // ============================================
  // Accessors
  // ============================================

  get provider(): ChatProvider {
    return this.#provider;
  }

  /** State of the current or most recent run */
  get state(): RunState {
    return this.#machine.state;
  }

  get isRunning(): boolean {
    return this.#running;
  }

  get turns(): readonly Turn[] {
    return this.#provider.getTurns();
  }

  /** Cumulative cost of this agent's conversation */
  cost(): CostSummary {
    return costSummary(this.#provider.usage());
  }

  budget(): BudgetSnapshot {
    return this.#budget.snapshot();
  }

  // ============================================
  // Entry Points
  // ============================================

  /**
   * Start a run and return its event stream.
   *
   * @throws HelmsmanError when a run is already in progress
   */
  run<T = unknown>(task: string, options: RunOptions<T> = {}): AgentRun<T> {
    if (this.#running) {
      throw new HelmsmanError(`Agent '${this.name}' is already running`, ErrorCode.AGENT_LOOP_ERROR);
    }
    this.#running = true;

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const events = new EventStream<AgentEvent>({
      capacity: this.#streamCapacity,
      onDetach: () => controller.abort(),
    });

    const result = this.#execute(task, options, events, controller.signal).finally(() => {
      options.signal?.removeEventListener("abort", onAbort);
      this.#running = false;
    });

    return {
      events,
      result,
      cancel: () => controller.abort(),
      [Symbol.asyncIterator]: () => events[Symbol.asyncIterator](),
    };
  }

  /**
   * Run to completion and return the result with every event collected.
   */
  async runSync<T = unknown>(task: string, options: Omit<RunOptions<T>, "includePartial"> = {}): Promise<AgentResult<T>> {
    const run = this.run(task, { ...options, includePartial: true });
    await run.events.collect();
    return run.result;
  }

  /**
   * Replace older turns with a summary in the system prompt.
   */
  compact(options: CompactOptions = {}): Promise<CompactionOutcome> {
    return compactConversation(
      { provider: this.#provider, hooks: this.hooks, workingDir: this.workingDir, logger: this.logger },
      options
    );
  }

  /** Stop after the current turn with `hook_requested_stop` */
  requestStop(): void {
    this.#stopRequested = true;
  }

  /**
   * A fresh agent on a cloned provider, sharing this agent's policy and
   * working directory.
   */
  spawnSubAgent(definition: AgentDefinition): AgentLoop {
    return new AgentLoop({
      provider: this.#provider.clone(),
      tools: definition.tools ?? [],
      policy: this.policy,
      workingDir: this.workingDir,
      systemPrompt: definition.systemPrompt,
      logger: this.logger,
      name: definition.name,
      streamCapacity: this.#streamCapacity,
    });
  }

  // ============================================
  // Run
  // ============================================

  async #execute<T>(
    task: string,
    options: RunOptions<T>,
    stream: EventStream<AgentEvent>,
    signal: AbortSignal
  ): Promise<AgentResult<T>> {
    const startedAt = Date.now();
    const runId = createId("run");
    this.#log = this.logger.child({ runId });
    const timer = this.#log.startTimer("run");
    const collected: AgentEvent[] = [];
    const scope: RunScope = {
      signal,
      includePartial: options.includePartial ?? true,
      emit: async (input) => {
        const event = stampEvent(input);
        collected.push(event);
        await stream.push(event);
      },
    };

    this.#machine = new RunStateMachine();
    this.#machine.start();
    this.#stopRequested = false;
    this.#budget.reset({
      maxTurns: options.maxTurns === undefined ? this.policy.maxTurns : options.maxTurns,
      maxCostUsd: this.policy.maxCostUsd,
    });

    let reason: StopReason | undefined;
    let turnNumber = 0;
    let finalText = "";

    try {
      await scope.emit({ type: "start", task });
      this.#budget.recordCost(this.#provider.usage().cost);
      const sessionResult = await this.hooks.fire("SessionStart", {
        workingDir: this.workingDir,
        policy: describePolicy(this.policy),
        toolNames: this.tools.names(),
      });
      const promptResult = await this.hooks.fire("UserPromptSubmit", task, { workingDir: this.workingDir });
      if (requestsStop(sessionResult) || requestsStop(promptResult)) {
        this.#stopRequested = true;
      }

      let input: ProviderInput = {
        kind: "prompt",
        text: options.outputSchema ? outputInstructions(task, options.outputSchema) : task,
      };

      while (reason === undefined) {
        if (signal.aborted) {
          reason = "cancelled";
          break;
        }
        if (this.#stopRequested) {
          reason = "hook_requested_stop";
          break;
        }
        if (this.#budget.costExhausted) {
          reason = "cost_limit";
          break;
        }

        turnNumber++;
        this.#log.debug(`Turn ${turnNumber}`, { input: input.kind });
        const { turn, requests } = await this.#sendTurn(input, scope);
        this.#budget.recordCost(this.#provider.usage().cost);

        const text = turnText(turn);
        if (text) {
          finalText = text;
          await scope.emit({ type: "text_complete", text });
        }
        const stall = this.#stall.record(text, requests.length > 0);
        if (stall.message) {
          this.#log.warn(stall.message);
          await scope.emit({ type: "warning", message: stall.message, details: { repeats: stall.repeats } });
        }

        const results: ToolResult[] = [];
        let interrupted = false;
        for (const request of requests) {
          if (signal.aborted) {
            break;
          }
          const outcome = await this.#handleToolCall(request, turnNumber, scope);
          results.push(outcome.result);
          if (outcome.interrupt) {
            interrupted = true;
            break;
          }
        }

        this.#budget.recordTurn(this.#provider.usage().cost);
        const evaluation = this.#budget.evaluate({ pendingToolWork: requests.length > 0 });
        if (evaluation.warning) {
          this.#log.warn(evaluation.warning);
          await scope.emit({
            type: "warning",
            message: evaluation.warning,
            details: { costUsed: this.#budget.costUsed, maxCostUsd: this.policy.maxCostUsd },
          });
        }
        await scope.emit({ type: "turn_complete", turn, turnNumber });

        if (interrupted) {
          reason = "error";
        } else if (signal.aborted) {
          reason = "cancelled";
        } else if (evaluation.breach) {
          reason = evaluation.breach;
        } else if (this.#stopRequested) {
          reason = "hook_requested_stop";
        } else if (requests.length === 0) {
          reason = "complete";
        } else {
          input = { kind: "tool_results", results };
        }
      }
    } catch (error) {
      reason = signal.aborted ? "cancelled" : "error";
      if (reason === "error") {
        this.#log.error(`Run failed: ${errorMessage(error)}`, {
          code: isHelmsmanError(error) ? error.code : undefined,
        });
        await scope.emit({ type: "warning", message: `Run failed: ${errorMessage(error)}` });
      }
    }

    let structuredOutput: T | undefined;
    if (options.outputSchema && finalText) {
      const parsed = parseStructuredOutput(finalText, options.outputSchema);
      if (parsed.ok) {
        structuredOutput = parsed.value;
      } else {
        this.#log.warn(parsed.error);
        await scope.emit({ type: "warning", message: parsed.error });
      }
    }

    this.#machine.finish(reason);
    const usage = this.#finalUsage();
    const endContext = { workingDir: this.workingDir, totalTurns: turnNumber, cost: usage };
    await this.hooks.fire("Stop", reason, endContext);
    await this.hooks.fire("SessionEnd", reason, endContext);

    const cost = costSummary(usage);
    await scope.emit({ type: "stop", reason, totalTurns: turnNumber, cost });
    stream.end();
    timer.done(`Run stopped: ${reason}`, { turns: turnNumber, cost: cost.total });

    return {
      runId,
      finalText,
      events: collected,
      turns: this.#provider.getTurns(),
      cost,
      durationMs: Date.now() - startedAt,
      stopReason: reason,
      structuredOutput,
    };
  }

  /**
   * One model turn. Streams when the provider can, and retries once as a
   * blocking call when the stream fails.
   */
  /** Usage for the run summary; a provider that cannot report it counts as zero */
  #finalUsage(): Usage {
    try {
      return this.#provider.usage();
    } catch (error) {
      this.#log.warn(`Provider usage unavailable: ${errorMessage(error)}`);
      return EMPTY_USAGE;
    }
  }

  async #sendTurn(input: ProviderInput, scope: RunScope): Promise<{ turn: Turn; requests: ToolRequest[] }> {
    const requests: ToolRequest[] = [];
    const unsubscribeRequests = this.#provider.onToolRequest((request) => requests.push(request));
    const unsubscribeResults = this.#provider.onToolResult((result) => {
      this.#log.debug("Tool result sent to model", {
        requestId: result.requestId,
        toolName: result.toolName,
        ok: result.ok,
      });
    });
    try {
      try {
        const stream = this.#provider.stream(input, { signal: scope.signal });
        for await (const chunk of stream) {
          if (chunk && scope.includePartial) {
            await scope.emit({ type: "text_chunk", text: chunk });
          }
        }
        return { turn: await stream.turn(), requests };
      } catch (error) {
        if (scope.signal.aborted) {
          throw error;
        }
        const message = `Streaming failed, falling back to blocking call: ${errorMessage(error)}`;
        this.#log.warn(message);
        await scope.emit({ type: "warning", message, details: { provider: this.#provider.name } });
      }

      requests.length = 0;
      let text: string;
      try {
        text = await this.#provider.chat(input, { signal: scope.signal });
      } catch (error) {
        throw new ProviderError(`Provider call failed: ${errorMessage(error)}`, undefined, { cause: error });
      }
      if (text && scope.includePartial) {
        await scope.emit({ type: "text_chunk", text });
      }
      return { turn: lastAssistantTurn(this.#provider.getTurns(), text), requests };
    } finally {
      unsubscribeRequests();
      unsubscribeResults();
    }
  }

  /**
   * Gate, hooks, execution. Every path emits `tool_start` and `tool_end`.
   */
  async #handleToolCall(request: ToolRequest, turnNumber: number, scope: RunScope): Promise<ToolCallOutcome> {
    const { id: requestId, name: toolName, arguments: toolInput } = request;
    await scope.emit({ type: "tool_start", requestId, toolName, toolInput });

    const finish = async (result: ToolResult, interrupt = false): Promise<ToolCallOutcome> => {
      await scope.emit(
        result.ok
          ? { type: "tool_end", requestId, toolName, result: result.value }
          : { type: "tool_end", requestId, toolName, error: result.error }
      );
      return { result, interrupt };
    };

    try {
      this.#budget.assertWithinCost();
    } catch (error) {
      return finish(errorResult(request, errorMessage(error)));
    }

    const annotations = this.tools.get(toolName)?.annotations;
    const permission = await this.#gate.check(toolName, toolInput, {
      workingDir: this.workingDir,
      annotations,
    });
    if (permission.decision === "deny") {
      this.#log.info(`Tool call denied: ${toolName}`, { reason: permission.reason });
      return finish(errorResult(request, permission.reason), permission.interrupt);
    }

    const preResult = await this.hooks.fire("PreToolUse", toolName, toolInput, {
      workingDir: this.workingDir,
      annotations,
      turn: turnNumber,
    });
    if (requestsStop(preResult)) {
      this.#stopRequested = true;
    }
    if (preResult?.permission === "deny") {
      return finish(errorResult(request, `Denied by hook: ${preResult.reason ?? "no reason given"}`));
    }

    const result = await this.tools.execute(request, {
      workingDir: this.workingDir,
      requestId,
      signal: scope.signal,
    });

    const postResult = await this.hooks.fire(
      "PostToolUse",
      toolName,
      result.ok ? result.value : undefined,
      result.ok ? undefined : result.error,
      { workingDir: this.workingDir, turn: turnNumber }
    );
    if (requestsStop(postResult)) {
      this.#stopRequested = true;
    }
    return finish(result);
  }
}
