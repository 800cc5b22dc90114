import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { eventsOfType } from "../../events/agent-events.js";
import { HookPipeline } from "../../hooks/pipeline.js";
import { Logger } from "../../logger/logger.js";
import { MemoryTransport } from "../../logger/transports/memory.js";
import { createPolicy, readOnlyPolicy, standardPolicy } from "../../permission/policy.js";
import { deny } from "../../permission/types.js";
import { ScriptedProvider, type ScriptedResponse } from "../../provider/scripted.js";
import type { Usage } from "../../provider/types.js";
import { defineTool, ok } from "../../tool/define.js";
import { AgentLoop, type AgentLoopOptions } from "../loop.js";
import { textChunks, toolCalls } from "../result.js";

const readFile = defineTool({
  name: "read_file",
  description: "Read a file",
  parameters: z.object({ path: z.string() }),
  annotations: { readOnly: true },
  async execute({ path }) {
    return ok(`contents of ${path}`);
  },
});

const readCall = (path = "notes.txt") => ({ name: "read_file", arguments: { path } });

function createAgent(
  script: ScriptedResponse[],
  options: Partial<AgentLoopOptions> = {}
): { agent: AgentLoop; provider: ScriptedProvider } {
  const provider = new ScriptedProvider(script);
  const agent = new AgentLoop({
    provider,
    tools: [readFile],
    policy: standardPolicy("/work"),
    workingDir: "/work",
    ...options,
  });
  return { agent, provider };
}

describe("AgentLoop", () => {
  describe("runSync", () => {
    it("should complete when the model answers without tool calls", async () => {
      const { agent } = createAgent([{ text: "Hello there", chunks: ["Hello ", "there"], cost: 0.001 }]);

      const result = await agent.runSync("Say hi");

      expect(result.stopReason).toBe("complete");
      expect(result.finalText).toBe("Hello there");
      expect(textChunks(result)).toEqual(["Hello ", "there"]);
      expect(result.events.map((event) => event.type)).toEqual([
        "start",
        "text_chunk",
        "text_chunk",
        "text_complete",
        "turn_complete",
        "stop",
      ]);
      expect(result.cost.total).toBe(0.001);
      expect(result.runId).toMatch(/^run_/);
      expect(agent.state).toBe("Completed");
    });

    it("should run requested tools and send their results back", async () => {
      const { agent, provider } = createAgent([
        { text: "Reading.", toolCalls: [readCall()] },
        { text: "It says hi." },
      ]);

      const result = await agent.runSync("What is in notes.txt?");

      expect(result.stopReason).toBe("complete");
      expect(result.finalText).toBe("It says hi.");
      expect(toolCalls(result)).toHaveLength(1);
      expect(eventsOfType(result.events, "tool_end")[0]).toMatchObject({
        requestId: "call_1",
        toolName: "read_file",
        result: "contents of notes.txt",
      });
      expect(provider.inputs[1]).toEqual({
        kind: "tool_results",
        results: [{ requestId: "call_1", toolName: "read_file", ok: true, value: "contents of notes.txt" }],
      });
      expect(eventsOfType(result.events, "turn_complete").map((event) => event.turnNumber)).toEqual([1, 2]);
    });

    it("should leave out text chunks when partial output is off", async () => {
      const { agent } = createAgent([{ text: "Quiet", chunks: ["Qu", "iet"] }]);

      const run = agent.run("Say something", { includePartial: false });
      const events = await run.events.collect();
      const result = await run.result;

      expect(events.some((event) => event.type === "text_chunk")).toBe(false);
      expect(result.finalText).toBe("Quiet");
    });

    it("should reject a second run while one is in progress", async () => {
      const { agent } = createAgent([{ text: "first", delay: 10 }]);

      const run = agent.run("one");
      expect(() => agent.run("two")).toThrow("Agent 'agent' is already running");

      await run.events.collect();
      await expect(run.result).resolves.toMatchObject({ stopReason: "complete" });
      expect(agent.isRunning).toBe(false);
    });
  });

  describe("permissions", () => {
    it("should report a denied call to the model and keep going", async () => {
      const execute = vi.fn().mockResolvedValue(ok("written"));
      const writeFile = defineTool({
        name: "write_file",
        description: "Write a file",
        parameters: z.object({ path: z.string(), content: z.string() }),
        execute,
      });
      const { agent, provider } = createAgent(
        [
          { text: "Writing.", toolCalls: [{ name: "write_file", arguments: { path: "out.txt", content: "x" } }] },
          { text: "I could not write the file." },
        ],
        { tools: [writeFile], policy: readOnlyPolicy() }
      );

      const result = await agent.runSync("Write out.txt");

      expect(execute).not.toHaveBeenCalled();
      expect(result.stopReason).toBe("complete");
      expect(eventsOfType(result.events, "tool_end")[0]?.error).toBe(
        "Permission denied: read-only mode is active"
      );
      expect(provider.inputs[1]).toEqual({
        kind: "tool_results",
        results: [
          {
            requestId: "call_1",
            toolName: "write_file",
            ok: false,
            error: "Permission denied: read-only mode is active",
          },
        ],
      });
    });

    it("should stop with an error when a denial interrupts the run", async () => {
      const { agent, provider } = createAgent([{ toolCalls: [readCall()] }, { text: "never sent" }], {
        policy: createPolicy({ canUseTool: () => deny("halt", { interrupt: true }) }),
      });

      const result = await agent.runSync("Read notes");

      expect(result.stopReason).toBe("error");
      expect(eventsOfType(result.events, "tool_end")[0]?.error).toBe("halt");
      expect(provider.remaining).toBe(1);
    });

    it("should always allow the ask_user tool", async () => {
      const askUser = vi.fn().mockResolvedValue("blue");
      const { agent } = createAgent(
        [
          { toolCalls: [{ name: "ask_user", arguments: { question: "Favorite color?" } }] },
          { text: "Blue it is." },
        ],
        { askUser, policy: createPolicy({ mode: "readOnly", deniedTools: ["ask_user"] }) }
      );

      const result = await agent.runSync("Pick a color");

      expect(askUser).toHaveBeenCalledWith("Favorite color?", undefined);
      expect(eventsOfType(result.events, "tool_end")[0]?.result).toBe("blue");
      expect(result.finalText).toBe("Blue it is.");
    });
  });

  describe("budget", () => {
    it("should stop at the turn limit while tool work is pending", async () => {
      const { agent, provider } = createAgent(
        [{ toolCalls: [readCall("a")] }, { toolCalls: [readCall("b")] }, { toolCalls: [readCall("c")] }],
        { policy: standardPolicy("/work", { maxTurns: 2 }) }
      );

      const result = await agent.runSync("Read everything");

      expect(result.stopReason).toBe("max_turns");
      expect(eventsOfType(result.events, "stop")[0]?.totalTurns).toBe(2);
      expect(provider.remaining).toBe(1);
    });

    it("should let the run option override the policy's turn limit", async () => {
      const { agent } = createAgent([{ toolCalls: [readCall("a")] }, { text: "done" }]);

      const result = await agent.runSync("Read a", { maxTurns: 1 });

      expect(result.stopReason).toBe("max_turns");
    });

    it("should complete when the final answer lands on the last allowed turn", async () => {
      const { agent } = createAgent([{ toolCalls: [readCall("a")] }, { text: "done" }], {
        policy: standardPolicy("/work", { maxTurns: 2 }),
      });

      const result = await agent.runSync("Read a");

      expect(result.stopReason).toBe("complete");
    });

    it("should fail tool calls and stop once the cost ceiling is reached", async () => {
      const execute = vi.fn().mockResolvedValue(ok("data"));
      const fetchTool = defineTool({
        name: "read_file",
        description: "Read a file",
        parameters: z.object({ path: z.string() }),
        execute,
      });
      const { agent } = createAgent(
        [
          { toolCalls: [readCall("a")], cost: 0.03 },
          { toolCalls: [readCall("b")], cost: 0.03 },
          { text: "never sent" },
        ],
        { tools: [fetchTool], policy: standardPolicy("/work", { maxCostUsd: 0.05 }) }
      );

      const result = await agent.runSync("Read files");

      expect(result.stopReason).toBe("cost_limit");
      expect(execute).toHaveBeenCalledOnce();
      expect(eventsOfType(result.events, "tool_end")[1]?.error).toBe("Budget exhausted: cost limit reached");
    });

    it("should warn once when the cost nears the ceiling", async () => {
      const { agent } = createAgent(
        [
          { toolCalls: [readCall()], cost: 0.095 },
          { text: "done", cost: 0.001 },
        ],
        { policy: standardPolicy("/work", { maxCostUsd: 0.1 }) }
      );

      const result = await agent.runSync("Read notes");

      expect(result.stopReason).toBe("complete");
      expect(eventsOfType(result.events, "warning").map((event) => event.message)).toEqual([
        "Approaching cost limit: $0.0950 / $0.1000",
      ]);
    });

    it("should not start a turn once an earlier run spent the budget", async () => {
      const { agent, provider } = createAgent([{ text: "expensive", cost: 0.2 }, { text: "never sent" }], {
        policy: standardPolicy("/work", { maxCostUsd: 0.1 }),
      });

      await agent.runSync("first");
      const second = await agent.runSync("second");

      expect(second.stopReason).toBe("cost_limit");
      expect(eventsOfType(second.events, "stop")[0]?.totalTurns).toBe(0);
      expect(provider.remaining).toBe(1);
    });
    it("should warn near the ceiling and then stop once a later turn crosses it", async () => {
      const { agent, provider } = createAgent(
        [
          { toolCalls: [readCall("a")], cost: 0.95 },
          { toolCalls: [readCall("b")], cost: 0.55 },
          { text: "never sent" },
        ],
        { policy: standardPolicy("/work", { maxCostUsd: 1 }) }
      );

      const result = await agent.runSync("Read files");

      expect(result.stopReason).toBe("cost_limit");
      expect(result.cost.total).toBeCloseTo(1.5);
      expect(eventsOfType(result.events, "warning").map((event) => event.message)).toEqual([
        "Approaching cost limit: $0.9500 / $1.0000",
      ]);
      expect(eventsOfType(result.events, "stop")[0]?.totalTurns).toBe(2);
      expect(provider.remaining).toBe(1);
    });
  });

  describe("hooks", () => {
    it("should fire lifecycle hooks in order", async () => {
      const hooks = new HookPipeline({ defaultTimeout: 0 });
      const fired: string[] = [];
      hooks.register({ event: "SessionStart", callback: (ctx) => void fired.push(`start:${ctx.toolNames.join(",")}`) });
      hooks.register({ event: "UserPromptSubmit", callback: (prompt) => void fired.push(`prompt:${prompt}`) });
      hooks.register({ event: "Stop", callback: (reason) => void fired.push(`stop:${reason}`) });
      hooks.register({ event: "SessionEnd", callback: (reason) => void fired.push(`end:${reason}`) });
      const { agent } = createAgent([{ text: "ok" }], { hooks });

      await agent.runSync("hello");

      expect(fired).toEqual(["start:read_file", "prompt:hello", "stop:complete", "end:complete"]);
    });

    it("should reject a call a PreToolUse hook denies", async () => {
      const hooks = new HookPipeline({ defaultTimeout: 0 });
      hooks.register({
        event: "PreToolUse",
        pattern: "^read_",
        callback: () => ({ permission: "deny", reason: "blocked by test" }),
      });
      const { agent } = createAgent([{ toolCalls: [readCall()] }, { text: "ok" }], { hooks });

      const result = await agent.runSync("Read notes");

      expect(eventsOfType(result.events, "tool_end")[0]?.error).toBe("Denied by hook: blocked by test");
      expect(result.stopReason).toBe("complete");
    });

    it("should end the run when a PreToolUse hook denies a shell call and asks to stop", async () => {
      const execute = vi.fn().mockResolvedValue(ok(""));
      const runBash = defineTool({
        name: "run_bash",
        description: "Run a shell command",
        parameters: z.object({ command: z.string() }),
        execute,
      });
      const hooks = new HookPipeline({ defaultTimeout: 0 });
      const fired: string[] = [];
      hooks.register({
        event: "PreToolUse",
        pattern: "^run_bash$",
        callback: () => ({ permission: "deny", reason: "no shell", continue: false }),
      });
      hooks.register({ event: "Stop", callback: (reason) => void fired.push(`stop:${reason}`) });
      hooks.register({ event: "SessionEnd", callback: (reason) => void fired.push(`end:${reason}`) });
      const { agent, provider } = createAgent(
        [{ toolCalls: [{ name: "run_bash", arguments: { command: "rm -rf build" } }] }, { text: "never sent" }],
        { tools: [runBash], policy: createPolicy({ shell: true }), hooks }
      );

      const result = await agent.runSync("Clean the build");

      expect(result.stopReason).toBe("hook_requested_stop");
      expect(eventsOfType(result.events, "tool_end")[0]?.error).toBe("Denied by hook: no shell");
      expect(execute).not.toHaveBeenCalled();
      expect(fired).toEqual(["stop:hook_requested_stop", "end:hook_requested_stop"]);
      expect(provider.remaining).toBe(1);
    });

    it("should stop after the turn when a PostToolUse hook asks to", async () => {
      const hooks = new HookPipeline({ defaultTimeout: 0 });
      const post = vi.fn().mockReturnValue({ continue: false });
      hooks.register({ event: "PostToolUse", callback: post });
      const { agent, provider } = createAgent([{ toolCalls: [readCall()] }, { text: "never sent" }], { hooks });

      const result = await agent.runSync("Read notes");

      expect(post).toHaveBeenCalledWith("read_file", "contents of notes.txt", undefined, {
        workingDir: "/work",
        turn: 1,
      });
      expect(result.stopReason).toBe("hook_requested_stop");
      expect(provider.remaining).toBe(1);
    });
  });

  describe("logging", () => {
    it("should log each tool result as the provider sends it", async () => {
      const memory = new MemoryTransport();
      const { agent } = createAgent([{ toolCalls: [readCall()] }, { text: "done" }], {
        logger: new Logger({ level: "debug", transports: [memory] }),
      });

      await agent.runSync("Read notes");

      const sent = memory.entries.filter((entry) => entry.message === "Tool result sent to model");
      expect(sent.map((entry) => entry.data)).toEqual([{ requestId: "call_1", toolName: "read_file", ok: true }]);
    });
  });

  describe("provider failures", () => {
    it("should end with an error and still fire end hooks when usage cannot be read", async () => {
      class UsageFailingProvider extends ScriptedProvider {
        override usage(): Usage {
          throw new Error("usage unavailable");
        }
      }
      const hooks = new HookPipeline({ defaultTimeout: 0 });
      const fired: string[] = [];
      hooks.register({ event: "Stop", callback: (reason) => void fired.push(`stop:${reason}`) });
      hooks.register({ event: "SessionEnd", callback: (reason) => void fired.push(`end:${reason}`) });
      const agent = new AgentLoop({
        provider: new UsageFailingProvider([{ text: "never sent" }]),
        policy: standardPolicy("/work"),
        workingDir: "/work",
        hooks,
      });

      const result = await agent.runSync("Answer");

      expect(result.stopReason).toBe("error");
      expect(result.events.map((event) => event.type)).toEqual(["start", "warning", "stop"]);
      expect(eventsOfType(result.events, "warning")[0]?.message).toBe("Run failed: usage unavailable");
      expect(result.cost.total).toBe(0);
      expect(fired).toEqual(["stop:error", "end:error"]);
    });

    it("should fall back to a blocking call when streaming fails", async () => {
      const memory = new MemoryTransport();
      const { agent } = createAgent([{ text: "fallback answer", streamError: new Error("socket closed") }], {
        logger: new Logger({ level: "debug", transports: [memory] }),
      });

      const result = await agent.runSync("Answer");

      expect(result.stopReason).toBe("complete");
      expect(result.finalText).toBe("fallback answer");
      expect(textChunks(result)).toEqual(["fallback answer"]);
      expect(eventsOfType(result.events, "warning")[0]?.message).toBe(
        "Streaming failed, falling back to blocking call: socket closed"
      );
      expect(memory.messages("warn")).toContain("Streaming failed, falling back to blocking call: socket closed");
    });

    it("should stop with an error when the blocking call fails too", async () => {
      const { agent } = createAgent([
        { streamError: new Error("down"), chatError: new Error("still down") },
      ]);

      const result = await agent.runSync("Answer");

      expect(result.stopReason).toBe("error");
      expect(eventsOfType(result.events, "warning").map((event) => event.message)).toEqual([
        "Streaming failed, falling back to blocking call: down",
        "Run failed: Provider call failed: still down",
      ]);
      expect(agent.state).toBe("Errored");
    });
  });

  describe("cancellation", () => {
    it("should cancel the run when the consumer stops iterating", async () => {
      const { agent } = createAgent([{ text: "slow answer", delay: 20 }]);

      const run = agent.run("Answer slowly");
      for await (const event of run) {
        if (event.type === "start") {
          break;
        }
      }
      const result = await run.result;

      expect(result.stopReason).toBe("cancelled");
      expect(agent.state).toBe("Cancelled");
    });

    it("should not call the provider when the signal is already aborted", async () => {
      const { agent, provider } = createAgent([{ text: "unused" }]);
      const controller = new AbortController();
      controller.abort();

      const result = await agent.runSync("Answer", { signal: controller.signal });

      expect(result.stopReason).toBe("cancelled");
      expect(provider.inputs).toHaveLength(0);
    });
  });

  describe("stall detection", () => {
    it("should warn when the same answer repeats across runs", async () => {
      const { agent } = createAgent([{ text: "Done." }, { text: "  done. " }]);

      const first = await agent.runSync("Finish");
      const second = await agent.runSync("Finish");

      expect(eventsOfType(first.events, "warning")).toHaveLength(0);
      expect(eventsOfType(second.events, "warning")[0]?.message).toBe(
        "Agent may be stalled: identical response repeated 2 times"
      );
    });
  });

  describe("structured output", () => {
    const schema = z.object({ answer: z.number() });

    it("should parse the final answer with the schema", async () => {
      const { agent, provider } = createAgent([{ text: '```json\n{"answer": 42}\n```' }]);

      const result = await agent.runSync("What is six times seven?", { outputSchema: schema });

      expect(result.structuredOutput).toEqual({ answer: 42 });
      const input = provider.inputs[0];
      if (input?.kind !== "prompt") throw new Error("Test setup error");
      expect(input.text.startsWith("Return a JSON object that matches this schema.")).toBe(true);
      expect(input.text.endsWith("Task:\nWhat is six times seven?")).toBe(true);
    });

    it("should warn when the answer holds no JSON", async () => {
      const { agent } = createAgent([{ text: "no json here" }]);

      const result = await agent.runSync("Answer", { outputSchema: schema });

      expect(result.structuredOutput).toBeUndefined();
      expect(eventsOfType(result.events, "warning")[0]?.message).toBe("No valid JSON found in response");
      expect(result.stopReason).toBe("complete");
    });
  });

  describe("delegation", () => {
    it("should hand a task to a sub-agent and return its answer", async () => {
      const hooks = new HookPipeline({ defaultTimeout: 0 });
      const subagentStop = vi.fn();
      hooks.register({ event: "SubagentStop", callback: subagentStop });
      const { agent, provider } = createAgent(
        [
          {
            toolCalls: [{ name: "delegate_to_agent", arguments: { agent_name: "researcher", task: "find facts" } }],
          },
          { text: "facts found" },
          { text: "Researcher says: facts found" },
        ],
        {
          hooks,
          systemPrompt: "You lead.",
          subAgents: [{ name: "researcher", description: "Finds facts" }],
        }
      );

      const result = await agent.runSync("Research this");

      expect(result.finalText).toBe("Researcher says: facts found");
      expect(eventsOfType(result.events, "tool_end")[0]?.result).toBe("facts found");
      expect(subagentStop).toHaveBeenCalledWith("researcher", "find facts", "facts found", { workingDir: "/work" });
      expect(provider.getSystemPrompt()).toContain("## researcher\nFinds facts");
      expect(provider.tools.map((tool) => tool.name)).toEqual(["read_file", "delegate_to_agent"]);
    });

    it("should report an unknown sub-agent as a tool error", async () => {
      const { agent } = createAgent(
        [
          { toolCalls: [{ name: "delegate_to_agent", arguments: { agent_name: "ghost", task: "boo" } }] },
          { text: "ok" },
        ],
        { subAgents: [{ name: "researcher", description: "Finds facts" }] }
      );

      const result = await agent.runSync("Delegate");

      expect(eventsOfType(result.events, "tool_end")[0]?.error).toBe(
        "Unknown agent: ghost. Available agents: researcher"
      );
    });
  });

  describe("compact", () => {
    it("should fold older turns into the system prompt", async () => {
      const { agent, provider } = createAgent([{ text: "one" }, { text: "two" }]);
      await agent.runSync("first");
      await agent.runSync("second");

      const outcome = await agent.compact({ keepLast: 2, summary: "earlier stuff" });

      expect(outcome).toEqual({ compacted: true, removed: 2, kept: 2, summary: "earlier stuff" });
      expect(agent.turns).toHaveLength(2);
      expect(provider.getSystemPrompt()).toBe("\n\n## Previous Conversation Summary\nearlier stuff");
    });

    it("should ask the model for a summary when none is given", async () => {
      const { agent } = createAgent([{ text: "one" }, { text: "two" }, { text: "  summary from model  " }]);
      await agent.runSync("first");
      await agent.runSync("second");

      const outcome = await agent.compact({ keepLast: 2 });

      expect(outcome).toMatchObject({ compacted: true, summary: "summary from model" });
    });

    it("should skip compaction when there is nothing old enough", async () => {
      const { agent } = createAgent([{ text: "one" }]);
      await agent.runSync("first");

      await expect(agent.compact()).resolves.toEqual({ compacted: false, reason: "too_few_turns" });
    });
  });
});
