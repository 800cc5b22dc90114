import { beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../../logger/logger.js";
import { MemoryTransport } from "../../logger/transports/memory.js";
import { createToolLogHooks } from "../log-hooks.js";
import { HookPipeline } from "../pipeline.js";
import type { RunEndContext } from "../types.js";

const preContext = { workingDir: "/tmp/project", turn: 1 };
const endContext: RunEndContext = {
  workingDir: "/tmp/project",
  totalTurns: 2,
  cost: { inputTokens: 0, outputTokens: 0, cachedTokens: 0, cost: 0 },
};

describe("HookPipeline", () => {
  let memory: MemoryTransport;
  let pipeline: HookPipeline;

  beforeEach(() => {
    memory = new MemoryTransport();
    pipeline = new HookPipeline({ logger: new Logger({ level: "debug", transports: [memory] }), defaultTimeout: 0 });
  });

  describe("fire", () => {
    it("should stop at the first hook with a result", async () => {
      const first = vi.fn().mockReturnValue(undefined);
      const second = vi.fn().mockReturnValue({ handled: true });
      const third = vi.fn().mockReturnValue({ handled: false });
      pipeline.register({ event: "Stop", callback: first });
      pipeline.register({ event: "Stop", callback: second });
      pipeline.register({ event: "Stop", callback: third });

      const result = await pipeline.fire("Stop", "complete", endContext);

      expect(result).toEqual({ handled: true });
      expect(first).toHaveBeenCalledWith("complete", endContext);
      expect(second).toHaveBeenCalledOnce();
      expect(third).not.toHaveBeenCalled();
    });

    it("should return undefined when every hook passes", async () => {
      pipeline.register({ event: "SessionEnd", callback: () => null });
      pipeline.register({ event: "SessionEnd", callback: async () => undefined });

      await expect(pipeline.fire("SessionEnd", "complete", endContext)).resolves.toBeUndefined();
    });

    it("should only run hooks registered for the fired event", async () => {
      const onStop = vi.fn();
      pipeline.register({ event: "Stop", callback: onStop });

      await pipeline.fire("SessionEnd", "complete", endContext);

      expect(onStop).not.toHaveBeenCalled();
    });

    it("should fill in result defaults", async () => {
      pipeline.register({ event: "PreToolUse", callback: () => ({ permission: "allow" }) });

      const result = await pipeline.fire("PreToolUse", "read_file", { path: "a" }, preContext);

      expect(result).toEqual({ permission: "allow", continue: true });
    });
  });

  describe("patterns", () => {
    it("should test the pattern against the tool name", async () => {
      pipeline.register({
        event: "PreToolUse",
        pattern: /^run_/,
        callback: () => ({ permission: "deny", reason: "no shell" }),
      });

      const readResult = await pipeline.fire("PreToolUse", "read_file", {}, preContext);
      const bashResult = await pipeline.fire("PreToolUse", "run_bash", {}, preContext);

      expect(readResult).toBeUndefined();
      expect(bashResult).toEqual({ permission: "deny", reason: "no shell", continue: true });
    });

    it("should accept string patterns", async () => {
      pipeline.register({ event: "PostToolUse", pattern: "write", callback: () => ({ continue: false }) });

      const result = await pipeline.fire("PostToolUse", "file_write", "ok", undefined, preContext);

      expect(result).toEqual({ continue: false });
    });

    it("should never match events without a tool name", async () => {
      const callback = vi.fn().mockReturnValue({ continue: false });
      pipeline.register({ event: "UserPromptSubmit", pattern: /.*/, callback });

      const result = await pipeline.fire("UserPromptSubmit", "do the thing", { workingDir: "/tmp" });

      expect(result).toBeUndefined();
      expect(callback).not.toHaveBeenCalled();
    });

    it("should reject invalid patterns at registration", () => {
      expect(() => pipeline.register({ event: "PreToolUse", pattern: "(", callback: () => undefined })).toThrow(
        "Invalid hook pattern: ("
      );
    });
  });

  describe("errors", () => {
    it("should deny the tool call when a PreToolUse hook throws", async () => {
      const later = vi.fn();
      pipeline.register({
        event: "PreToolUse",
        callback: () => {
          throw new Error("boom");
        },
      });
      pipeline.register({ event: "PreToolUse", callback: later });

      const result = await pipeline.fire("PreToolUse", "run_bash", { command: "ls" }, preContext);

      expect(result).toEqual({ permission: "deny", reason: "hook callback error", continue: true });
      expect(later).not.toHaveBeenCalled();
      const [record] = pipeline.getErrorLog();
      expect(record).toMatchObject({ event: "PreToolUse", toolName: "run_bash", hookName: "PreToolUse#1", error: "boom" });
      expect(record?.timestamp).toBeInstanceOf(Date);
    });

    it("should skip a failing hook on other events and keep going", async () => {
      pipeline.register({
        event: "PostToolUse",
        name: "broken",
        callback: async () => {
          throw new Error("boom");
        },
      });
      pipeline.register({ event: "PostToolUse", callback: () => ({ continue: false }) });

      const result = await pipeline.fire("PostToolUse", "read_file", "text", undefined, preContext);

      expect(result).toEqual({ continue: false });
      expect(pipeline.getErrorLog()).toHaveLength(1);
      expect(memory.messages("error")).toEqual(["Hook 'broken' failed on PostToolUse: boom"]);
    });

    it("should leave SessionStart and Stop outcomes alone when their hooks throw", async () => {
      const fail = () => {
        throw new Error("nope");
      };
      pipeline.register({ event: "SessionStart", callback: fail });
      pipeline.register({ event: "Stop", callback: fail });

      const start = await pipeline.fire("SessionStart", {
        workingDir: "/tmp",
        policy: {
          mode: "default",
          fileRead: true,
          fileWrite: true,
          shell: true,
          codeExec: true,
          web: true,
          packageInstall: true,
          allowedTools: null,
          deniedTools: [],
          hasCallback: false,
          maxTurns: null,
          maxCostUsd: null,
        },
        toolNames: [],
      });
      const stop = await pipeline.fire("Stop", "complete", endContext);

      expect(start).toBeUndefined();
      expect(stop).toBeUndefined();
      expect(pipeline.getErrorLog().map((record) => record.event)).toEqual(["SessionStart", "Stop"]);
    });

    it("should treat a malformed result as a failure", async () => {
      pipeline.register({ event: "PreToolUse", callback: vi.fn().mockReturnValue({ permission: "maybe" }) });

      const result = await pipeline.fire("PreToolUse", "read_file", {}, preContext);

      expect(result).toEqual({ permission: "deny", reason: "hook callback error", continue: true });
      expect(pipeline.getErrorLog()[0]?.error).toMatch(/^Invalid PreToolUse result: /);
    });

    it("should time out a hook that never settles", async () => {
      pipeline.register({
        event: "Stop",
        name: "slow",
        timeout: 50,
        callback: () => new Promise<undefined>((resolve) => setTimeout(() => resolve(undefined), 10_000)),
      });

      const result = await pipeline.fire("Stop", "complete", endContext);

      expect(result).toBeUndefined();
      expect(pipeline.getErrorLog()[0]?.error).toBe("Hook 'slow' timed out after 50ms");
    });

    it("should clear the error log", async () => {
      pipeline.register({
        event: "Stop",
        callback: () => {
          throw new Error("x");
        },
      });
      await pipeline.fire("Stop", "error", endContext);

      pipeline.clearErrorLog();

      expect(pipeline.getErrorLog()).toEqual([]);
    });
  });

  describe("registration", () => {
    it("should remove a hook through the returned function", async () => {
      const callback = vi.fn().mockReturnValue({ handled: true });
      const unregister = pipeline.register({ event: "Stop", callback });
      expect(pipeline.size).toBe(1);

      unregister();

      expect(pipeline.size).toBe(0);
      await expect(pipeline.fire("Stop", "complete", endContext)).resolves.toBeUndefined();
    });

    it("should reject negative timeouts", () => {
      expect(() => pipeline.register({ event: "Stop", timeout: -1, callback: () => undefined })).toThrow(
        "Invalid hook timeout: -1"
      );
    });
  });

  describe("createToolLogHooks", () => {
    it("should log calls and failures without returning results", async () => {
      for (const hook of createToolLogHooks(new Logger({ level: "info", transports: [memory] }))) {
        pipeline.register(hook);
      }

      const pre = await pipeline.fire("PreToolUse", "read_file", { path: "a" }, preContext);
      const post = await pipeline.fire("PostToolUse", "read_file", undefined, "missing", preContext);

      expect(pre).toBeUndefined();
      expect(post).toBeUndefined();
      expect(memory.messages()).toEqual(["Tool call: read_file", "Tool failed: read_file"]);
    });
  });
});
