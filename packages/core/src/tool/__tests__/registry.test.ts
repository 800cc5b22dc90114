// ============================================
// Tool Registry Tests
// ============================================

import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { defineTool, fail, ok, type ToolContext } from "../define.js";
import { ToolRegistry } from "../registry.js";

// =============================================================================
// Test Fixtures
// =============================================================================

const readFileTool = defineTool({
  name: "read_file",
  description: "Read the contents of a file",
  parameters: z.object({
    path: z.string().describe("Path to the file"),
  }),
  annotations: { readOnly: true },
  async execute(input) {
    return ok(`Contents of ${input.path}`);
  },
});

const flakyTool = defineTool({
  name: "flaky",
  description: "Fails in two different ways",
  parameters: z.object({ mode: z.enum(["fail", "throw"]) }),
  async execute({ mode }) {
    if (mode === "throw") {
      throw new Error("disk on fire");
    }
    return fail("soft failure");
  },
});

const context: ToolContext = {
  workingDir: "/tmp/project",
  requestId: "call_1",
  signal: new AbortController().signal,
};

// =============================================================================
// Tests
// =============================================================================

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry([readFileTool, flakyTool]);
  });

  describe("lookup", () => {
    it("should find tools ignoring case", () => {
      expect(registry.get("READ_FILE")).toBe(readFileTool);
      expect(registry.has("Flaky")).toBe(true);
      expect(registry.get("write_file")).toBeUndefined();
    });

    it("should keep registration order and casing", () => {
      expect(registry.names()).toEqual(["read_file", "flaky"]);
      expect(registry.size).toBe(2);
    });

    it("should reject duplicate names", () => {
      expect(() => registry.register(readFileTool)).toThrow("Tool already registered: read_file");
    });
  });

  describe("specs", () => {
    it("should convert parameters to JSON Schema", () => {
      const spec = registry.specs()[0];
      if (!spec) throw new Error("Test setup error");

      expect(spec.name).toBe("read_file");
      expect(spec.description).toBe("Read the contents of a file");
      expect(spec.inputSchema).toMatchObject({
        type: "object",
        properties: { path: { type: "string", description: "Path to the file" } },
        required: ["path"],
      });
    });
  });

  describe("execute", () => {
    it("should return the tool output on success", async () => {
      const result = await registry.execute(
        { id: "call_1", name: "read_file", arguments: { path: "a.txt" } },
        context
      );

      expect(result).toEqual({ requestId: "call_1", toolName: "read_file", ok: true, value: "Contents of a.txt" });
    });

    it("should report unknown tools", async () => {
      const result = await registry.execute({ id: "call_2", name: "nope", arguments: {} }, context);

      expect(result).toEqual({ requestId: "call_2", toolName: "nope", ok: false, error: "Unknown tool: nope" });
    });

    it("should report invalid arguments with their path", async () => {
      const result = await registry.execute({ id: "call_3", name: "read_file", arguments: { path: 42 } }, context);

      expect(result.ok).toBe(false);
      if (result.ok) throw new Error("Test setup error");
      expect(result.error).toBe("Invalid arguments for read_file: path: Expected string, received number");
    });

    it("should turn soft failures and thrown errors into error results", async () => {
      const soft = await registry.execute({ id: "a", name: "flaky", arguments: { mode: "fail" } }, context);
      const thrown = await registry.execute({ id: "b", name: "flaky", arguments: { mode: "throw" } }, context);

      expect(soft).toEqual({ requestId: "a", toolName: "flaky", ok: false, error: "soft failure" });
      expect(thrown).toEqual({ requestId: "b", toolName: "flaky", ok: false, error: "disk on fire" });
    });
  });
});
