import { describe, expect, it } from "vitest";
import { z } from "zod";
import { extractJson, outputInstructions, parseStructuredOutput } from "../structured-output.js";

const Summary = z.object({
  title: z.string(),
  count: z.number().int(),
});

describe("outputInstructions", () => {
  it("should put the schema before the task", () => {
    const text = outputInstructions("Count the files", z.object({ count: z.number() }));
    const lines = text.split("\n");

    expect(lines.slice(0, 3)).toEqual(["Return a JSON object that matches this schema.", "Output only JSON.", "Schema:"]);
    expect(lines.slice(-3)).toEqual(["", "Task:", "Count the files"]);
    expect(text).toContain('"count": {\n      "type": "number"\n    }');
  });
});

describe("extractJson", () => {
  it("should parse a bare JSON answer", () => {
    expect(extractJson(' {"a": 1} ')).toEqual({ ok: true, value: { a: 1 } });
  });

  it("should read a fenced block", () => {
    const text = 'Here you go:\n```json\n{"a": [1, 2]}\n```\nAnything else?';

    expect(extractJson(text)).toEqual({ ok: true, value: { a: [1, 2] } });
  });

  it("should fall back to the outermost braces", () => {
    expect(extractJson('The answer is {"ok": true} as requested.')).toEqual({ ok: true, value: { ok: true } });
  });

  it("should find arrays too", () => {
    expect(extractJson("Items: [1, 2, 3].")).toEqual({ ok: true, value: [1, 2, 3] });
  });

  it("should report text without JSON", () => {
    expect(extractJson("no json here")).toEqual({ ok: false, error: "No valid JSON found in response" });
  });
});

describe("parseStructuredOutput", () => {
  it("should return the validated value", () => {
    expect(parseStructuredOutput('{"title": "t", "count": 2}', Summary)).toEqual({
      ok: true,
      value: { title: "t", count: 2 },
    });
  });

  it("should list schema violations by path", () => {
    expect(parseStructuredOutput('{"title": 5, "count": 1.5}', Summary)).toEqual({
      ok: false,
      error:
        "Structured output does not match the schema: title: Expected string, received number; count: Expected integer, received float",
    });
  });
});
