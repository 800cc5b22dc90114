/**
 * Structured output: ask the model for JSON matching a zod schema, then pull
 * the JSON back out of its final answer and validate it.
 *
 * @module @helmsman/core/agent/structured-output
 */

import { Err, Ok, type Result, tryCatch } from "@helmsman/shared";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

export const NO_JSON_FOUND = "No valid JSON found in response";

/**
 * Prefix the task with instructions to answer in JSON matching `schema`.
 *
 * @example
 * ```typescript
 * outputInstructions("List the files", z.object({ files: z.array(z.string()) }));
 * // "Return a JSON object that matches this schema.\nOutput only JSON.\nSchema:\n{...}\n\nTask:\nList the files"
 * ```
 */
export function outputInstructions(task: string, schema: z.ZodTypeAny): string {
  const jsonSchema = JSON.stringify(zodToJsonSchema(schema, { $refStrategy: "none" }), null, 2);
  return [
    "Return a JSON object that matches this schema.",
    "Output only JSON.",
    "Schema:",
    jsonSchema,
    "",
    "Task:",
    task,
  ].join("\n");
}

const FENCED_BLOCK = /```(?:json)?\s*\n([\s\S]*?)\n?```/;

function parseJson(text: string): Result<unknown, Error> {
  return tryCatch((): unknown => JSON.parse(text));
}

function between(text: string, open: string, close: string): string | undefined {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : undefined;
}

/**
 * Find JSON in a model answer. Tries, in order: the whole text, a fenced code
 * block, the span from the first `{` to the last `}`, then the same for `[`/`]`.
 */
export function extractJson(text: string): Result<unknown, string> {
  const candidates = [
    text.trim(),
    FENCED_BLOCK.exec(text)?.[1],
    between(text, "{", "}"),
    between(text, "[", "]"),
  ];

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const parsed = parseJson(candidate);
    if (parsed.ok) {
      return Ok(parsed.value);
    }
  }
  return Err(NO_JSON_FOUND);
}

/**
 * Extract and validate. The error describes every schema violation.
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): Result<z.output<S>, string> {
  const extracted = extractJson(text);
  if (!extracted.ok) {
    return extracted;
  }

  const validated = schema.safeParse(extracted.value);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    return Err(`Structured output does not match the schema: ${issues.join("; ")}`);
  }
  return Ok(validated.data);
}
