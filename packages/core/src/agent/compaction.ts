/**
 * History compaction: replace older turns with a summary appended to the
 * system prompt.
 *
 * @module @helmsman/core/agent/compaction
 */

import { errorMessage } from "../errors/index.js";
import type { HookPipeline } from "../hooks/index.js";
import { requestsStop } from "../hooks/index.js";
import type { Logger } from "../logger/index.js";
import { type ChatProvider, type Turn, turnText, turnToolRequests } from "../provider/types.js";

export const SUMMARY_HEADING = "## Previous Conversation Summary";

const FALLBACK_TEXT_LIMIT = 200;

// =============================================================================
// Formatting
// =============================================================================

function roleLabel(turn: Turn): string {
  return turn.role === "user" ? "User" : "Assistant";
}

function textOf(turn: Turn): string {
  const text = turnText(turn);
  return text.length > 0 ? text : "[no text]";
}

/**
 * One paragraph per turn, naming the tools an assistant turn asked for.
 */
export function formatTurnsForSummary(turns: readonly Turn[]): string {
  return turns
    .map((turn) => {
      const tools = turnToolRequests(turn).map((request) => request.name);
      const toolInfo = tools.length > 0 ? ` [Tools: ${tools.join(", ")}]` : "";
      return `${roleLabel(turn)}${toolInfo}: ${textOf(turn)}`;
    })
    .join("\n\n");
}

export function summaryPrompt(turns: readonly Turn[]): string {
  return (
    "Summarize the following conversation excerpt concisely. Focus on:\n" +
    "1. Key decisions made\n" +
    "2. Important findings or results\n" +
    "3. Files created, modified, or discussed\n" +
    "4. Any errors encountered and how they were resolved\n" +
    "5. Current state/progress of the task\n\n" +
    "Keep the summary under 500 words. Be factual and specific.\n\n" +
    "Conversation to summarize:\n" +
    "---\n" +
    `${formatTurnsForSummary(turns)}\n` +
    "---\n\n" +
    "Summary:"
  );
}

/**
 * Used when the model cannot produce a summary: each turn's text, cut to
 * 200 characters.
 */
export function fallbackSummary(turns: readonly Turn[]): string {
  const parts = turns.map((turn) => {
    const text = textOf(turn);
    const clipped = text.length > FALLBACK_TEXT_LIMIT ? `${text.slice(0, FALLBACK_TEXT_LIMIT - 3)}...` : text;
    return `${roleLabel(turn)}: ${clipped}`;
  });
  return `[Compacted ${turns.length} earlier turns - LLM summary unavailable]\n\n${parts.join("\n\n")}`;
}

// =============================================================================
// Splitting
// =============================================================================

function startsWithToolResults(turn: Turn | undefined): boolean {
  return turn?.contents.some((item) => item.type === "tool_result") ?? false;
}

/**
 * Keep the last `keepLast` turns. The kept part never opens with tool
 * results, so the boundary moves back to include the turn that requested them.
 */
export function splitForCompaction(
  turns: readonly Turn[],
  keepLast: number
): { toCompact: Turn[]; toKeep: Turn[] } {
  let boundary = Math.max(0, turns.length - Math.max(0, Math.floor(keepLast)));
  while (boundary > 0 && startsWithToolResults(turns[boundary])) {
    boundary -= 1;
  }
  return { toCompact: turns.slice(0, boundary), toKeep: turns.slice(boundary) };
}

// =============================================================================
// Compaction
// =============================================================================

export interface CompactOptions {
  /** Turns left untouched (default: 4) */
  keepLast?: number;
  /** Use this summary instead of asking the model */
  summary?: string;
}

export interface CompactionDeps {
  provider: ChatProvider;
  hooks: HookPipeline;
  workingDir: string;
  logger: Logger;
}

export type CompactionOutcome =
  | { compacted: true; removed: number; kept: number; summary: string }
  | { compacted: false; reason: "too_few_turns" | "cancelled_by_hook" };

export async function compactConversation(
  deps: CompactionDeps,
  options: CompactOptions = {}
): Promise<CompactionOutcome> {
  const { provider, hooks, workingDir, logger } = deps;
  const turns = provider.getTurns();
  const { toCompact, toKeep } = splitForCompaction(turns, options.keepLast ?? 4);

  if (toCompact.length === 0) {
    logger.info("Not enough turns to compact", { turns: turns.length, keepLast: options.keepLast ?? 4 });
    return { compacted: false, reason: "too_few_turns" };
  }

  const hookResult = await hooks.fire("PreCompact", toCompact, toKeep, {
    workingDir,
    totalTurns: turns.length,
    compactCount: toCompact.length,
  });
  if (requestsStop(hookResult)) {
    logger.info("Compaction cancelled by hook");
    return { compacted: false, reason: "cancelled_by_hook" };
  }

  const summary = options.summary ?? hookResult?.summary ?? (await summarize(provider, toCompact, logger));

  const current = provider.getSystemPrompt() ?? "";
  provider.setSystemPrompt(`${current}\n\n${SUMMARY_HEADING}\n${summary}`);
  provider.setTurns(toKeep);

  logger.info(`Compacted ${toCompact.length} turns, keeping ${toKeep.length}`);
  return { compacted: true, removed: toCompact.length, kept: toKeep.length, summary };
}

async function summarize(provider: ChatProvider, turns: readonly Turn[], logger: Logger): Promise<string> {
  try {
    const reply = await provider.clone().chat({ kind: "prompt", text: summaryPrompt(turns) });
    if (reply.trim().length > 0) {
      return reply.trim();
    }
    logger.warn("LLM summarization returned nothing, using text summary");
  } catch (error) {
    logger.warn(`LLM summarization failed, using text summary: ${errorMessage(error)}`);
  }
  return fallbackSummary(turns);
}
