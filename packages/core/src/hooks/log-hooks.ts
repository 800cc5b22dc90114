import type { Logger } from "../logger/index.js";
import type { AnyHookMatcher } from "./types.js";

/**
 * Hooks that log every tool call and its outcome. They run inline, observe
 * only and never return a result, so later hooks still get their turn.
 *
 * @example
 * ```typescript
 * for (const hook of createToolLogHooks(logger.child({ component: "tools" }))) {
 *   pipeline.register(hook);
 * }
 * ```
 */
export function createToolLogHooks(logger: Logger): AnyHookMatcher[] {
  return [
    {
      event: "PreToolUse",
      name: "tool-log:pre",
      timeout: 0,
      callback: (toolName, toolInput, context) => {
        logger.info(`Tool call: ${toolName}`, { input: toolInput, turn: context.turn });
      },
    },
    {
      event: "PostToolUse",
      name: "tool-log:post",
      timeout: 0,
      callback: (toolName, _toolResult, toolError, context) => {
        if (toolError === undefined) {
          logger.info(`Tool finished: ${toolName}`, { turn: context.turn });
        } else {
          logger.warn(`Tool failed: ${toolName}`, { error: toolError, turn: context.turn });
        }
      },
    },
  ];
}
