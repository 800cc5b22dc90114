// ============================================
// Tool Module - Barrel Export
// ============================================

export { type AskUserCallback, createAskUserTool } from "./ask-user.js";
export {
  type DefineToolConfig,
  defineTool,
  fail,
  ok,
  type Tool,
  type ToolContext,
  type ToolOutcome,
} from "./define.js";
export { type AnyTool, ToolRegistry } from "./registry.js";
