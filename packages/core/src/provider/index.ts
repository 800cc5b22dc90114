export {
  type ScriptCursor,
  type ScriptedProviderOptions,
  ScriptedProvider,
  type ScriptedResponse,
  type ScriptedToolCall,
} from "./scripted.js";
export {
  addUsage,
  type ChatProvider,
  type ContentItem,
  EMPTY_USAGE,
  type ProviderCallOptions,
  type ProviderInput,
  type ProviderStream,
  type Role,
  type ToolRequest,
  type ToolRequestListener,
  type ToolResult,
  type ToolResultListener,
  type ToolSpec,
  type Turn,
  turnText,
  turnToolRequests,
  type Usage,
} from "./types.js";
