export { CALLBACK_FAILURE_REASON, PermissionGate, type PermissionGateOptions } from "./gate.js";
export { hasPathTraversal, isPathWithin, resolveExistingPrefix } from "./path-guard.js";
export {
  createPolicy,
  derivePolicy,
  describePolicy,
  type PolicyDescription,
  fullAccessPolicy,
  type Policy,
  type PolicyInput,
  type PolicySettings,
  PolicySettingsSchema,
  readOnlyPolicy,
  standardPolicy,
} from "./policy.js";
export {
  CAPABILITY_CLASSES,
  type CapabilityClass,
  classifyTool,
  isWriteLikeTool,
  matchesToolName,
  normalizeToolName,
  PERMISSION_PROMPT_TOOL,
} from "./tool-classes.js";
export {
  allow,
  deny,
  type PermissionCallback,
  type PermissionContext,
  type PermissionMode,
  PermissionModeSchema,
  type PermissionResult,
  type PermissionResultInput,
  PermissionResultSchema,
  type ToolAnnotations,
  ToolAnnotationsSchema,
  type ToolInput,
} from "./types.js";
