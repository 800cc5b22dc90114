// ============================================
// Helmsman Error Codes
// ============================================

/**
 * Centralized error codes.
 * Error code ranges:
 * - 1xxx: General/System errors
 * - 2xxx: Configuration errors
 * - 3xxx: Permission errors
 * - 4xxx: Provider errors
 * - 5xxx: Tool errors
 * - 6xxx: Agent loop errors
 * - 7xxx: Hook errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL_ERROR = 1001,
  INVALID_ARGUMENT = 1002,
  TIMEOUT = 1004,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2001,
  CONFIG_NOT_FOUND = 2002,
  CONFIG_PARSE_ERROR = 2003,

  // Permission Errors (3xxx)
  PERMISSION_DENIED = 3001,
  PATH_SECURITY = 3002,
  POLICY_INVALID = 3003,

  // Provider Errors (4xxx)
  PROVIDER_ERROR = 4001,
  PROVIDER_STREAM_FAILED = 4002,
  PROVIDER_INVALID_RESPONSE = 4003,

  // Tool Errors (5xxx)
  TOOL_NOT_FOUND = 5001,
  TOOL_EXECUTION_FAILED = 5002,
  TOOL_PERMISSION_DENIED = 5004,

  // Agent Errors (6xxx)
  AGENT_NOT_FOUND = 6001,
  AGENT_LOOP_ERROR = 6002,
  BUDGET_EXCEEDED = 6003,
  TURN_LIMIT_REACHED = 6004,
  INVALID_STATE_TRANSITION = 6005,
  STRUCTURED_OUTPUT_INVALID = 6006,
  SESSION_ERROR = 6007,

  // Hook Errors (7xxx)
  HOOK_TIMEOUT = 7001,
  HOOK_EXECUTION_FAILED = 7002,
  HOOK_INVALID_RESULT = 7003,
}
