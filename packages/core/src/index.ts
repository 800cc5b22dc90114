// ============================================
// Helmsman Core Engine
// ============================================

/**
 * @module @helmsman/core
 *
 * Agent execution loop: drives a conversation with a language model,
 * checks every tool call against an immutable policy, runs lifecycle hooks,
 * enforces turn and cost budgets and streams typed events to the caller.
 */

// ============================================
// Agent
// ============================================
export * from "./agent/index.js";

// ============================================
// Budget
// ============================================
export * from "./budget/index.js";

// ============================================
// Configuration
// ============================================
export * from "./config/index.js";

// ============================================
// Errors
// ============================================
export * from "./errors/index.js";

// ============================================
// Events
// ============================================
export * from "./events/index.js";

// ============================================
// Hooks
// ============================================
export * from "./hooks/index.js";

// ============================================
// Logging
// ============================================
export * from "./logger/index.js";

// ============================================
// Permissions
// ============================================
export * from "./permission/index.js";

// ============================================
// Providers
// ============================================
export * from "./provider/index.js";

// ============================================
// Tools
// ============================================
export * from "./tool/index.js";

// ============================================
// Shared re-exports
// ============================================
export { Err, ErrorCode, Ok, type Result } from "@helmsman/shared";
