// ============================================
// Helmsman Shared Types
// ============================================

export { ErrorCode, type ErrorSeverity, inferSeverity, isRetryableSeverity } from "./errors/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export {
  Err,
  flatMap,
  isErr,
  isOk,
  map,
  mapErr,
  Ok,
  tryCatch,
  tryCatchAsync,
  unwrap,
  unwrapOr,
} from "./types/result.js";
export { createId } from "./utils/id.js";
