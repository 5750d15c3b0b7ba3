// ============================================
// mdlive Shared Types
// ============================================

export { ErrorCode, type ErrorSeverity, inferSeverity } from "./errors/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export { Err, Ok } from "./types/result.js";
export { createId } from "./utils/id.js";
