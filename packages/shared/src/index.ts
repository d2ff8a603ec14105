// ============================================
// ali Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/codes.js";
// Result type (shared so plugin and cli need not depend on each other)
export type { ErrResult, OkResult, Result } from "./types/result.js";
export {
  Err,
  isErr,
  isOk,
  map,
  mapErr,
  Ok,
  tryCatch,
  unwrap,
  unwrapOr,
} from "./types/result.js";
