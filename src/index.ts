// src/index.ts
// ordered-streams - Public API
//
// Ordered stream types: graph builder, usage-order checker, interpreter and
// fusion compiler.

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES & TOKENS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/types";
export * from "./core/tokens";

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH & CHECKER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/graph";
export * from "./core/check";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/eval";
export * from "./core/compiler";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  StreamError,
  GraphError,
  StreamTypeError,
  StreamRuntimeError,
  CompileError,
  ConfigError,
  InvariantError,
  isStreamError,
  toFailure,
  type GraphErrorCode,
  type TypeErrorCode,
  type RuntimeErrorCode,
  type CompileErrorCode,
} from "./core/errors";
export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG & TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { createTraceLog, noTrace, type TraceLog } from "./core/trace";
