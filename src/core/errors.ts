// src/core/errors.ts
// Error taxonomy shared by the builder, checker and both evaluators

import {
  codeForKind,
  DIAGNOSTIC_CODES,
  failure,
  formatTemplate,
  makeDiagnostic,
  type DiagCategory,
  type DiagParams,
  type Failure,
  type FailureReason,
} from "../outcome";

// ─────────────────────────────────────────────────────────────────
// Error Codes
// ─────────────────────────────────────────────────────────────────

export type GraphErrorCode =
  | "UnknownNode"
  | "ScopeEscape"
  | "InertBuffer"
  | "IllegalRecursion"
  | "ArityMismatch"
  | "MalformedType"
  | "BuilderClosed";

export type TypeErrorCode =
  | "NotConcat"
  | "NotSum"
  | "NotStar"
  | "NotSingleton"
  | "BranchMismatch"
  | "UnmatchedBuffer"
  | "OrderViolation"
  | "TypeMismatch"
  | "DuplicateUse";

export type RuntimeErrorCode =
  | "ShortInput"
  | "TrailingInput"
  | "UnexpectedToken"
  | "InvalidOperand"
  | "StepLimit"
  | "InputArity";

export type CompileErrorCode = "Unsupported";

// ─────────────────────────────────────────────────────────────────
// Error Classes
// ─────────────────────────────────────────────────────────────────

function describe(category: DiagCategory, kind: string, detail: DiagParams): string {
  const code = codeForKind(category, kind);
  const template = code ? DIAGNOSTIC_CODES[code].template : kind;
  return `${kind}: ${formatTemplate(template, detail)}`;
}

/**
 * Base of every error raised by this library. `detail` holds the values the
 * message was formatted from; `nodes` the graph nodes it concerns.
 */
export abstract class StreamError<C extends string = string> extends Error {
  abstract readonly category: DiagCategory;

  constructor(
    public readonly code: C,
    public readonly detail: DiagParams,
    public readonly nodes: number[],
    category: DiagCategory
  ) {
    super(describe(category, code, detail));
  }
}

/** Malformed construction request. */
export class GraphError extends StreamError<GraphErrorCode> {
  readonly category = "Graph";

  constructor(code: GraphErrorCode, detail: DiagParams = {}, nodes: number[] = []) {
    super(code, detail, nodes, "Graph");
    this.name = "GraphError";
  }
}

/** Rejection by the usage-order checker. */
export class StreamTypeError extends StreamError<TypeErrorCode> {
  readonly category = "Type";

  constructor(code: TypeErrorCode, detail: DiagParams = {}, nodes: number[] = []) {
    super(code, detail, nodes, "Type");
    this.name = "StreamTypeError";
  }
}

/** Caller supplied tokens that do not fit the declared input types. */
export class StreamRuntimeError extends StreamError<RuntimeErrorCode> {
  readonly category = "Runtime";

  constructor(code: RuntimeErrorCode, detail: DiagParams = {}, nodes: number[] = []) {
    super(code, detail, nodes, "Runtime");
    this.name = "StreamRuntimeError";
  }
}

export class CompileError extends StreamError<CompileErrorCode> {
  readonly category = "Compile";

  constructor(code: CompileErrorCode, detail: DiagParams = {}, nodes: number[] = []) {
    super(code, detail, nodes, "Compile");
    this.name = "CompileError";
  }
}

/** Unreadable or invalid configuration source. */
export class ConfigError extends StreamError<"InvalidConfig"> {
  readonly category = "Config";

  constructor(reason: string, detail: DiagParams = {}) {
    super("InvalidConfig", { ...detail, reason }, [], "Config");
    this.name = "ConfigError";
  }
}

/** Fatal assertion inside an evaluator. Never expected on a checked graph. */
export class InvariantError extends StreamError<"Invariant"> {
  readonly category = "Internal";

  constructor(reason: string, nodes: number[] = []) {
    super("Invariant", { reason }, nodes, "Internal");
    this.name = "InvariantError";
  }
}

export function invariant(condition: boolean, reason: string): asserts condition {
  if (!condition) throw new InvariantError(reason);
}

// ─────────────────────────────────────────────────────────────────
// Conversion to Failure
// ─────────────────────────────────────────────────────────────────

const REASONS: Record<DiagCategory, FailureReason> = {
  Graph: "graph-error",
  Type: "type-error",
  Runtime: "runtime-error",
  Compile: "compile-error",
  Internal: "invariant-violated",
  Config: "validation-failed",
};

export function isStreamError(e: unknown): e is StreamError {
  return e instanceof StreamError;
}

/**
 * Convert a thrown value into a Failure carrying one diagnostic.
 */
export function toFailure(e: unknown): Failure {
  if (isStreamError(e)) {
    const code = codeForKind(e.category, e.code);
    return failure(REASONS[e.category], e.message, {
      diagnostics: code ? [makeDiagnostic(code, e.detail, e.nodes)] : [],
      context: { kind: e.code, nodes: e.nodes },
      recoverable: false,
    });
  }
  const message = e instanceof Error ? e.message : String(e);
  return failure("internal-error", message);
}
