import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

export type DiagCategory = "Graph" | "Type" | "Runtime" | "Compile" | "Internal" | "Config";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: DiagCategory;
  /** Error kind this code reports, as carried by the thrown error's `code`. */
  kind: string;
  template: string;
}

export const DIAGNOSTIC_CODES: Record<string, DiagCodeDef> = {
  E0100: { code: "E0100", severity: "error", category: "Graph", kind: "UnknownNode", template: "Unknown node: {node}" },
  E0101: { code: "E0101", severity: "error", category: "Graph", kind: "ScopeEscape", template: "Node {node} is not visible from scope {scope}" },
  E0102: { code: "E0102", severity: "error", category: "Graph", kind: "InertBuffer", template: "Buffer {node} cannot be used as a stream" },
  E0103: { code: "E0103", severity: "error", category: "Graph", kind: "IllegalRecursion", template: "Illegal recursion at {node}: {reason}" },
  E0104: { code: "E0104", severity: "error", category: "Graph", kind: "ArityMismatch", template: "Wrong number of {what}: expected {expected}, got {actual}" },
  E0105: { code: "E0105", severity: "error", category: "Graph", kind: "MalformedType", template: "Malformed type for {what}: {type}" },
  E0106: { code: "E0106", severity: "error", category: "Graph", kind: "BuilderClosed", template: "Builder is closed: {reason}" },

  E0200: { code: "E0200", severity: "error", category: "Type", kind: "NotConcat", template: "Node {node} is not a concatenation: {actual}" },
  E0201: { code: "E0201", severity: "error", category: "Type", kind: "NotSum", template: "Node {node} is not a sum: {actual}" },
  E0202: { code: "E0202", severity: "error", category: "Type", kind: "NotStar", template: "Node {node} is not a star: {actual}" },
  E0203: { code: "E0203", severity: "error", category: "Type", kind: "NotSingleton", template: "Node {node} is not a singleton: {actual}" },
  E0204: { code: "E0204", severity: "error", category: "Type", kind: "BranchMismatch", template: "Branches of {node} disagree: {left} vs {right}" },
  E0205: { code: "E0205", severity: "error", category: "Type", kind: "UnmatchedBuffer", template: "Unmatched buffer {node}: {reason}" },
  E0206: { code: "E0206", severity: "error", category: "Type", kind: "OrderViolation", template: "Usage order violated: {first} must come before {second}, but {second} is used first" },
  E0207: { code: "E0207", severity: "error", category: "Type", kind: "TypeMismatch", template: "Type mismatch at {node}: expected {expected}, got {actual}" },
  E0208: { code: "E0208", severity: "error", category: "Type", kind: "DuplicateUse", template: "Stream {node} is used more than once" },

  E0300: { code: "E0300", severity: "error", category: "Runtime", kind: "ShortInput", template: "Input {input} ended early: expected {expected}" },
  E0301: { code: "E0301", severity: "error", category: "Runtime", kind: "TrailingInput", template: "Input {input} has {count} trailing token(s)" },
  E0302: { code: "E0302", severity: "error", category: "Runtime", kind: "UnexpectedToken", template: "Input {input} token {index}: expected {expected}, got {actual}" },
  E0303: { code: "E0303", severity: "error", category: "Runtime", kind: "InvalidOperand", template: "Invalid operand for {op}: {actual}" },
  E0304: { code: "E0304", severity: "error", category: "Runtime", kind: "StepLimit", template: "Step limit of {limit} exceeded" },
  E0305: { code: "E0305", severity: "error", category: "Runtime", kind: "InputArity", template: "Expected {expected} input stream(s), got {actual}" },

  E0900: { code: "E0900", severity: "error", category: "Compile", kind: "Unsupported", template: "Cannot compile node {node}: {reason}" },
  E0901: { code: "E0901", severity: "error", category: "Internal", kind: "Invariant", template: "Internal invariant violated: {reason}" },

  E1000: { code: "E1000", severity: "error", category: "Config", kind: "InvalidConfig", template: "Invalid configuration: {reason}" },
};

export type DiagParams = Record<string, string | number>;

export function formatTemplate(template: string, params?: DiagParams): string {
  let message = template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.split(`{${key}}`).join(String(value));
    }
  }
  return message;
}

/**
 * Find the diagnostic code reporting `kind` within a category.
 */
export function codeForKind(category: DiagCategory, kind: string): string | undefined {
  for (const def of Object.values(DIAGNOSTIC_CODES)) {
    if (def.category === category && def.kind === kind) return def.code;
  }
  return undefined;
}

export function makeDiagnostic(
  code: keyof typeof DIAGNOSTIC_CODES,
  params?: DiagParams,
  nodes?: number[]
): Diagnostic {
  const def = DIAGNOSTIC_CODES[code];
  if (!def) {
    throw new Error(`Unknown diagnostic code: ${String(code)}`);
  }

  return {
    code: def.code,
    severity: def.severity,
    message: formatTemplate(def.template, params),
    nodes,
    data: params,
  };
}
