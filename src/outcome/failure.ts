import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "graph-error"
  | "type-error"
  | "runtime-error"
  | "compile-error"
  | "invariant-violated"
  | "validation-failed"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  /** The failure this one restates, if any. */
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

/**
 * Restate `inner` with a new message. Its diagnostics stay on the cause.
 */
export function wrapFailure(inner: Failure, message: string, context: Record<string, unknown> = {}): Failure {
  return failure(inner.reason, message, {
    recoverable: inner.recoverable,
    context: { ...inner.context, ...context },
    cause: inner,
  });
}

/** Diagnostics along the cause chain, outermost first, each once. */
export function allDiagnostics(f: Failure): Diagnostic[] {
  const found = new Set<Diagnostic>();
  for (let cur: Failure | undefined = f; cur; cur = cur.cause) {
    cur.diagnostics.forEach((d) => found.add(d));
  }
  return [...found];
}
