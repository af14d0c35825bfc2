export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Node ids the diagnostic points at, in the order they were named. */
  nodes?: number[];
  data?: Record<string, unknown>;
}
