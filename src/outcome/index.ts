// src/outcome/index.ts
// Done/Fail results with structured failures and diagnostics

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, wrapFailure, allDiagnostics } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export type { DiagCategory, DiagParams } from "./codes";
export { DIAGNOSTIC_CODES, codeForKind, formatTemplate, makeDiagnostic } from "./codes";
export { done, fail, validationFailed } from "./constructors";
