import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/** Bad configuration; the caller may fix the setting and retry. */
export function validationFailed(reason: string): Fail {
  return fail(
    failure("validation-failed", `Invalid configuration: ${reason}`, {
      diagnostics: [makeDiagnostic("E1000", { reason })],
      recoverable: true,
    })
  );
}
