import { describe, it, expect } from "vitest";
import { isFail } from "../../src/outcome/outcome";
import { allDiagnostics, failure, wrapFailure } from "../../src/outcome/failure";
import { DIAGNOSTIC_CODES, codeForKind, formatTemplate, makeDiagnostic } from "../../src/outcome/codes";
import { done, fail, validationFailed } from "../../src/outcome/constructors";
import type { Outcome } from "../../src/outcome/outcome";
import {
  ConfigError,
  GraphError,
  InvariantError,
  StreamRuntimeError,
  StreamTypeError,
  invariant,
  isStreamError,
  toFailure,
} from "../../src/core/errors";

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const meta = { durationMs: 12, steps: 3 };
    const outcome = done("value", meta);
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual(meta);
    expect(done(1).meta).toEqual({});
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = makeDiagnostic("E0300", { input: "xs", expected: "DONE" });
    const f = failure("runtime-error", "boom", { diagnostics: [diag] });
    const outcome = fail(f);
    expect(outcome.tag).toBe("Fail");
    expect(outcome.failure.diagnostics).toEqual([diag]);
    expect(outcome.failure.recoverable).toBe(false);
  });

  it("narrows with the type guard", () => {
    const outcomes: Outcome<number>[] = [done(1), fail(failure("internal-error", "x"))];
    expect(outcomes.map(isFail)).toEqual([false, true]);
  });

  it("reports invalid configuration as a recoverable failure", () => {
    const outcome = validationFailed("eval.maxSteps must be positive");
    expect(outcome.failure.reason).toBe("validation-failed");
    expect(outcome.failure.message).toBe("Invalid configuration: eval.maxSteps must be positive");
    expect(outcome.failure.recoverable).toBe(true);
    expect(outcome.failure.diagnostics).toEqual([
      {
        code: "E1000",
        severity: "error",
        message: "Invalid configuration: eval.maxSteps must be positive",
        data: { reason: "eval.maxSteps must be positive" },
      },
    ]);
  });
});

describe("Failures and diagnostics", () => {
  it("wraps a failure and keeps its cause", () => {
    const inner = failure("type-error", "inner", {
      diagnostics: [makeDiagnostic("E0206", { first: "x", second: "y" })],
      context: { node: 1 },
    });
    const outer = wrapFailure(inner, "outer", { graph: "g" });
    expect(outer.message).toBe("outer");
    expect(outer.reason).toBe("type-error");
    expect(outer.context).toEqual({ node: 1, graph: "g" });
    expect(outer.cause).toBe(inner);
    expect(outer.diagnostics).toEqual([]);
  });

  it("collects diagnostics through causes once each", () => {
    const shared = makeDiagnostic("E0300", { input: "xs", expected: "DONE" });
    const note = makeDiagnostic("E0304", { limit: 5 });
    const inner = failure("runtime-error", "inner", { diagnostics: [shared, note] });
    const top = makeDiagnostic("E0901", { reason: "top" });
    const outer = failure("runtime-error", "outer", { diagnostics: [top, shared], cause: inner });
    expect(allDiagnostics(outer).map((d) => d.code)).toEqual(["E0901", "E0300", "E0304"]);
    expect(allDiagnostics(wrapFailure(outer, "again")).map((d) => d.code)).toEqual(["E0901", "E0300", "E0304"]);
  });

  it("formats templates", () => {
    expect(formatTemplate("Node {node} in {scope}, again {node}", { node: "x", scope: 2 })).toBe(
      "Node x in 2, again x"
    );
    expect(formatTemplate("plain")).toBe("plain");
  });

  it("makes diagnostics from the code table", () => {
    expect(makeDiagnostic("E0304", { limit: 10 }, [3])).toEqual({
      code: "E0304",
      severity: "error",
      message: "Step limit of 10 exceeded",
      nodes: [3],
      data: { limit: 10 },
    });
    expect(() => makeDiagnostic("E9999")).toThrow("Unknown diagnostic code: E9999");
  });

  it("finds codes by category and kind", () => {
    expect(codeForKind("Type", "OrderViolation")).toBe("E0206");
    expect(codeForKind("Runtime", "OrderViolation")).toBeUndefined();
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.code).toBe(key);
    }
  });
});

describe("toFailure", () => {
  it("maps each error category to a failure reason", () => {
    expect(toFailure(new GraphError("UnknownNode", { node: 9 })).reason).toBe("graph-error");
    expect(toFailure(new StreamTypeError("DuplicateUse", { node: "x" })).reason).toBe("type-error");
    expect(toFailure(new StreamRuntimeError("StepLimit", { limit: 5 })).reason).toBe("runtime-error");
    expect(toFailure(new InvariantError("broken")).reason).toBe("invariant-violated");
    expect(toFailure(new ConfigError("bad")).reason).toBe("validation-failed");
  });

  it("carries the error kind, nodes and one diagnostic", () => {
    const f = toFailure(new StreamRuntimeError("ShortInput", { input: "xs", expected: "DONE" }, [4]));
    expect(f.message).toBe("ShortInput: Input xs ended early: expected DONE");
    expect(f.context).toEqual({ kind: "ShortInput", nodes: [4] });
    expect(f.diagnostics).toEqual([
      {
        code: "E0300",
        severity: "error",
        message: "Input xs ended early: expected DONE",
        nodes: [4],
        data: { input: "xs", expected: "DONE" },
      },
    ]);
  });

  it("treats foreign errors as internal", () => {
    expect(toFailure(new Error("plain"))).toMatchObject({ reason: "internal-error", message: "plain", diagnostics: [] });
    expect(toFailure("text").message).toBe("text");
    expect(isStreamError(new Error("plain"))).toBe(false);
  });

  it("asserts invariants", () => {
    expect(() => invariant(false, "never")).toThrow("Invariant: Internal invariant violated: never");
    expect(() => invariant(true, "never")).not.toThrow();
  });
});
