// src/core/compiler/differential.ts
// Differential testing harness - comparing interpreter vs compiled

import {
  allDiagnostics,
  codeForKind,
  done,
  fail,
  isFail,
  wrapFailure,
  type Failure,
  type Outcome,
} from "../../outcome";
import { toFailure } from "../errors";
import { DONE, MORE, TAG_LEFT, TAG_RIGHT, firstMismatch, showToken, val, type Token } from "../tokens";
import type { Scalar, StreamType } from "../types";
import type { TypedGraph } from "../check/checker";
import { interpret } from "../eval";
import { compile } from "./bytecode";
import { runProgram, defaultVMConfig } from "./vm";
import type { DifferentialCase, DifferentialReport, IteratorProgram } from "./types";

// ─────────────────────────────────────────────────────────────────
// Deterministic PRNG for reproducible inputs
// ─────────────────────────────────────────────────────────────────

export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export type RandomTokenOptions = {
  /** Longest star generated. Default 3. */
  maxStarLength?: number;
  /** Values drawn for Singletons of kinds other than boolean and null. Default 0..9. */
  valueRange?: number;
};

function randomScalar(elem: string, rng: () => number, range: number): Scalar {
  const n = Math.floor(rng() * range);
  switch (elem) {
    case "boolean":
      return rng() < 0.5;
    case "null":
      return null;
    case "string":
      return `s${n}`;
    default:
      return n;
  }
}

/**
 * A well-formed token sequence of type `type`, drawn from `rng`.
 */
export function randomTokens(type: StreamType, rng: () => number, options: RandomTokenOptions = {}): Token[] {
  const maxStar = options.maxStarLength ?? 3;
  const range = options.valueRange ?? 10;
  const out: Token[] = [];
  const gen = (t: StreamType): void => {
    switch (t.tag) {
      case "Singleton":
        out.push(val(randomScalar(t.elem, rng, range)));
        return;
      case "Cat":
        gen(t.left);
        gen(t.right);
        return;
      case "Sum":
        if (rng() < 0.5) {
          out.push(TAG_LEFT);
          gen(t.left);
        } else {
          out.push(TAG_RIGHT);
          gen(t.right);
        }
        return;
      case "Star": {
        const n = Math.floor(rng() * (maxStar + 1));
        for (let i = 0; i < n; i++) {
          out.push(MORE);
          gen(t.elem);
        }
        out.push(DONE);
        return;
      }
      case "Eps":
      case "Meta":
        return;
    }
  };
  gen(type);
  return out;
}

/** One random token list per declared input. */
export function randomInputs(typed: TypedGraph, rng: () => number, options: RandomTokenOptions = {}): Token[][] {
  return typed.inputTypes.map((t) => randomTokens(t, rng, options));
}

// ─────────────────────────────────────────────────────────────────
// Differential Run
// ─────────────────────────────────────────────────────────────────

export type DifferentialOptions = {
  maxSteps?: number;
  /** Reuse an already compiled program. */
  program?: IteratorProgram;
  fusion?: boolean;
};

const STEP_LIMIT = codeForKind("Runtime", "StepLimit");

function evaluate(evaluator: string, fn: () => Token[]): Outcome<Token[]> {
  const started = Date.now();
  try {
    return done(fn(), { durationMs: Date.now() - started });
  } catch (e) {
    const inner = toFailure(e);
    return fail(wrapFailure(inner, `${evaluator}: ${inner.message}`, { evaluator }), {
      durationMs: Date.now() - started,
    });
  }
}

function failureCode(f: Failure): string {
  return allDiagnostics(f)[0]?.code ?? f.reason;
}

function ranOutOfSteps(o: Outcome<Token[]>): boolean {
  return isFail(o) && failureCode(o.failure) === STEP_LIMIT;
}

function describeAt(tokens: readonly Token[], i: number): string {
  const tok = tokens[i];
  return tok ? showToken(tok) : "end of output";
}

/**
 * Run both evaluators on the same inputs and compare their outputs.
 */
export function differentialRun(
  typed: TypedGraph,
  inputs: Token[][],
  options: DifferentialOptions = {}
): DifferentialReport {
  const maxSteps = options.maxSteps ?? defaultVMConfig.maxSteps;
  const program = options.program ?? compile(typed, { fusion: options.fusion });

  const interpOutput = evaluate("interpreter", () => interpret(typed, inputs, { maxSteps }));
  const compiledOutput = evaluate("compiled", () => runProgram(program, inputs, { maxSteps }));

  // Each evaluator counts its own steps, so one running out says nothing
  // about the other.
  const exhausted = ranOutOfSteps(interpOutput) || ranOutOfSteps(compiledOutput);
  const mismatches: string[] = [];
  let mismatchAt = -1;

  if (!exhausted) {
    if (interpOutput.tag === "Done" && compiledOutput.tag === "Done") {
      mismatchAt = firstMismatch(interpOutput.value, compiledOutput.value);
      if (mismatchAt >= 0) {
        mismatches.push(
          `Token ${mismatchAt}: interpreter ${describeAt(interpOutput.value, mismatchAt)}, ` +
            `compiled ${describeAt(compiledOutput.value, mismatchAt)}`
        );
      }
    } else if (interpOutput.tag === "Fail" && compiledOutput.tag === "Fail") {
      const a = failureCode(interpOutput.failure);
      const b = failureCode(compiledOutput.failure);
      if (a !== b) mismatches.push(`Interpreter failed with ${a}, compiled with ${b}`);
    } else if (interpOutput.tag === "Fail") {
      mismatches.push(`Interpreter failed with ${failureCode(interpOutput.failure)}, compiled succeeded`);
    } else if (compiledOutput.tag === "Fail") {
      mismatches.push(`Compiled failed with ${failureCode(compiledOutput.failure)}, interpreter succeeded`);
    }
  }

  const outputsMatch = !exhausted && mismatches.length === 0;
  return {
    outputsMatch,
    interpOutput,
    compiledOutput,
    firstMismatch: mismatchAt,
    mismatches,
    exhausted,
    passed: outputsMatch,
  };
}

/**
 * Run a suite of differential cases against one compiled program.
 */
export function runDifferentialSuite(
  typed: TypedGraph,
  cases: DifferentialCase[],
  options: DifferentialOptions = {}
): { passed: number; failed: number; exhausted: number; reports: Map<string, DifferentialReport> } {
  const program = options.program ?? compile(typed, { fusion: options.fusion });
  let passed = 0;
  let failed = 0;
  let exhausted = 0;
  const reports = new Map<string, DifferentialReport>();

  for (const testCase of testCasesOf(cases)) {
    const report = differentialRun(typed, testCase.inputs, { ...options, program });
    reports.set(testCase.name, report);
    if (report.passed) {
      passed++;
    } else if (report.exhausted) {
      exhausted++;
    } else {
      failed++;
    }
  }

  return { passed, failed, exhausted, reports };
}

/** Names key the report map; a repeated name gets its index appended. */
function testCasesOf(cases: DifferentialCase[]): DifferentialCase[] {
  const seen = new Set<string>();
  return cases.map((c, i) => {
    const name = seen.has(c.name) ? `${c.name}#${i}` : c.name;
    seen.add(name);
    return { ...c, name };
  });
}
