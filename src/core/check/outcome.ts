// src/core/check/outcome.ts
// Outcome-returning wrapper around the checker

import { done, fail, type Outcome } from "../../outcome";
import { toFailure } from "../errors";
import type { StreamType } from "../types";
import type { Graph } from "../graph/ir";
import { check, type CheckOptions, type TypedGraph } from "./checker";

/**
 * Like `check`, but reports rejection as a Fail carrying one diagnostic
 * instead of throwing.
 */
export function tryCheck(
  graph: Graph,
  declaredInputTypes?: readonly StreamType[],
  options?: CheckOptions
): Outcome<TypedGraph> {
  const started = Date.now();
  try {
    const typed = check(graph, declaredInputTypes, options);
    return done(typed, { durationMs: Date.now() - started });
  } catch (e) {
    return fail(toFailure(e), { durationMs: Date.now() - started });
  }
}
