// src/core/eval/buffer.ts
// Buffer values and the operations defined on them

import { InvariantError, StreamRuntimeError } from "../errors";
import { showTokens, val, type Token } from "../tokens";
import type { BufferOp } from "../graph/ir";
import type { Scalar } from "../types";

/** A released buffer is replayed token for token. */
export type BufferValue = readonly Token[];

export function scalarBuffer(value: Scalar): BufferValue {
  return [val(value)];
}

function single(buf: BufferValue, op: BufferOp): Scalar {
  const [tok, ...rest] = buf;
  if (tok?.tag !== "Value" || rest.length > 0) {
    throw new InvariantError(`operand of ${op} is not a single value: ${showTokens(buf)}`);
  }
  return tok.value;
}

function invalid(op: BufferOp, a: Scalar, b: Scalar): StreamRuntimeError {
  return new StreamRuntimeError("InvalidOperand", { op, actual: `${JSON.stringify(a)}, ${JSON.stringify(b)}` });
}

/**
 * Combine two single-value buffers. `add` sums numbers or joins strings;
 * the other arithmetic and `lt` take numbers only. `eq` and `ne` compare
 * any two values.
 */
export function applyBufferOp(op: BufferOp, left: BufferValue, right: BufferValue): BufferValue {
  const a = single(left, op);
  const b = single(right, op);
  switch (op) {
    case "eq":
      return scalarBuffer(a === b);
    case "ne":
      return scalarBuffer(a !== b);
    case "add":
      if (typeof a === "number" && typeof b === "number") return scalarBuffer(a + b);
      if (typeof a === "string" && typeof b === "string") return scalarBuffer(a + b);
      throw invalid(op, a, b);
    case "sub":
    case "mul":
    case "lt":
      if (typeof a !== "number" || typeof b !== "number") throw invalid(op, a, b);
      if (op === "sub") return scalarBuffer(a - b);
      if (op === "mul") return scalarBuffer(a * b);
      return scalarBuffer(a < b);
  }
}
