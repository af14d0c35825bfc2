// src/core/eval/source.ts
// Token sources: validated caller input and streams computed by an evaluator

import { InvariantError, StreamRuntimeError } from "../errors";
import { ShapeReader, showToken, type Token } from "../tokens";
import type { StreamType } from "../types";

/** Sequential supply of tokens. Every segment reads from one of these. */
export interface TokenSource {
  pull(): Token;
}

// ─────────────────────────────────────────────────────────────────
// Caller Input
// ─────────────────────────────────────────────────────────────────

/**
 * One caller-supplied input. Each token is checked against the declared
 * type as it is pulled, so a bad token surfaces at the read that meets it.
 */
export class InputSource implements TokenSource {
  private readonly reader: ShapeReader;
  private index = 0;

  constructor(
    readonly name: string,
    readonly type: StreamType,
    private readonly tokens: readonly Token[]
  ) {
    this.reader = new ShapeReader(type);
  }

  /** Tokens pulled so far. */
  get consumed(): number {
    return this.index;
  }

  pull(): Token {
    const tok = this.tokens[this.index];
    if (tok === undefined) {
      throw new StreamRuntimeError("ShortInput", { input: this.name, expected: this.reader.expected() });
    }
    const step = this.reader.accept(tok);
    if (!step.ok) {
      throw new StreamRuntimeError("UnexpectedToken", {
        input: this.name,
        index: this.index,
        expected: step.expected,
        actual: showToken(tok),
      });
    }
    this.index++;
    return tok;
  }

  /**
   * Read whatever the evaluator left unread, then reject anything past the
   * end of the declared shape.
   */
  finish(): void {
    while (!this.reader.complete) this.pull();
    const trailing = this.tokens.length - this.index;
    if (trailing > 0) {
      throw new StreamRuntimeError("TrailingInput", { input: this.name, count: trailing });
    }
  }
}

export function openInputs(
  names: readonly string[],
  types: readonly StreamType[],
  inputs: ReadonlyArray<readonly Token[]>
): InputSource[] {
  if (inputs.length !== types.length) {
    throw new StreamRuntimeError("InputArity", { expected: types.length, actual: inputs.length });
  }
  return types.map((type, i) => new InputSource(names[i] ?? `input${i}`, type, inputs[i]));
}

// ─────────────────────────────────────────────────────────────────
// Computed Streams
// ─────────────────────────────────────────────────────────────────

/**
 * Wraps a producer whose output has a known type. The producer signals its
 * end with `undefined`; ending before the reader is satisfied means the
 * evaluator broke the protocol.
 */
export class ProducedSource implements TokenSource {
  constructor(
    private readonly produce: () => Token | undefined,
    private readonly label: string
  ) {}

  pull(): Token {
    const tok = this.produce();
    if (tok === undefined) {
      throw new InvariantError(`computed stream ${this.label} ended before its type was complete`);
    }
    return tok;
  }
}

// ─────────────────────────────────────────────────────────────────
// Step Budget
// ─────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_STEPS = 1_000_000;

export class StepBudget {
  private used = 0;

  constructor(readonly limit: number = DEFAULT_MAX_STEPS) {}

  get steps(): number {
    return this.used;
  }

  tick(): void {
    this.used++;
    if (this.used > this.limit) {
      throw new StreamRuntimeError("StepLimit", { limit: this.limit });
    }
  }
}
