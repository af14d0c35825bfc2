// src/core/tokens/shape.ts
// Incremental check of a token sequence against a stream type

import type { ElemKind, Scalar, StreamType } from "../types";
import type { Token } from "./token";

export type ShapeStep = { ok: true } | { ok: false; expected: string };

const BUILTIN_KINDS: Record<string, (v: Scalar) => boolean> = {
  number: (v) => typeof v === "number",
  string: (v) => typeof v === "string",
  boolean: (v) => typeof v === "boolean",
  null: (v) => v === null,
};

/**
 * Values of the built-in kinds must have the matching JS type. Any other
 * kind is opaque and admits every scalar.
 */
export function valueFits(elem: ElemKind, value: Scalar): boolean {
  const fits = BUILTIN_KINDS[elem];
  return fits ? fits(value) : true;
}

/**
 * Reads one token at a time against the residual type still owed. The
 * residual is kept as a stack: Cat pushes its parts, Star re-pushes itself
 * under each element.
 */
export class ShapeReader {
  private readonly stack: StreamType[];
  private accepted = 0;

  constructor(readonly type: StreamType) {
    this.stack = [type];
  }

  /** Number of tokens accepted so far. */
  get position(): number {
    return this.accepted;
  }

  get complete(): boolean {
    this.normalize();
    return this.stack.length === 0;
  }

  /** Description of the next token this reader would accept. */
  expected(): string {
    this.normalize();
    const top = this.stack[this.stack.length - 1];
    if (!top) return "end of stream";
    switch (top.tag) {
      case "Singleton":
        return `VALUE(${top.elem})`;
      case "Sum":
        return "TAG_LEFT or TAG_RIGHT";
      case "Star":
        return "MORE or DONE";
      default:
        return "end of stream";
    }
  }

  accept(tok: Token): ShapeStep {
    this.normalize();
    const top = this.stack.pop();
    if (!top) return { ok: false, expected: "end of stream" };

    let ok = false;
    switch (top.tag) {
      case "Singleton":
        ok = tok.tag === "Value" && valueFits(top.elem, tok.value);
        break;
      case "Sum":
        if (tok.tag === "TagLeft") {
          this.stack.push(top.left);
          ok = true;
        } else if (tok.tag === "TagRight") {
          this.stack.push(top.right);
          ok = true;
        }
        break;
      case "Star":
        if (tok.tag === "More") {
          this.stack.push(top, top.elem);
          ok = true;
        } else if (tok.tag === "Done") {
          ok = true;
        }
        break;
    }

    if (!ok) {
      this.stack.push(top);
      return { ok: false, expected: this.expected() };
    }
    this.accepted++;
    return { ok: true };
  }

  private normalize(): void {
    for (;;) {
      const top = this.stack[this.stack.length - 1];
      if (!top) return;
      if (top.tag === "Cat") {
        this.stack.pop();
        this.stack.push(top.right, top.left);
      } else if (top.tag === "Eps" || top.tag === "Meta") {
        this.stack.pop();
      } else {
        return;
      }
    }
  }
}

/**
 * Check a complete token list against a type. Returns the index and
 * expectation of the first problem, or undefined when the list fits.
 */
export function checkTokens(
  type: StreamType,
  tokens: readonly Token[]
): { index: number; expected: string } | undefined {
  const reader = new ShapeReader(type);
  for (let i = 0; i < tokens.length; i++) {
    const step = reader.accept(tokens[i]);
    if (!step.ok) return { index: i, expected: step.expected };
  }
  if (!reader.complete) return { index: tokens.length, expected: reader.expected() };
  return undefined;
}
