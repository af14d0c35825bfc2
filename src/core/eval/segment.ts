// src/core/eval/segment.ts
// Typed views over a shared token source

import { InvariantError } from "../errors";
import { ShapeReader, showToken, type Token } from "../tokens";
import { showType, type Scalar, type StreamType } from "../types";
import type { TokenSource } from "./source";

export type SumView = { readonly side: "left" | "right"; readonly payload: Segment };
export type StarView = { readonly head: Segment; readonly tail: Segment };

/**
 * The tokens of one typed sub-stream of a source. Its extent is fixed by its
 * type, so a segment knows when it is complete without an end marker.
 *
 * Segments are read in order: `priors` are the siblings that must be
 * drained before this one reads. Eliminating a segment hands
 * its remaining tokens to the parts; `delegate` is the last of them.
 */
export class Segment {
  private readonly reader: ShapeReader;
  private priors: Segment[];
  private delegate: Segment | undefined;

  constructor(
    private readonly source: TokenSource,
    readonly type: StreamType,
    prior?: Segment
  ) {
    this.reader = new ShapeReader(type);
    this.priors = prior ? [prior] : [];
  }

  /** Next token of this segment, or undefined once it is complete. */
  next(): Token | undefined {
    if (this.delegate) throw new InvariantError(`segment of type ${showType(this.type)} read after elimination`);
    this.settle();
    if (this.reader.complete) return undefined;
    const tok = this.source.pull();
    const step = this.reader.accept(tok);
    if (!step.ok) {
      throw new InvariantError(`segment of type ${showType(this.type)} got ${showToken(tok)}, expected ${step.expected}`);
    }
    return tok;
  }

  /** Read and discard whatever is left, including parts split off from it. */
  skip(): void {
    const last = this.last();
    last.settle();
    while (!last.reader.complete) last.next();
  }

  /** Drain `prior` before this segment's first token is read. */
  follow(prior: Segment): void {
    this.fresh("link");
    this.priors.unshift(prior);
  }

  /** Read the whole remaining segment. */
  drain(): Token[] {
    const out: Token[] = [];
    for (let tok = this.next(); tok !== undefined; tok = this.next()) out.push(tok);
    return out;
  }

  // ───────────────────────────────────────────────────────────────
  // Eliminations
  // ───────────────────────────────────────────────────────────────

  split(): [Segment, Segment] {
    if (this.type.tag !== "Cat") throw new InvariantError(`split of ${showType(this.type)}`);
    this.fresh("split");
    const left = new Segment(this.source, this.type.left);
    left.priors = this.priors;
    const right = new Segment(this.source, this.type.right, left);
    this.priors = [];
    this.delegate = right;
    return [left, right];
  }

  openSum(): SumView {
    if (this.type.tag !== "Sum") throw new InvariantError(`sum case on ${showType(this.type)}`);
    this.fresh("sum case");
    const tag = this.next();
    if (tag?.tag === "TagLeft") return this.handOff("left", this.type.left);
    if (tag?.tag === "TagRight") return this.handOff("right", this.type.right);
    throw new InvariantError(`expected a tag, got ${tag ? showToken(tag) : "end of segment"}`);
  }

  /** Undefined when the star is empty. */
  openStar(): StarView | undefined {
    if (this.type.tag !== "Star") throw new InvariantError(`star case on ${showType(this.type)}`);
    this.fresh("star case");
    const marker = this.next();
    if (marker?.tag === "Done") return undefined;
    if (marker?.tag !== "More") {
      throw new InvariantError(`expected MORE or DONE, got ${marker ? showToken(marker) : "end of segment"}`);
    }
    const head = new Segment(this.source, this.type.elem, undefined);
    const tail = new Segment(this.source, this.type, head);
    this.delegate = tail;
    return { head, tail };
  }

  openBool(): boolean {
    const tok = this.next();
    if (tok?.tag === "Value" && typeof tok.value === "boolean") return tok.value;
    throw new InvariantError(`expected a boolean, got ${tok ? showToken(tok) : "end of segment"}`);
  }

  /** The single value of a Singleton segment. */
  readValue(): Scalar {
    const tok = this.next();
    if (tok?.tag === "Value") return tok.value;
    throw new InvariantError(`expected a value, got ${tok ? showToken(tok) : "end of segment"}`);
  }

  // ───────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────

  private settle(): void {
    const priors = this.priors;
    this.priors = [];
    for (const prior of priors) prior.skip();
  }

  private last(): Segment {
    let seg: Segment = this;
    while (seg.delegate) seg = seg.delegate;
    return seg;
  }

  private fresh(what: string): void {
    if (this.delegate || this.reader.position > 0) {
      throw new InvariantError(`${what} on a segment that was already read`);
    }
  }

  private handOff(side: "left" | "right", type: StreamType): SumView {
    const payload = new Segment(this.source, type, undefined);
    this.delegate = payload;
    return { side, payload };
  }
}
