// src/core/graph/derived.ts
// Star combinators expanded into loops over starcase

import type { GraphBuilder } from "./builder";
import type { NodeId } from "./ir";

/** Apply `f` to every element: `map(f, [x1..xn]) = [f(x1)..f(xn)]`. */
export function mapStar(b: GraphBuilder, xs: NodeId, f: (x: NodeId) => NodeId): NodeId {
  return b.rec([xs], (go, ys) =>
    b.starcase(
      ys,
      () => b.nil(),
      (h, t) => b.cons(f(h), go(t))
    )
  );
}

/** Elements of `xs` followed by elements of `ys`. */
export function concatStars(b: GraphBuilder, xs: NodeId, ys: NodeId): NodeId {
  return b.rec([xs, ys], (go, as, bs) =>
    b.starcase(
      as,
      () => bs,
      (h, t) => b.cons(h, go(t, bs))
    )
  );
}

/**
 * `f` maps each element to a star; the results are concatenated. The inner
 * loop copies one result and then restarts the outer loop on the rest.
 */
export function concatMapStar(b: GraphBuilder, xs: NodeId, f: (x: NodeId) => NodeId): NodeId {
  return b.rec([xs], (go, ys) =>
    b.starcase(
      ys,
      () => b.nil(),
      (h, t) =>
        b.rec([f(h), t], (copy, zs, rest) =>
          b.starcase(
            zs,
            () => go(rest),
            (z, more) => b.cons(z, copy(more, rest))
          )
        )
    )
  );
}

/**
 * Pairwise combination, ending with the shorter input. Elements left in the
 * longer input are not read.
 */
export function zipWithStars(
  b: GraphBuilder,
  xs: NodeId,
  ys: NodeId,
  f: (x: NodeId, y: NodeId) => NodeId
): NodeId {
  return b.rec([xs, ys], (go, as, bs) =>
    b.starcase(
      as,
      () => b.nil(),
      (x, xt) =>
        b.starcase(
          bs,
          () => b.nil(),
          (y, yt) => b.cons(f(x, y), go(xt, yt))
        )
    )
  );
}
