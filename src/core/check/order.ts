// src/core/check/order.ts
// Usage-order poset: required and forbidden orderings over atoms

import type { NodeId } from "../graph/ir";

/** A pair that is both required and forbidden: `first` must precede `second`. */
export type OrderConflict = { readonly first: NodeId; readonly second: NodeId };

/**
 * Strict partial order kept transitively closed on every insertion.
 */
export class PartialOrder {
  private readonly succ = new Map<NodeId, Set<NodeId>>();
  private readonly pred = new Map<NodeId, Set<NodeId>>();

  has(x: NodeId, y: NodeId): boolean {
    return this.succ.get(x)?.has(y) ?? false;
  }

  successors(x: NodeId): Set<NodeId> {
    return new Set(this.succ.get(x));
  }

  predecessors(x: NodeId): Set<NodeId> {
    return new Set(this.pred.get(x));
  }

  /** Add `x < y` and every edge it implies. Returns the edges that were new. */
  add(x: NodeId, y: NodeId): Array<[NodeId, NodeId]> {
    if (x === y || this.has(x, y)) return [];
    const lows = [x, ...(this.pred.get(x) ?? [])];
    const highs = [y, ...(this.succ.get(y) ?? [])];
    const added: Array<[NodeId, NodeId]> = [];
    for (const a of lows) {
      for (const b of highs) {
        if (a === b || this.has(a, b)) continue;
        this.link(this.succ, a, b);
        this.link(this.pred, b, a);
        added.push([a, b]);
      }
    }
    return added;
  }

  *edges(): IterableIterator<[NodeId, NodeId]> {
    for (const [a, bs] of this.succ) {
      for (const b of bs) yield [a, b];
    }
  }

  get size(): number {
    let n = 0;
    for (const bs of this.succ.values()) n += bs.size;
    return n;
  }

  private link(map: Map<NodeId, Set<NodeId>>, from: NodeId, to: NodeId): void {
    let set = map.get(from);
    if (!set) {
      set = new Set();
      map.set(from, set);
    }
    set.add(to);
  }
}

/**
 * Ordering realized by a term. The term is well ordered while no edge is in
 * both orders.
 */
export class UsageOrder {
  readonly required = new PartialOrder();
  readonly forbidden = new PartialOrder();

  /** Every atom of `xs` precedes every atom of `ys`. */
  addAllOrdered(xs: Iterable<NodeId>, ys: Iterable<NodeId>): OrderConflict | undefined {
    const after = [...ys];
    const fresh: Array<[NodeId, NodeId]> = [];
    for (const x of xs) {
      for (const y of after) {
        fresh.push(...this.required.add(x, y));
        fresh.push(...this.forbidden.add(y, x));
      }
    }
    return this.conflictAmong(fresh);
  }

  addOrdered(x: NodeId, y: NodeId): OrderConflict | undefined {
    return this.addAllOrdered([x], [y]);
  }

  /**
   * `x` takes over the orderings every atom of `vars` has in common: their
   * shared predecessors precede it and their shared successors follow it.
   */
  addInPlaceOf(x: NodeId, vars: Iterable<NodeId>): OrderConflict | undefined {
    const list = [...vars];
    if (list.length === 0) return undefined;

    let preds = this.required.predecessors(list[0]);
    let succs = this.required.successors(list[0]);
    for (const v of list.slice(1)) {
      const p = this.required.predecessors(v);
      const s = this.required.successors(v);
      preds = new Set([...preds].filter((a) => p.has(a)));
      succs = new Set([...succs].filter((b) => s.has(b)));
    }

    const fresh: Array<[NodeId, NodeId]> = [];
    for (const a of preds) fresh.push(...this.required.add(a, x));
    for (const b of succs) fresh.push(...this.required.add(x, b));
    return this.conflictAmong(fresh);
  }

  /** Smallest conflicting pair overall, or undefined when consistent. */
  conflict(): OrderConflict | undefined {
    return this.conflictAmong([...this.required.edges(), ...this.forbidden.edges()]);
  }

  private conflictAmong(edges: Array<[NodeId, NodeId]>): OrderConflict | undefined {
    let best: OrderConflict | undefined;
    for (const [a, b] of edges) {
      if (!this.required.has(a, b) || !this.forbidden.has(a, b)) continue;
      if (!best || a < best.first || (a === best.first && b < best.second)) {
        best = { first: a, second: b };
      }
    }
    return best;
  }
}
