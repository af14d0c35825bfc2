// src/core/types/unify.ts
// First-order unification over stream types

import { tCat, tEps, tMeta, tStar, tSum, type StreamType } from "./types";

/**
 * Substitution for the checker's unification variables. Bindings are only
 * ever added; `resolve` follows chains lazily.
 */
export class Substitution {
  private readonly bindings = new Map<number, StreamType>();
  private nextId = 0;

  fresh(): StreamType {
    return tMeta(this.nextId++);
  }

  get size(): number {
    return this.bindings.size;
  }

  /** Head-normalize: follow bindings until a non-variable or an unbound variable. */
  resolve(t: StreamType): StreamType {
    let cur = t;
    while (cur.tag === "Meta") {
      const bound = this.bindings.get(cur.id);
      if (!bound) return cur;
      cur = bound;
    }
    return cur;
  }

  /**
   * Unify two types, extending the substitution. Returns false (leaving any
   * bindings made so far in place) when they cannot be made equal.
   */
  unify(a: StreamType, b: StreamType): boolean {
    const x = this.resolve(a);
    const y = this.resolve(b);

    if (x.tag === "Meta") {
      if (y.tag === "Meta" && y.id === x.id) return true;
      if (this.occurs(x.id, y)) return false;
      this.bindings.set(x.id, y);
      return true;
    }
    if (y.tag === "Meta") {
      return this.unify(y, x);
    }

    switch (x.tag) {
      case "Singleton":
        return y.tag === "Singleton" && x.elem === y.elem;
      case "Eps":
        return y.tag === "Eps";
      case "Cat":
        return y.tag === "Cat" && this.unify(x.left, y.left) && this.unify(x.right, y.right);
      case "Sum":
        return y.tag === "Sum" && this.unify(x.left, y.left) && this.unify(x.right, y.right);
      case "Star":
        return y.tag === "Star" && this.unify(x.elem, y.elem);
    }
  }

  /**
   * Fully apply the substitution. Unbound variables become `fallback`, which
   * defaults to Eps.
   */
  zonk(t: StreamType, fallback: StreamType = tEps): StreamType {
    const r = this.resolve(t);
    switch (r.tag) {
      case "Meta":
        return fallback;
      case "Cat":
        return tCat(this.zonk(r.left, fallback), this.zonk(r.right, fallback));
      case "Sum":
        return tSum(this.zonk(r.left, fallback), this.zonk(r.right, fallback));
      case "Star":
        return tStar(this.zonk(r.elem, fallback));
      default:
        return r;
    }
  }

  /** Zonk without defaulting, for error messages. */
  show(t: StreamType): StreamType {
    const r = this.resolve(t);
    switch (r.tag) {
      case "Cat":
        return tCat(this.show(r.left), this.show(r.right));
      case "Sum":
        return tSum(this.show(r.left), this.show(r.right));
      case "Star":
        return tStar(this.show(r.elem));
      default:
        return r;
    }
  }

  private occurs(id: number, t: StreamType): boolean {
    const r = this.resolve(t);
    switch (r.tag) {
      case "Meta":
        return r.id === id;
      case "Cat":
      case "Sum":
        return this.occurs(id, r.left) || this.occurs(id, r.right);
      case "Star":
        return this.occurs(id, r.elem);
      default:
        return false;
    }
  }
}
