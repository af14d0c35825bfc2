// src/core/check/checker.ts
// Usage-order typechecker: one forward pass over nodes in construction order

import {
  Substitution,
  kindOf,
  showType,
  tBool,
  tCat,
  tEps,
  tSingleton,
  tStar,
  tSum,
  wellFormed,
  type SingletonType,
  type StreamType,
} from "../types";
import { valueFits } from "../tokens";
import { GraphError, InvariantError, StreamTypeError } from "../errors";
import { noTrace, type TraceLog } from "../trace";
import {
  ARITHMETIC_OPS,
  ROOT_SCOPE,
  labelOf,
  partOf,
  scopeWithin,
  tailRecurs,
  viewOf,
  type Branch,
  type Graph,
  type GraphNode,
  type GraphView,
  type NodeId,
  type NodeOf,
  type ScopeId,
} from "../graph/ir";
import { UsageOrder, type OrderConflict } from "./order";

// ─────────────────────────────────────────────────────────────────
// Typed Graph
// ─────────────────────────────────────────────────────────────────

/**
 * A graph the checker accepted, with the type of every node. This is the
 * only form either evaluator runs.
 */
export class TypedGraph {
  readonly view: GraphView;

  constructor(
    readonly graph: Graph,
    readonly types: ReadonlyMap<NodeId, StreamType>,
    readonly inputTypes: readonly StreamType[],
    readonly outputType: StreamType
  ) {
    this.view = viewOf(graph);
    Object.freeze(this);
  }

  node(id: NodeId): GraphNode {
    const node = this.graph.nodes[id];
    if (!node) throw new InvariantError(`no node ${id}`, [id]);
    return node;
  }

  typeOf(id: NodeId): StreamType {
    const t = this.types.get(id);
    if (!t) throw new InvariantError(`no type for node ${id}`, [id]);
    return t;
  }
}

// ─────────────────────────────────────────────────────────────────
// Checker State
// ─────────────────────────────────────────────────────────────────

/** `split` marks a catl node, whose value is only reachable through its projections. */
export type Sort = "stream" | "buffer" | "split";

type Info = {
  readonly sort: Sort;
  readonly type: StreamType;
  /** Atoms this value reads. */
  readonly vars: ReadonlySet<NodeId>;
};

type ScopeState = {
  /** Stream nodes consumed on the current control path. */
  readonly consumed: Set<NodeId>;
  /** Buffers created in this scope and not yet used. */
  readonly live: Set<NodeId>;
};

type LoopState = {
  readonly type: StreamType;
  readonly params: NodeId[];
  readonly recurs: NodeId[];
  closed: boolean;
};

function union(...sets: ReadonlySet<NodeId>[]): Set<NodeId> {
  const out = new Set<NodeId>();
  for (const s of sets) for (const v of s) out.add(v);
  return out;
}

/**
 * Incremental checker. The builder feeds it every node as it is appended
 * (eager validation); `check` feeds it a finished graph.
 */
export class Checker {
  private readonly info = new Map<NodeId, Info>();
  private readonly scopes = new Map<ScopeId, ScopeState>();
  private readonly loops = new Map<ScopeId, LoopState>();
  private readonly splitLeft = new Map<NodeId, NodeId>();
  private readonly starHead = new Map<ScopeId, NodeId>();
  private readonly order = new UsageOrder();
  private readonly subst = new Substitution();

  constructor(
    private readonly view: GraphView,
    private readonly inputTypes: readonly StreamType[],
    private readonly log: TraceLog = noTrace
  ) {
    this.scopes.set(ROOT_SCOPE, { consumed: new Set(), live: new Set() });
  }

  visit(node: GraphNode): void {
    const info = this.infer(node);
    this.info.set(node.id, info);
    this.log("check.visit", { id: node.id, kind: node.kind, type: showType(this.subst.show(info.type)) });
  }

  /**
   * Final checks once every node has been visited. Unresolved type
   * variables default to Eps.
   */
  accept(graph: Graph): TypedGraph {
    const out = graph.output;
    this.useStream(out, ROOT_SCOPE, out);
    this.closeBuffers(ROOT_SCOPE, out);
    this.raiseConflict(this.order.conflict());

    const types = new Map<NodeId, StreamType>();
    for (const [id, info] of this.info) {
      types.set(id, this.subst.zonk(info.type));
    }
    const outputType = this.subst.zonk(this.infoOf(out, out).type);
    const typed = new TypedGraph(
      graph,
      types,
      this.inputTypes.map((t) => this.subst.zonk(t)),
      outputType
    );
    this.log("check.accept", { nodes: graph.nodes.length, output: showType(outputType) });
    return typed;
  }

  // ───────────────────────────────────────────────────────────────
  // Per-node rules
  // ───────────────────────────────────────────────────────────────

  private infer(node: GraphNode): Info {
    switch (node.kind) {
      case "input": {
        const type = this.inputTypes[node.index];
        if (!type) {
          throw new GraphError(
            "ArityMismatch",
            { what: "input types", expected: node.index + 1, actual: this.inputTypes.length },
            [node.id]
          );
        }
        if (!wellFormed(type)) {
          throw new GraphError("MalformedType", { what: `input ${node.name}`, type: showType(type) }, [node.id]);
        }
        return this.stream(type, [node.id]);
      }

      case "eps":
        return this.stream(tEps, []);

      case "const":
        if (!valueFits(node.elem, node.value)) {
          throw new StreamTypeError(
            "TypeMismatch",
            { node: this.label(node.id), expected: node.elem, actual: kindOf(node.value) },
            [node.id]
          );
        }
        return this.stream(tSingleton(node.elem), []);

      case "catr": {
        const a = this.useStream(node.left, node.scope, node.id);
        const b = this.useStream(node.right, node.scope, node.id);
        this.raiseConflict(this.order.addAllOrdered(a.vars, b.vars));
        return this.stream(tCat(a.type, b.type), union(a.vars, b.vars));
      }

      case "inj": {
        const p = this.useStream(node.payload, node.scope, node.id);
        const other = node.other ?? this.subst.fresh();
        const type = node.side === "left" ? tSum(p.type, other) : tSum(other, p.type);
        return this.stream(type, p.vars);
      }

      case "nil":
        return this.stream(tStar(node.elem ?? this.subst.fresh()), []);

      case "cons": {
        const h = this.useStream(node.head, node.scope, node.id);
        const t = this.useStream(node.tail, node.scope, node.id);
        this.expectType(node.id, tStar(h.type), t.type);
        this.raiseConflict(this.order.addAllOrdered(h.vars, t.vars));
        return this.stream(tStar(h.type), union(h.vars, t.vars));
      }

      case "catl": {
        const z = this.useStream(node.source, node.scope, node.id);
        const r = this.subst.resolve(z.type);
        if (r.tag === "Meta") {
          this.subst.unify(r, tCat(this.subst.fresh(), this.subst.fresh()));
        } else if (r.tag !== "Cat") {
          throw new StreamTypeError("NotConcat", { node: this.label(node.source), actual: showType(r) }, [node.source]);
        }
        return { sort: "split", type: z.type, vars: z.vars };
      }

      case "proj":
        return this.inferProj(node);

      case "param":
        return this.inferParam(node);

      case "case":
      case "starcase":
      case "cond":
        return this.inferBranching(node);

      case "rec":
        return this.inferRec(node);

      case "recur":
        return this.inferRecur(node);

      case "wait": {
        const s = this.useStream(node.source, node.scope, node.id);
        this.stateOf(node.scope).live.add(node.id);
        return { sort: "buffer", type: s.type, vars: s.vars };
      }

      case "bconst":
        if (!valueFits(node.elem, node.value)) {
          throw new StreamTypeError(
            "TypeMismatch",
            { node: this.label(node.id), expected: node.elem, actual: kindOf(node.value) },
            [node.id]
          );
        }
        this.stateOf(node.scope).live.add(node.id);
        return { sort: "buffer", type: tSingleton(node.elem), vars: new Set() };

      case "bop":
        return this.inferBufferOp(node);

      case "emit": {
        const b = this.useBuffer(node.buffer, node.scope, node.id);
        return this.stream(b.type, b.vars);
      }
    }
  }

  private inferProj(node: NodeOf<"proj">): Info {
    const split = this.infoOf(node.split, node.id);
    if (split.sort !== "split") throw new GraphError("UnknownNode", { node: `catl#${node.split}` }, [node.id]);
    const cat = this.subst.resolve(split.type);
    if (cat.tag !== "Cat") throw new InvariantError("projection of a non-concatenation", [node.id]);

    this.raiseConflict(this.order.addInPlaceOf(node.id, split.vars));
    if (node.side === "left") {
      this.splitLeft.set(node.split, node.id);
      return this.stream(cat.left, [node.id]);
    }
    const left = this.splitLeft.get(node.split);
    if (left !== undefined) this.raiseConflict(this.order.addOrdered(left, node.id));
    return this.stream(cat.right, [node.id]);
  }

  private inferParam(node: NodeOf<"param">): Info {
    const b = node.binder;
    switch (b.site) {
      case "case": {
        const x = this.streamInfo(b.scrutinee, node.id);
        const sum = this.asSum(b.scrutinee, x.type);
        this.raiseConflict(this.order.addInPlaceOf(node.id, x.vars));
        return this.stream(b.side === "left" ? sum.left : sum.right, [node.id]);
      }

      case "starcase": {
        const xs = this.streamInfo(b.scrutinee, node.id);
        const elem = this.asStar(b.scrutinee, xs.type);
        this.raiseConflict(this.order.addInPlaceOf(node.id, xs.vars));
        if (b.part === "head") {
          this.starHead.set(node.scope, node.id);
          return this.stream(elem, [node.id]);
        }
        const head = this.starHead.get(node.scope);
        if (head !== undefined) this.raiseConflict(this.order.addOrdered(head, node.id));
        return this.stream(tStar(elem), [node.id]);
      }

      case "rec": {
        const arg = this.streamInfo(b.arg, node.id);
        const loop = this.loopOf(b.loop);
        if (b.index !== loop.params.length) {
          throw new GraphError(
            "ArityMismatch",
            { what: "loop parameters", expected: loop.params.length, actual: b.index },
            [node.id]
          );
        }
        this.raiseConflict(this.order.addInPlaceOf(node.id, arg.vars));
        // Parameters keep the order their arguments already have.
        for (const prev of loop.params) {
          const prevArg = this.argOf(prev);
          const prevVars = this.infoOf(prevArg, node.id).vars;
          if (this.allRequired(prevVars, arg.vars)) {
            this.raiseConflict(this.order.addOrdered(prev, node.id));
          } else if (this.allRequired(arg.vars, prevVars)) {
            this.raiseConflict(this.order.addOrdered(node.id, prev));
          }
        }
        loop.params.push(node.id);
        return this.stream(arg.type, [node.id]);
      }
    }
  }

  private inferBranching(node: NodeOf<"case"> | NodeOf<"starcase"> | NodeOf<"cond">): Info {
    const [first, second] = node.kind === "case"
      ? [node.left, node.right]
      : node.kind === "starcase"
        ? [node.nil, node.cons]
        : [node.then, node.else];

    const a = this.closeBranch(first, node.id);
    const b = this.closeBranch(second, node.id);
    this.mergeBranches(node.scope, [first, second]);

    const x = this.useStream(node.scrutinee, node.scope, node.id);
    if (node.kind === "case") {
      this.asSum(node.scrutinee, x.type);
    } else if (node.kind === "starcase") {
      this.asStar(node.scrutinee, x.type);
    } else {
      this.asBool(node.scrutinee, x.type);
    }

    if (!this.subst.unify(a.type, b.type)) {
      throw new StreamTypeError(
        "BranchMismatch",
        {
          node: this.label(node.id),
          left: showType(this.subst.show(a.type)),
          right: showType(this.subst.show(b.type)),
        },
        [node.id, first.result, second.result]
      );
    }

    const outer = union(this.outerVars(a.vars, first.scope), this.outerVars(b.vars, second.scope));
    this.raiseConflict(this.order.addAllOrdered(x.vars, outer));
    return this.stream(a.type, union(x.vars, outer));
  }

  private inferRec(node: NodeOf<"rec">): Info {
    const loop = this.loopOf(node.body.scope);
    const body = this.closeBranch(node.body, node.id);
    this.mergeBranches(node.scope, [node.body]);
    this.expectType(node.id, loop.type, body.type);

    const reached = tailRecurs(this.view, node.body.result);
    for (const r of loop.recurs) {
      if (!reached.has(r)) {
        throw new GraphError("IllegalRecursion", { node: this.label(r), reason: "restart is not in tail position" }, [r]);
      }
    }
    loop.closed = true;

    const args = node.args.map((a) => this.useStream(a, node.scope, node.id));
    // Carry the loop's parameter order onto the initial arguments and every restart.
    const calls: ReadonlyArray<readonly NodeId[]> = [
      node.args,
      ...loop.recurs.map((r) => {
        const rn = this.view.node(r);
        return rn?.kind === "recur" ? rn.args : [];
      }),
    ];
    for (let i = 0; i < loop.params.length; i++) {
      for (let j = 0; j < loop.params.length; j++) {
        if (i === j || !this.order.required.has(loop.params[i], loop.params[j])) continue;
        for (const call of calls) {
          this.raiseConflict(
            this.order.addAllOrdered(this.infoOf(call[i], node.id).vars, this.infoOf(call[j], node.id).vars)
          );
        }
      }
    }

    const argVars = union(...args.map((a) => a.vars));
    return this.stream(loop.type, union(argVars, this.outerVars(body.vars, node.body.scope)));
  }

  private inferRecur(node: NodeOf<"recur">): Info {
    const loop = this.loops.get(node.loop);
    if (!loop || loop.closed || !scopeWithin(this.view, node.scope, node.loop)) {
      throw new GraphError("IllegalRecursion", { node: this.label(node.id), reason: "restart outside its loop" }, [node.id]);
    }
    if (node.args.length !== loop.params.length) {
      throw new GraphError(
        "ArityMismatch",
        { what: "loop arguments", expected: loop.params.length, actual: node.args.length },
        [node.id]
      );
    }

    const vars: ReadonlySet<NodeId>[] = [];
    let decreasing = false;
    node.args.forEach((arg, i) => {
      const param = loop.params[i];
      const a = this.useStream(arg, node.scope, node.id);
      this.expectType(node.id, this.infoOf(param, node.id).type, a.type);
      vars.push(a.vars);
      if (partOf(this.view, arg, param)) decreasing = true;
    });
    if (!decreasing) {
      throw new GraphError(
        "IllegalRecursion",
        { node: this.label(node.id), reason: "no argument is a proper part of its parameter" },
        [node.id]
      );
    }

    loop.recurs.push(node.id);
    return this.stream(loop.type, union(...vars));
  }

  private inferBufferOp(node: NodeOf<"bop">): Info {
    const a = this.useBuffer(node.left, node.scope, node.id);
    const b = this.useBuffer(node.right, node.scope, node.id);
    const ta = this.subst.resolve(a.type);
    if (ta.tag !== "Singleton") {
      throw new StreamTypeError("NotSingleton", { node: this.label(node.left), actual: showType(ta) }, [node.left]);
    }
    this.expectType(node.id, ta, b.type);
    this.checkOperandKind(node, ta);

    const type = ARITHMETIC_OPS.has(node.op) ? ta : tBool;
    this.stateOf(node.scope).live.add(node.id);
    return { sort: "buffer", type, vars: union(a.vars, b.vars) };
  }

  /**
   * `eq` and `ne` compare any kind. `add` takes numbers or strings, the rest
   * numbers only; opaque kinds may hold values of either JS type.
   */
  private checkOperandKind(node: NodeOf<"bop">, operand: SingletonType): void {
    if (node.op === "eq" || node.op === "ne") return;
    const allowed = node.op === "add" ? ["number", "string"] : ["number"];
    if (!allowed.includes(operand.elem)) {
      throw new StreamTypeError(
        "TypeMismatch",
        { node: this.label(node.id), expected: allowed.join(" or "), actual: operand.elem },
        [node.id]
      );
    }
  }

  // ───────────────────────────────────────────────────────────────
  // Scopes, use and buffers
  // ───────────────────────────────────────────────────────────────

  private stateOf(scope: ScopeId): ScopeState {
    const existing = this.scopes.get(scope);
    if (existing) return existing;
    const parent = this.view.scope(scope)?.parent;
    if (parent === undefined) throw new GraphError("UnknownNode", { node: `scope ${scope}` });
    const state: ScopeState = { consumed: new Set(this.stateOf(parent).consumed), live: new Set() };
    this.scopes.set(scope, state);
    return state;
  }

  private closeBranch(branch: Branch, owner: NodeId): Info {
    const result = this.useStream(branch.result, branch.scope, owner);
    this.closeBuffers(branch.scope, owner);
    return result;
  }

  private closeBuffers(scope: ScopeId, owner: NodeId): void {
    const [leftover] = this.stateOf(scope).live;
    if (leftover !== undefined) {
      throw new StreamTypeError("UnmatchedBuffer", { node: this.label(leftover), reason: "never released" }, [leftover, owner]);
    }
  }

  private mergeBranches(scope: ScopeId, branches: Branch[]): void {
    const target = this.stateOf(scope).consumed;
    for (const br of branches) {
      for (const id of this.stateOf(br.scope).consumed) target.add(id);
    }
  }

  private infoOf(id: NodeId, user: NodeId): Info {
    const info = this.info.get(id);
    if (!info) throw new GraphError("UnknownNode", { node: id }, [user]);
    return info;
  }

  private visible(id: NodeId, scope: ScopeId, user: NodeId): Info {
    const info = this.infoOf(id, user);
    const target = this.view.node(id);
    if (!target || !scopeWithin(this.view, scope, target.scope)) {
      throw new GraphError("ScopeEscape", { node: this.label(id), scope }, [id, user]);
    }
    return info;
  }

  private streamInfo(id: NodeId, user: NodeId): Info {
    const info = this.infoOf(id, user);
    if (info.sort === "buffer") throw new GraphError("InertBuffer", { node: this.label(id) }, [id, user]);
    if (info.sort === "split") throw new GraphError("UnknownNode", { node: this.label(id) }, [id, user]);
    return info;
  }

  private useStream(id: NodeId, scope: ScopeId, user: NodeId): Info {
    const info = this.visible(id, scope, user);
    this.streamInfo(id, user);
    this.checkLoopEntry(id, scope, user);
    const state = this.stateOf(scope);
    if (state.consumed.has(id)) {
      throw new StreamTypeError("DuplicateUse", { node: this.label(id) }, [id, user]);
    }
    state.consumed.add(id);
    return info;
  }

  /**
   * A loop body runs once per restart, so it consumes nothing from outside
   * the loop. Outer streams enter as loop arguments.
   */
  private checkLoopEntry(id: NodeId, scope: ScopeId, user: NodeId): void {
    const home = this.view.node(id)?.scope;
    for (let s: ScopeId | undefined = scope; s !== undefined && s !== home; s = this.view.scope(s)?.parent) {
      if (this.view.scope(s)?.owner === "rec") {
        throw new StreamTypeError("DuplicateUse", { node: this.label(id) }, [id, user]);
      }
    }
  }

  private useBuffer(id: NodeId, scope: ScopeId, user: NodeId): Info {
    const info = this.visible(id, scope, user);
    if (info.sort !== "buffer") {
      throw new StreamTypeError("UnmatchedBuffer", { node: this.label(id), reason: "not a buffer" }, [id, user]);
    }
    const live = this.stateOf(scope).live;
    if (!live.has(id)) {
      const reason = this.view.node(id)?.scope === scope ? "already released" : "buffered in another scope";
      throw new StreamTypeError("UnmatchedBuffer", { node: this.label(id), reason }, [id, user]);
    }
    live.delete(id);
    return info;
  }

  private outerVars(vars: ReadonlySet<NodeId>, scope: ScopeId): Set<NodeId> {
    const out = new Set<NodeId>();
    for (const v of vars) {
      const node = this.view.node(v);
      if (node && !scopeWithin(this.view, node.scope, scope)) out.add(v);
    }
    return out;
  }

  // ───────────────────────────────────────────────────────────────
  // Loops and ordering
  // ───────────────────────────────────────────────────────────────

  private loopOf(scope: ScopeId): LoopState {
    let loop = this.loops.get(scope);
    if (!loop) {
      loop = { type: this.subst.fresh(), params: [], recurs: [], closed: false };
      this.loops.set(scope, loop);
    }
    return loop;
  }

  private argOf(param: NodeId): NodeId {
    const node = this.view.node(param);
    if (node?.kind === "param" && node.binder.site === "rec") return node.binder.arg;
    throw new InvariantError(`node ${param} is not a loop parameter`, [param]);
  }

  private allRequired(xs: ReadonlySet<NodeId>, ys: ReadonlySet<NodeId>): boolean {
    if (xs.size === 0 || ys.size === 0) return false;
    for (const x of xs) {
      for (const y of ys) {
        if (!this.order.required.has(x, y)) return false;
      }
    }
    return true;
  }

  private raiseConflict(conflict: OrderConflict | undefined): void {
    if (!conflict) return;
    throw new StreamTypeError(
      "OrderViolation",
      { first: this.label(conflict.first), second: this.label(conflict.second) },
      [conflict.first, conflict.second]
    );
  }

  // ───────────────────────────────────────────────────────────────
  // Type shapes
  // ───────────────────────────────────────────────────────────────

  private stream(type: StreamType, vars: Iterable<NodeId>): Info {
    return { sort: "stream", type, vars: new Set(vars) };
  }

  private expectType(at: NodeId, expected: StreamType, actual: StreamType): void {
    if (!this.subst.unify(expected, actual)) {
      throw new StreamTypeError(
        "TypeMismatch",
        {
          node: this.label(at),
          expected: showType(this.subst.show(expected)),
          actual: showType(this.subst.show(actual)),
        },
        [at]
      );
    }
  }

  private asSum(at: NodeId, t: StreamType): { left: StreamType; right: StreamType } {
    const r = this.subst.resolve(t);
    if (r.tag === "Sum") return r;
    if (r.tag === "Meta") {
      const sum = { left: this.subst.fresh(), right: this.subst.fresh() };
      this.subst.unify(r, tSum(sum.left, sum.right));
      return sum;
    }
    throw new StreamTypeError("NotSum", { node: this.label(at), actual: showType(r) }, [at]);
  }

  private asStar(at: NodeId, t: StreamType): StreamType {
    const r = this.subst.resolve(t);
    if (r.tag === "Star") return r.elem;
    if (r.tag === "Meta") {
      const elem = this.subst.fresh();
      this.subst.unify(r, tStar(elem));
      return elem;
    }
    throw new StreamTypeError("NotStar", { node: this.label(at), actual: showType(r) }, [at]);
  }

  private asBool(at: NodeId, t: StreamType): void {
    const r = this.subst.resolve(t);
    if (r.tag === "Singleton" || r.tag === "Meta") {
      this.expectType(at, tBool, r);
      return;
    }
    throw new StreamTypeError("NotSingleton", { node: this.label(at), actual: showType(r) }, [at]);
  }

  private label(id: NodeId): string {
    return labelOf(this.view, id);
  }
}

// ─────────────────────────────────────────────────────────────────
// Entry Points
// ─────────────────────────────────────────────────────────────────

export type CheckOptions = {
  trace?: TraceLog;
};

/**
 * Typecheck a finished graph. Throws GraphError or StreamTypeError.
 */
export function check(
  graph: Graph,
  declaredInputTypes: readonly StreamType[] = graph.inputs.map((i) => i.type),
  options: CheckOptions = {}
): TypedGraph {
  const log = options.trace ?? noTrace;
  if (declaredInputTypes.length !== graph.inputs.length) {
    throw new GraphError("ArityMismatch", {
      what: "input types",
      expected: graph.inputs.length,
      actual: declaredInputTypes.length,
    });
  }
  log("check.start", { nodes: graph.nodes.length, inputs: graph.inputs.length });

  const checker = new Checker(viewOf(graph), declaredInputTypes, log);
  graph.nodes.forEach((node, i) => {
    if (node.id !== i) throw new GraphError("UnknownNode", { node: node.id });
    checker.visit(node);
  });
  return checker.accept(graph);
}
