// src/core/graph/builder.ts
// Graph construction API: one method per term former

import { kindOf, showType, wellFormed, type ElemKind, type Scalar, type StreamType } from "../types";
import { GraphError } from "../errors";
import { noTrace, type TraceLog } from "../trace";
import { Checker, check, TypedGraph } from "../check/checker";
import {
  ROOT_SCOPE,
  isBufferNode,
  labelOf,
  partOf,
  scopeWithin,
  tailRecurs,
  viewOf,
  type Binder,
  type Branch,
  type BufferOp,
  type Graph,
  type GraphNode,
  type GraphView,
  type InputDecl,
  type NodeBody,
  type NodeId,
  type ScopeId,
  type ScopeInfo,
  type ScopeOwner,
} from "./ir";
import { concatMapStar, concatStars, mapStar, zipWithStars } from "./derived";

export type ValidationMode = "eager" | "deferred";

export type BuilderOptions = {
  /**
   * `eager` typechecks each node as it is appended; `deferred` leaves type
   * errors to `check`. Structural errors are raised immediately either way.
   */
  validation?: ValidationMode;
  trace?: TraceLog;
};

/** Restart the enclosing loop with new arguments. */
export type RecurFn = (...args: NodeId[]) => NodeId;

type OpenLoop = { readonly params: readonly NodeId[]; readonly recurs: NodeId[] };

export class GraphBuilder {
  private readonly nodes: GraphNode[] = [];
  private readonly scopes: ScopeInfo[] = [{ id: ROOT_SCOPE, parent: undefined, owner: "root" }];
  private readonly inputs: InputDecl[] = [];
  private readonly inputTypes: StreamType[] = [];
  private readonly loops = new Map<ScopeId, OpenLoop>();
  private readonly view: GraphView;
  private readonly checker: Checker | undefined;
  private readonly log: TraceLog;
  private current: ScopeId = ROOT_SCOPE;
  private closed: string | undefined;
  private finished: { graph: Graph; typed?: TypedGraph } | undefined;

  constructor(options: BuilderOptions = {}) {
    this.view = viewOf({ nodes: this.nodes, scopes: this.scopes });
    this.log = options.trace ?? noTrace;
    this.checker =
      (options.validation ?? "eager") === "eager"
        ? new Checker(this.view, this.inputTypes, this.log)
        : undefined;
  }

  get validation(): ValidationMode {
    return this.checker ? "eager" : "deferred";
  }

  // ───────────────────────────────────────────────────────────────
  // Introduction forms
  // ───────────────────────────────────────────────────────────────

  input(name: string, type: StreamType): NodeId {
    this.ensureOpen();
    if (this.current !== ROOT_SCOPE) {
      throw new GraphError("ScopeEscape", { node: `input ${name}`, scope: this.current });
    }
    if (!wellFormed(type)) {
      throw new GraphError("MalformedType", { what: `input ${name}`, type: showType(type) });
    }
    const index = this.inputs.length;
    this.inputTypes.push(type);
    const node = this.add({ kind: "input", index, name });
    this.inputs.push({ name, type, node });
    return node;
  }

  eps(): NodeId {
    return this.add({ kind: "eps" });
  }

  singleton(value: Scalar, elem: ElemKind = kindOf(value)): NodeId {
    return this.add({ kind: "const", value, elem });
  }

  catr(left: NodeId, right: NodeId): NodeId {
    this.stream(left);
    this.stream(right);
    return this.add({ kind: "catr", left, right });
  }

  inl(payload: NodeId, rightType?: StreamType): NodeId {
    this.stream(payload);
    this.declared(rightType, "right alternative");
    return this.add({ kind: "inj", side: "left", payload, other: rightType });
  }

  inr(payload: NodeId, leftType?: StreamType): NodeId {
    this.stream(payload);
    this.declared(leftType, "left alternative");
    return this.add({ kind: "inj", side: "right", payload, other: leftType });
  }

  nil(elemType?: StreamType): NodeId {
    this.declared(elemType, "star element");
    return this.add({ kind: "nil", elem: elemType });
  }

  cons(head: NodeId, tail: NodeId): NodeId {
    this.stream(head);
    this.stream(tail);
    return this.add({ kind: "cons", head, tail });
  }

  // ───────────────────────────────────────────────────────────────
  // Elimination forms
  // ───────────────────────────────────────────────────────────────

  /** Split a concatenation into fresh handles for its two parts. */
  catl(source: NodeId): [NodeId, NodeId] {
    this.stream(source);
    const split = this.add({ kind: "catl", source });
    const left = this.add({ kind: "proj", split, side: "left" });
    const right = this.add({ kind: "proj", split, side: "right" });
    return [left, right];
  }

  case(
    scrutinee: NodeId,
    onLeft: (payload: NodeId) => NodeId,
    onRight: (payload: NodeId) => NodeId
  ): NodeId {
    this.stream(scrutinee);
    const left = this.branch("case", () => [{ site: "case", scrutinee, side: "left" }], ([a]) => onLeft(a));
    const right = this.branch("case", () => [{ site: "case", scrutinee, side: "right" }], ([b]) => onRight(b));
    return this.add({ kind: "case", scrutinee, left, right });
  }

  starcase(
    scrutinee: NodeId,
    onNil: () => NodeId,
    onCons: (head: NodeId, tail: NodeId) => NodeId
  ): NodeId {
    this.stream(scrutinee);
    const nil = this.branch("starcase", () => [], () => onNil());
    const cons = this.branch(
      "starcase",
      () => [
        { site: "starcase", scrutinee, part: "head" },
        { site: "starcase", scrutinee, part: "tail" },
      ],
      ([h, t]) => onCons(h, t)
    );
    return this.add({ kind: "starcase", scrutinee, nil, cons });
  }

  cond(scrutinee: NodeId, onTrue: () => NodeId, onFalse: () => NodeId): NodeId {
    this.stream(scrutinee);
    const then = this.branch("cond", () => [], () => onTrue());
    const otherwise = this.branch("cond", () => [], () => onFalse());
    return this.add({ kind: "cond", scrutinee, then, else: otherwise });
  }

  /**
   * Open a loop over `args`. The body receives a restart function and one
   * parameter per argument; restarts must sit in tail position.
   */
  rec(args: NodeId[], body: (recur: RecurFn, ...params: NodeId[]) => NodeId): NodeId {
    for (const a of args) this.stream(a);
    const branch = this.inScope("rec", (loop) => {
      const params = args.map((arg, index) =>
        this.add({ kind: "param", binder: { site: "rec", loop, index, arg } })
      );
      const open: OpenLoop = { params, recurs: [] };
      this.loops.set(loop, open);
      try {
        const result = this.stream(body((...next) => this.recur(loop, next), ...params));
        const reached = tailRecurs(this.view, result);
        const stray = open.recurs.find((r) => !reached.has(r));
        if (stray !== undefined) {
          throw new GraphError(
            "IllegalRecursion",
            { node: labelOf(this.view, stray), reason: "restart is not in tail position" },
            [stray]
          );
        }
        return { scope: loop, params, result };
      } finally {
        this.loops.delete(loop);
      }
    });
    return this.add({ kind: "rec", args: [...args], body: branch });
  }

  // ───────────────────────────────────────────────────────────────
  // Buffers
  // ───────────────────────────────────────────────────────────────

  wait(source: NodeId): NodeId {
    this.stream(source);
    return this.add({ kind: "wait", source });
  }

  bufferConst(value: Scalar, elem: ElemKind = kindOf(value)): NodeId {
    return this.add({ kind: "bconst", value, elem });
  }

  bufferOp(op: BufferOp, left: NodeId, right: NodeId): NodeId {
    this.ref(left);
    this.ref(right);
    return this.add({ kind: "bop", op, left, right });
  }

  emit(buffer: NodeId): NodeId {
    this.ref(buffer);
    return this.add({ kind: "emit", buffer });
  }

  // ───────────────────────────────────────────────────────────────
  // Derived combinators
  // ───────────────────────────────────────────────────────────────

  map(xs: NodeId, f: (x: NodeId) => NodeId): NodeId {
    return mapStar(this, xs, f);
  }

  concat(xs: NodeId, ys: NodeId): NodeId {
    return concatStars(this, xs, ys);
  }

  concatMap(xs: NodeId, f: (x: NodeId) => NodeId): NodeId {
    return concatMapStar(this, xs, f);
  }

  zipWith(xs: NodeId, ys: NodeId, f: (x: NodeId, y: NodeId) => NodeId): NodeId {
    return zipWithStars(this, xs, ys, f);
  }

  // ───────────────────────────────────────────────────────────────
  // Completion
  // ───────────────────────────────────────────────────────────────

  /** Freeze the graph with `output` as its result. */
  finish(output: NodeId): Graph {
    this.stream(output);
    if (this.current !== ROOT_SCOPE) {
      throw new GraphError("ScopeEscape", { node: labelOf(this.view, output), scope: this.current }, [output]);
    }
    const graph: Graph = Object.freeze({
      nodes: Object.freeze([...this.nodes]),
      scopes: Object.freeze([...this.scopes]),
      inputs: Object.freeze([...this.inputs]),
      output,
    });
    this.finished = { graph };
    if (this.checker) {
      this.finished.typed = this.guard(() => this.checker?.accept(graph));
    }
    this.closed = "finished";
    this.log("graph.finish", { nodes: graph.nodes.length, validation: this.validation });
    return graph;
  }

  /** Finish and typecheck in one step. */
  build(output: NodeId): TypedGraph {
    const graph = this.finish(output);
    return this.finished?.typed ?? check(graph, this.inputTypes, { trace: this.log });
  }

  // ───────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────

  private recur(loop: ScopeId, args: NodeId[]): NodeId {
    const open = this.loops.get(loop);
    if (!open) {
      throw new GraphError("IllegalRecursion", { node: `loop${loop}`, reason: "restart outside its loop" });
    }
    if (args.length !== open.params.length) {
      throw new GraphError("ArityMismatch", {
        what: "loop arguments",
        expected: open.params.length,
        actual: args.length,
      });
    }
    for (const a of args) this.stream(a);
    if (!args.some((a, i) => partOf(this.view, a, open.params[i]))) {
      throw new GraphError("IllegalRecursion", {
        node: `loop${loop}`,
        reason: "no argument is a proper part of its parameter",
      });
    }
    const id = this.add({ kind: "recur", loop, args: [...args] });
    open.recurs.push(id);
    return id;
  }

  private branch(
    owner: ScopeOwner,
    binders: () => Binder[],
    body: (params: NodeId[]) => NodeId
  ): Branch {
    return this.inScope(owner, (scope) => {
      const params = binders().map((binder) => this.add({ kind: "param", binder }));
      const result = this.stream(body(params));
      return { scope, params, result };
    });
  }

  private inScope<T>(owner: ScopeOwner, fn: (scope: ScopeId) => T): T {
    this.ensureOpen();
    const scope: ScopeInfo = { id: this.scopes.length, parent: this.current, owner };
    this.scopes.push(scope);
    const saved = this.current;
    this.current = scope.id;
    try {
      return fn(scope.id);
    } finally {
      this.current = saved;
    }
  }

  private add(body: NodeBody): NodeId {
    this.ensureOpen();
    const node: GraphNode = { id: this.nodes.length, scope: this.current, ...body };
    this.nodes.push(node);
    this.guard(() => this.checker?.visit(node));
    return node.id;
  }

  /** Run a checker step; a failure closes the builder. */
  private guard<T>(step: () => T): T {
    try {
      return step();
    } catch (e) {
      this.closed = "an earlier call failed";
      throw e;
    }
  }

  private ensureOpen(): void {
    if (this.closed) throw new GraphError("BuilderClosed", { reason: this.closed });
  }

  private ref(id: NodeId): GraphNode {
    this.ensureOpen();
    const node = this.nodes[id];
    if (!node) throw new GraphError("UnknownNode", { node: id });
    if (!scopeWithin(this.view, this.current, node.scope)) {
      throw new GraphError("ScopeEscape", { node: labelOf(this.view, id), scope: this.current }, [id]);
    }
    return node;
  }

  private stream(id: NodeId): NodeId {
    const node = this.ref(id);
    if (isBufferNode(node)) throw new GraphError("InertBuffer", { node: labelOf(this.view, id) }, [id]);
    if (node.kind === "catl") throw new GraphError("UnknownNode", { node: labelOf(this.view, id) }, [id]);
    return id;
  }

  private declared(type: StreamType | undefined, what: string): void {
    if (type && !wellFormed(type)) {
      throw new GraphError("MalformedType", { what, type: showType(type) });
    }
  }
}
