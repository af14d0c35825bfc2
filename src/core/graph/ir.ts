// src/core/graph/ir.ts
// Append-only data-flow graph of stream terms

import type { ElemKind, Scalar, StreamType } from "../types";

// ─────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────

export type NodeId = number;
export type ScopeId = number;
export type Side = "left" | "right";

export const ROOT_SCOPE: ScopeId = 0;

export type BufferOp = "add" | "sub" | "mul" | "eq" | "ne" | "lt";

export const ARITHMETIC_OPS: ReadonlySet<BufferOp> = new Set<BufferOp>(["add", "sub", "mul"]);

// ─────────────────────────────────────────────────────────────────
// Nodes
// ─────────────────────────────────────────────────────────────────

/**
 * What a bound variable stands for: the payload of a case branch, the head
 * or tail of a non-empty star, or one argument of a loop.
 */
export type Binder =
  | { readonly site: "case"; readonly scrutinee: NodeId; readonly side: Side }
  | { readonly site: "starcase"; readonly scrutinee: NodeId; readonly part: "head" | "tail" }
  | { readonly site: "rec"; readonly loop: ScopeId; readonly index: number; readonly arg: NodeId };

/** A sub-graph owned by a branching node. */
export type Branch = {
  readonly scope: ScopeId;
  readonly params: readonly NodeId[];
  readonly result: NodeId;
};

export type NodeBody =
  | { readonly kind: "input"; readonly index: number; readonly name: string }
  | { readonly kind: "eps" }
  | { readonly kind: "const"; readonly value: Scalar; readonly elem: ElemKind }
  | { readonly kind: "catr"; readonly left: NodeId; readonly right: NodeId }
  | { readonly kind: "inj"; readonly side: Side; readonly payload: NodeId; readonly other?: StreamType }
  | { readonly kind: "nil"; readonly elem?: StreamType }
  | { readonly kind: "cons"; readonly head: NodeId; readonly tail: NodeId }
  | { readonly kind: "catl"; readonly source: NodeId }
  | { readonly kind: "proj"; readonly split: NodeId; readonly side: Side }
  | { readonly kind: "param"; readonly binder: Binder }
  | { readonly kind: "case"; readonly scrutinee: NodeId; readonly left: Branch; readonly right: Branch }
  | { readonly kind: "starcase"; readonly scrutinee: NodeId; readonly nil: Branch; readonly cons: Branch }
  | { readonly kind: "cond"; readonly scrutinee: NodeId; readonly then: Branch; readonly else: Branch }
  | { readonly kind: "rec"; readonly args: readonly NodeId[]; readonly body: Branch }
  | { readonly kind: "recur"; readonly loop: ScopeId; readonly args: readonly NodeId[] }
  | { readonly kind: "wait"; readonly source: NodeId }
  | { readonly kind: "bconst"; readonly value: Scalar; readonly elem: ElemKind }
  | { readonly kind: "bop"; readonly op: BufferOp; readonly left: NodeId; readonly right: NodeId }
  | { readonly kind: "emit"; readonly buffer: NodeId };

export type NodeKind = NodeBody["kind"];

export type GraphNode = { readonly id: NodeId; readonly scope: ScopeId } & NodeBody;

export type NodeOf<K extends NodeKind> = Extract<GraphNode, { kind: K }>;

export type ScopeOwner = "root" | "case" | "starcase" | "cond" | "rec";

export type ScopeInfo = {
  readonly id: ScopeId;
  readonly parent: ScopeId | undefined;
  readonly owner: ScopeOwner;
};

export type InputDecl = {
  readonly name: string;
  readonly type: StreamType;
  readonly node: NodeId;
};

export type Graph = {
  readonly nodes: readonly GraphNode[];
  readonly scopes: readonly ScopeInfo[];
  readonly inputs: readonly InputDecl[];
  readonly output: NodeId;
};

/** Read access to a graph that may still be under construction. */
export interface GraphView {
  node(id: NodeId): GraphNode | undefined;
  scope(id: ScopeId): ScopeInfo | undefined;
}

export function viewOf(graph: Pick<Graph, "nodes" | "scopes">): GraphView {
  return {
    node: (id) => graph.nodes[id],
    scope: (id) => graph.scopes[id],
  };
}

// ─────────────────────────────────────────────────────────────────
// Classification
// ─────────────────────────────────────────────────────────────────

/** Atoms are the variables the usage-order poset ranges over. */
export function isAtom(node: GraphNode): boolean {
  return node.kind === "input" || node.kind === "proj" || node.kind === "param";
}

export function isBufferNode(node: GraphNode): boolean {
  return node.kind === "wait" || node.kind === "bconst" || node.kind === "bop";
}

export function branchesOf(node: GraphNode): Branch[] {
  switch (node.kind) {
    case "case":
      return [node.left, node.right];
    case "starcase":
      return [node.nil, node.cons];
    case "cond":
      return [node.then, node.else];
    case "rec":
      return [node.body];
    default:
      return [];
  }
}

/**
 * Operands in tail position: a loop restart reached through them replaces
 * the whole remaining output of the node.
 */
export function tailOperands(node: GraphNode): NodeId[] {
  switch (node.kind) {
    case "catr":
      return [node.right];
    case "inj":
      return [node.payload];
    case "cons":
      return [node.tail];
    case "case":
    case "starcase":
    case "cond":
    case "rec":
      return branchesOf(node).map((b) => b.result);
    default:
      return [];
  }
}

/** True when `inner` is `outer` or nested inside it. */
export function scopeWithin(view: GraphView, inner: ScopeId, outer: ScopeId): boolean {
  let cur: ScopeId | undefined = inner;
  while (cur !== undefined) {
    if (cur === outer) return true;
    cur = view.scope(cur)?.parent;
  }
  return false;
}

/**
 * Recur nodes reachable from `root` through tail positions only.
 */
export function tailRecurs(view: GraphView, root: NodeId): Set<NodeId> {
  const found = new Set<NodeId>();
  const pending = [root];
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined) break;
    const node = view.node(id);
    if (!node) continue;
    if (node.kind === "recur") {
      found.add(id);
      continue;
    }
    pending.push(...tailOperands(node));
  }
  return found;
}

/**
 * True when `atom` is a proper part of `whole`: reached by eliminating it at
 * least once, possibly through loop parameters standing for their arguments.
 */
export function partOf(view: GraphView, atom: NodeId, whole: NodeId): boolean {
  let cur = view.node(atom);
  let proper = false;
  while (cur) {
    let parent: NodeId | undefined;
    if (cur.kind === "proj") {
      const split = view.node(cur.split);
      parent = split?.kind === "catl" ? split.source : undefined;
      proper = true;
    } else if (cur.kind === "param") {
      if (cur.binder.site === "rec") {
        parent = cur.binder.arg;
      } else {
        parent = cur.binder.scrutinee;
        proper = true;
      }
    }
    if (parent === undefined) return false;
    if (parent === whole) return proper;
    cur = view.node(parent);
  }
  return false;
}

// ─────────────────────────────────────────────────────────────────
// Labels
// ─────────────────────────────────────────────────────────────────

function binderLabel(view: GraphView, b: Binder): string {
  switch (b.site) {
    case "case":
      return `${labelOf(view, b.scrutinee)}.${b.side === "left" ? "inl" : "inr"}`;
    case "starcase":
      return `${labelOf(view, b.scrutinee)}.${b.part}`;
    case "rec":
      return `loop${b.loop}.arg${b.index}`;
  }
}

/** Readable name for a node in error messages, e.g. `z.fst` or `xs.tail`. */
export function labelOf(view: GraphView, id: NodeId): string {
  const node = view.node(id);
  if (!node) return `#${id}`;
  switch (node.kind) {
    case "input":
      return node.name;
    case "proj": {
      const split = view.node(node.split);
      const base = split?.kind === "catl" ? labelOf(view, split.source) : `#${node.split}`;
      return `${base}.${node.side === "left" ? "fst" : "snd"}`;
    }
    case "param":
      return binderLabel(view, node.binder);
    default:
      return `${node.kind}#${id}`;
  }
}
