// src/core/graph/index.ts

export type {
  NodeId,
  ScopeId,
  Side,
  BufferOp,
  Binder,
  Branch,
  NodeBody,
  NodeKind,
  GraphNode,
  NodeOf,
  ScopeOwner,
  ScopeInfo,
  InputDecl,
  Graph,
  GraphView,
} from "./ir";
export {
  ROOT_SCOPE,
  ARITHMETIC_OPS,
  viewOf,
  isAtom,
  isBufferNode,
  branchesOf,
  tailOperands,
  scopeWithin,
  tailRecurs,
  partOf,
  labelOf,
} from "./ir";
export type { ValidationMode, BuilderOptions, RecurFn } from "./builder";
export { GraphBuilder } from "./builder";
export { mapStar, concatStars, concatMapStar, zipWithStars } from "./derived";
