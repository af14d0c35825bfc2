// src/core/compiler/bytecode.ts
// Fusion compiler: typed graph -> blocks of segment-register instructions

import { CompileError, InvariantError } from "../errors";
import { DONE, MORE, TAG_LEFT, TAG_RIGHT, showToken, val } from "../tokens";
import { showType } from "../types";
import { noTrace } from "../trace";
import { ROOT_SCOPE, isAtom, labelOf, type Branch, type NodeId, type NodeOf, type ScopeId } from "../graph/ir";
import type { TypedGraph } from "../check/checker";
import type { Block, BufferCode, CompileOptions, Instr, IteratorProgram, Reg } from "./types";

// ─────────────────────────────────────────────────────────────────
// Compilation Context
// ─────────────────────────────────────────────────────────────────

type CompileContext = {
  readonly typed: TypedGraph;
  readonly fusion: boolean;
  readonly blocks: Block[];
  current: Block;
  /** Bound variables resolved statically to the node they stand for. */
  readonly aliases: Map<NodeId, NodeId>;
  /** Where each open loop's body begins. */
  readonly loopStarts: Map<ScopeId, { block: number; pc: number }>;
  /** catl nodes per scope, in construction order. */
  readonly splits: Map<ScopeId, NodeOf<"catl">[]>;
  /** Projections per catl node. */
  readonly projections: Map<NodeId, { left?: NodeId; right?: NodeId }>;
  fused: number;
};

function createCompileContext(typed: TypedGraph, fusion: boolean): CompileContext {
  const main: Block = { id: 0, label: "main", type: typed.outputType, code: [] };
  const ctx: CompileContext = {
    typed,
    fusion,
    blocks: [main],
    current: main,
    aliases: new Map(),
    loopStarts: new Map(),
    splits: new Map(),
    projections: new Map(),
    fused: 0,
  };
  for (const node of typed.graph.nodes) {
    if (node.kind === "catl") {
      const list = ctx.splits.get(node.scope) ?? [];
      list.push(node);
      ctx.splits.set(node.scope, list);
    } else if (node.kind === "proj") {
      const entry = ctx.projections.get(node.split) ?? {};
      entry[node.side] = node.id;
      ctx.projections.set(node.split, entry);
    }
  }
  return ctx;
}

function emit(ctx: CompileContext, instr: Instr): number {
  ctx.current.code.push(instr);
  return ctx.current.code.length - 1;
}

function currentIP(ctx: CompileContext): number {
  return ctx.current.code.length;
}

/** Point the forward jump at `at` to `target`. */
function patch(ctx: CompileContext, at: number, target: number): void {
  const code = ctx.current.code;
  const instr = code[at];
  switch (instr.op) {
    case "SUM":
      code[at] = { ...instr, onRight: target };
      return;
    case "STAR":
      code[at] = { ...instr, onDone: target };
      return;
    case "BOOL":
      code[at] = { ...instr, onFalse: target };
      return;
    case "JUMP":
      code[at] = { ...instr, target };
      return;
    default:
      throw new InvariantError(`cannot patch ${instr.op} at ${at}`);
  }
}

function resolve(ctx: CompileContext, id: NodeId): NodeId {
  let cur = id;
  for (let next = ctx.aliases.get(cur); next !== undefined; next = ctx.aliases.get(cur)) {
    cur = next;
  }
  return cur;
}

function unsupported(ctx: CompileContext, id: NodeId, reason: string): CompileError {
  return new CompileError("Unsupported", { node: labelOf(ctx.typed.view, id), reason }, [id]);
}

// ─────────────────────────────────────────────────────────────────
// Segments and Scopes
// ─────────────────────────────────────────────────────────────────

/**
 * Register holding `id` as a readable segment. Atoms already have one;
 * anything else is spawned as a lazy block.
 */
function segmentReg(ctx: CompileContext, id: NodeId): Reg {
  const r = resolve(ctx, id);
  if (isAtom(ctx.typed.node(r))) return r;
  const block = compileBlock(ctx, r);
  emit(ctx, { op: "SPAWN", block, dst: r });
  return r;
}

function compileBlock(ctx: CompileContext, id: NodeId): number {
  const block: Block = {
    id: ctx.blocks.length,
    label: labelOf(ctx.typed.view, id),
    type: ctx.typed.typeOf(id),
    code: [],
  };
  ctx.blocks.push(block);
  const saved = ctx.current;
  ctx.current = block;
  try {
    compileStream(ctx, id);
    emit(ctx, { op: "HALT" });
  } finally {
    ctx.current = saved;
  }
  return block.id;
}

/** Split every concatenation eliminated in `scope`, then output `result`. */
function compileScope(ctx: CompileContext, scope: ScopeId, result: NodeId): void {
  for (const catl of ctx.splits.get(scope) ?? []) {
    const parts = ctx.projections.get(catl.id);
    if (!parts?.left || !parts.right) throw unsupported(ctx, catl.id, "split without both projections");
    const source = ctx.typed.node(resolve(ctx, catl.source));
    if (ctx.fusion && source.kind === "catr") {
      bindParts(ctx, source.left, source.right, parts.left, parts.right);
      ctx.fused++;
      continue;
    }
    const src = segmentReg(ctx, catl.source);
    emit(ctx, { op: "SPLIT", src, left: parts.left, right: parts.right });
  }
  compileStream(ctx, result);
}

/** Compile a branch, with its parameters standing for known nodes. */
function compileFused(ctx: CompileContext, branch: Branch, bound: NodeId[]): void {
  branch.params.forEach((p, i) => ctx.aliases.set(p, bound[i]));
  ctx.fused++;
  compileScope(ctx, branch.scope, branch.result);
}

/**
 * Fused pair elimination. The parts take over the operand segments, and the
 * right one still skips whatever of the left was left unread.
 */
function bindParts(ctx: CompileContext, left: NodeId, right: NodeId, toLeft: Reg, toRight: Reg): void {
  const l = segmentReg(ctx, left);
  const r = segmentReg(ctx, right);
  emit(ctx, { op: "ALIAS", left: l, right: r, toLeft, toRight });
}

function param(ctx: CompileContext, branch: Branch, index: number): Reg {
  const p = branch.params[index];
  if (p === undefined) throw unsupported(ctx, branch.result, `branch without parameter ${index}`);
  return p;
}

// ─────────────────────────────────────────────────────────────────
// Streams
// ─────────────────────────────────────────────────────────────────

/** Emit code that outputs the tokens of `id` and falls through. */
function compileStream(ctx: CompileContext, id: NodeId): void {
  const r = resolve(ctx, id);
  const node = ctx.typed.node(r);
  switch (node.kind) {
    case "input":
    case "proj":
    case "param":
      emit(ctx, { op: "COPY", src: r });
      return;

    case "eps":
      return;

    case "const":
      emit(ctx, { op: "EMIT", token: val(node.value) });
      return;

    case "catr":
      compileStream(ctx, node.left);
      compileStream(ctx, node.right);
      return;

    case "inj":
      emit(ctx, { op: "EMIT", token: node.side === "left" ? TAG_LEFT : TAG_RIGHT });
      compileStream(ctx, node.payload);
      return;

    case "nil":
      emit(ctx, { op: "EMIT", token: DONE });
      return;

    case "cons":
      emit(ctx, { op: "EMIT", token: MORE });
      compileStream(ctx, node.head);
      compileStream(ctx, node.tail);
      return;

    case "case":
      compileCase(ctx, node);
      return;

    case "starcase":
      compileStarCase(ctx, node);
      return;

    case "cond":
      compileCond(ctx, node);
      return;

    case "rec": {
      const moves = node.args.map((a, i) => ({ from: segmentReg(ctx, a), to: param(ctx, node.body, i) }));
      emit(ctx, { op: "REBIND", moves });
      ctx.loopStarts.set(node.body.scope, { block: ctx.current.id, pc: currentIP(ctx) });
      compileScope(ctx, node.body.scope, node.body.result);
      return;
    }

    case "recur": {
      const start = ctx.loopStarts.get(node.loop);
      if (!start || start.block !== ctx.current.id) {
        throw unsupported(ctx, r, "restart outside the block of its loop");
      }
      const loop = ctx.typed.graph.nodes.find((n) => n.kind === "rec" && n.body.scope === node.loop);
      if (loop?.kind !== "rec") throw unsupported(ctx, r, "restart of an unknown loop");
      const moves = node.args.map((a, i) => ({ from: segmentReg(ctx, a), to: param(ctx, loop.body, i) }));
      emit(ctx, { op: "REBIND", moves });
      emit(ctx, { op: "JUMP", target: start.pc });
      return;
    }

    case "emit":
      emit(ctx, { op: "RELEASE", buffer: bufferCode(ctx, node.buffer) });
      return;

    case "catl":
    case "wait":
    case "bconst":
    case "bop":
      throw unsupported(ctx, r, "not a stream");
  }
}

function compileCase(ctx: CompileContext, node: NodeOf<"case">): void {
  const scrutinee = ctx.typed.node(resolve(ctx, node.scrutinee));
  if (ctx.fusion && scrutinee.kind === "inj") {
    compileFused(ctx, scrutinee.side === "left" ? node.left : node.right, [scrutinee.payload]);
    return;
  }
  const src = segmentReg(ctx, node.scrutinee);
  const at = emit(ctx, {
    op: "SUM",
    src,
    left: param(ctx, node.left, 0),
    right: param(ctx, node.right, 0),
    onRight: -1,
  });
  compileScope(ctx, node.left.scope, node.left.result);
  const skip = emit(ctx, { op: "JUMP", target: -1 });
  patch(ctx, at, currentIP(ctx));
  compileScope(ctx, node.right.scope, node.right.result);
  patch(ctx, skip, currentIP(ctx));
}

function compileStarCase(ctx: CompileContext, node: NodeOf<"starcase">): void {
  const scrutinee = ctx.typed.node(resolve(ctx, node.scrutinee));
  if (ctx.fusion && scrutinee.kind === "nil") {
    compileFused(ctx, node.nil, []);
    return;
  }
  if (ctx.fusion && scrutinee.kind === "cons") {
    bindParts(ctx, scrutinee.head, scrutinee.tail, param(ctx, node.cons, 0), param(ctx, node.cons, 1));
    ctx.fused++;
    compileScope(ctx, node.cons.scope, node.cons.result);
    return;
  }
  const src = segmentReg(ctx, node.scrutinee);
  const at = emit(ctx, {
    op: "STAR",
    src,
    head: param(ctx, node.cons, 0),
    tail: param(ctx, node.cons, 1),
    onDone: -1,
  });
  compileScope(ctx, node.cons.scope, node.cons.result);
  const skip = emit(ctx, { op: "JUMP", target: -1 });
  patch(ctx, at, currentIP(ctx));
  compileScope(ctx, node.nil.scope, node.nil.result);
  patch(ctx, skip, currentIP(ctx));
}

function compileCond(ctx: CompileContext, node: NodeOf<"cond">): void {
  const scrutinee = ctx.typed.node(resolve(ctx, node.scrutinee));
  if (ctx.fusion && scrutinee.kind === "const" && typeof scrutinee.value === "boolean") {
    compileFused(ctx, scrutinee.value ? node.then : node.else, []);
    return;
  }
  const src = segmentReg(ctx, node.scrutinee);
  const at = emit(ctx, { op: "BOOL", src, onFalse: -1 });
  compileScope(ctx, node.then.scope, node.then.result);
  const skip = emit(ctx, { op: "JUMP", target: -1 });
  patch(ctx, at, currentIP(ctx));
  compileScope(ctx, node.else.scope, node.else.result);
  patch(ctx, skip, currentIP(ctx));
}

function bufferCode(ctx: CompileContext, id: NodeId): BufferCode {
  const node = ctx.typed.node(id);
  switch (node.kind) {
    case "wait":
      return { kind: "wait", src: segmentReg(ctx, node.source) };
    case "bconst":
      return { kind: "const", value: node.value };
    case "bop":
      return { kind: "op", op: node.op, left: bufferCode(ctx, node.left), right: bufferCode(ctx, node.right) };
    default:
      throw unsupported(ctx, id, "not a buffer");
  }
}

// ─────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────

/**
 * Compile a typed graph. Eliminations whose scrutinee is a visible
 * introduction are resolved statically; everything else becomes control
 * flow over segment registers, duplicated into each branch.
 */
export function compile(typed: TypedGraph, options: CompileOptions = {}): IteratorProgram {
  const log = options.trace ?? noTrace;
  const ctx = createCompileContext(typed, options.fusion ?? true);
  compileScope(ctx, ROOT_SCOPE, typed.graph.output);
  emit(ctx, { op: "HALT" });

  const program: IteratorProgram = {
    blocks: ctx.blocks,
    entry: 0,
    inputs: typed.graph.inputs.map((decl, i) => ({
      name: decl.name,
      type: typed.inputTypes[i],
      reg: decl.node,
    })),
    outputType: typed.outputType,
  };
  log("compile.done", { blocks: ctx.blocks.length, instructions: countInstructions(program), fused: ctx.fused });
  return program;
}

export function countInstructions(program: IteratorProgram): number {
  return program.blocks.reduce((sum, b) => sum + b.code.length, 0);
}

function formatBuffer(code: BufferCode): string {
  switch (code.kind) {
    case "wait":
      return `wait(r${code.src})`;
    case "const":
      return JSON.stringify(code.value);
    case "op":
      return `${code.op}(${formatBuffer(code.left)}, ${formatBuffer(code.right)})`;
  }
}

function formatInstr(instr: Instr): string {
  switch (instr.op) {
    case "EMIT":
      return `EMIT ${showToken(instr.token)}`;
    case "COPY":
      return `COPY r${instr.src}`;
    case "SPLIT":
      return `SPLIT r${instr.src} -> r${instr.left}, r${instr.right}`;
    case "ALIAS":
      return `ALIAS r${instr.left}, r${instr.right} -> r${instr.toLeft}, r${instr.toRight}`;
    case "SUM":
      return `SUM r${instr.src} -> r${instr.left} | r${instr.right} else ${instr.onRight}`;
    case "STAR":
      return `STAR r${instr.src} -> r${instr.head}, r${instr.tail} done ${instr.onDone}`;
    case "BOOL":
      return `BOOL r${instr.src} else ${instr.onFalse}`;
    case "JUMP":
      return `JUMP ${instr.target}`;
    case "SPAWN":
      return `SPAWN b${instr.block} -> r${instr.dst}`;
    case "REBIND":
      return `REBIND ${instr.moves.map((m) => `r${m.from} -> r${m.to}`).join(", ")}`;
    case "RELEASE":
      return `RELEASE ${formatBuffer(instr.buffer)}`;
    case "HALT":
      return "HALT";
  }
}

export function disassembleBlock(block: Block): string {
  const lines = [`; block ${block.id} ${block.label} : ${showType(block.type)}`];
  block.code.forEach((instr, i) => {
    lines.push(`  ${i.toString().padStart(4)}: ${formatInstr(instr)}`);
  });
  return lines.join("\n");
}

export function disassemble(program: IteratorProgram): string {
  return program.blocks.map(disassembleBlock).join("\n\n");
}
