// src/core/compiler/types.ts
// Fusion compiler: program, instruction and VM state types

import type { Token } from "../tokens";
import type { Scalar, StreamType } from "../types";
import type { BufferOp, NodeId } from "../graph/ir";
import type { Outcome } from "../../outcome";
import type { InputSource, Segment, StepBudget, BufferValue } from "../eval";
import type { TraceLog } from "../trace";

// ─────────────────────────────────────────────────────────────────
// Instructions
// ─────────────────────────────────────────────────────────────────

/**
 * Registers hold segments and are named by the node whose value they carry.
 */
export type Reg = NodeId;

/** Buffer expression evaluated by RELEASE. */
export type BufferCode =
  | { readonly kind: "wait"; readonly src: Reg }
  | { readonly kind: "const"; readonly value: Scalar }
  | { readonly kind: "op"; readonly op: BufferOp; readonly left: BufferCode; readonly right: BufferCode };

/**
 * Block instruction. Jump targets are instruction indices within the same
 * block; SUM, STAR and BOOL fall through on their first alternative.
 */
export type Instr =
  | { readonly op: "EMIT"; readonly token: Token }                    // Output a constant token
  | { readonly op: "COPY"; readonly src: Reg }                        // Forward a whole segment
  | { readonly op: "SPLIT"; readonly src: Reg; readonly left: Reg; readonly right: Reg }
  | { readonly op: "SUM"; readonly src: Reg; readonly left: Reg; readonly right: Reg; readonly onRight: number }
  | { readonly op: "STAR"; readonly src: Reg; readonly head: Reg; readonly tail: Reg; readonly onDone: number }
  | { readonly op: "BOOL"; readonly src: Reg; readonly onFalse: number }
  | { readonly op: "ALIAS"; readonly left: Reg; readonly right: Reg; readonly toLeft: Reg; readonly toRight: Reg } // Fused split
  | { readonly op: "JUMP"; readonly target: number }
  | { readonly op: "SPAWN"; readonly block: number; readonly dst: Reg } // Lazy segment over a block's output
  | { readonly op: "REBIND"; readonly moves: readonly RegMove[] }    // Parallel register moves
  | { readonly op: "RELEASE"; readonly buffer: BufferCode }           // Replay a buffer expression
  | { readonly op: "HALT" };

export type RegMove = { readonly from: Reg; readonly to: Reg };

export type Block = {
  readonly id: number;
  /** Readable name, e.g. `main` or the node a spawned block computes. */
  readonly label: string;
  /** Type of the stream the block outputs. */
  readonly type: StreamType;
  readonly code: Instr[];
};

/**
 * A compiled graph. Running it pulls input only as output is demanded.
 */
export type IteratorProgram = {
  readonly blocks: readonly Block[];
  readonly entry: number;
  readonly inputs: ReadonlyArray<{ readonly name: string; readonly type: StreamType; readonly reg: Reg }>;
  readonly outputType: StreamType;
};

export type CompileOptions = {
  /** Resolve eliminations of visible introductions at compile time. Default true. */
  fusion?: boolean;
  trace?: TraceLog;
};

// ─────────────────────────────────────────────────────────────────
// VM State
// ─────────────────────────────────────────────────────────────────

/** Output a thread is in the middle of forwarding. */
export type PendingOutput =
  | { readonly kind: "copy"; readonly seg: Segment }
  | { readonly kind: "replay"; readonly tokens: BufferValue; index: number };

/**
 * One running block. Spawned threads start with a snapshot of their
 * parent's registers.
 */
export type VMThread = {
  readonly block: Block;
  pc: number;
  readonly regs: Map<Reg, Segment>;
  pending: PendingOutput | undefined;
};

export type VMState = {
  readonly program: IteratorProgram;
  readonly sources: InputSource[];
  readonly main: VMThread;
  readonly budget: StepBudget;
  readonly output: Token[];
  status: "running" | "completed" | "error";
  error?: string;
  readonly log: TraceLog;
};

export type VMConfig = {
  /** Maximum instructions plus forwarded tokens. */
  maxSteps: number;
  trace?: TraceLog;
};

// ─────────────────────────────────────────────────────────────────
// Differential Testing
// ─────────────────────────────────────────────────────────────────

/**
 * Both evaluators on the same inputs. Outputs match when both produced the
 * same tokens, or both failed with the same diagnostic code. A step limit
 * hit by either side leaves the run unjudged.
 */
export type DifferentialReport = {
  outputsMatch: boolean;
  interpOutput: Outcome<Token[]>;
  compiledOutput: Outcome<Token[]>;
  /** Index of the first differing token, -1 when none. */
  firstMismatch: number;
  mismatches: string[];
  /** One evaluator hit its step limit; nothing was compared. */
  exhausted: boolean;
  passed: boolean;
};

export type DifferentialCase = {
  name: string;
  inputs: Token[][];
};
