// src/core/compiler/index.ts
// Fusion compiler - Module exports

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type {
  // Instructions
  Reg,
  RegMove,
  BufferCode,
  Instr,
  Block,
  IteratorProgram,
  CompileOptions,
  // VM
  PendingOutput,
  VMThread,
  VMState,
  VMConfig,
  // Testing
  DifferentialReport,
  DifferentialCase,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────────

export { compile, countInstructions, disassemble, disassembleBlock } from "./bytecode";

// ─────────────────────────────────────────────────────────────────
// VM
// ─────────────────────────────────────────────────────────────────

export { defaultVMConfig, createVMState, step, run, getResult, openProgram, runProgram } from "./vm";

// ─────────────────────────────────────────────────────────────────
// Differential Testing
// ─────────────────────────────────────────────────────────────────

export type { RandomTokenOptions, DifferentialOptions } from "./differential";
export {
  mulberry32,
  randomTokens,
  randomInputs,
  differentialRun,
  runDifferentialSuite,
} from "./differential";
