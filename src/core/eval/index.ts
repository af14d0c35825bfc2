// src/core/eval/index.ts

export type { TokenSource } from "./source";
export { InputSource, ProducedSource, StepBudget, DEFAULT_MAX_STEPS, openInputs } from "./source";
export type { SumView, StarView } from "./segment";
export { Segment } from "./segment";
export type { BufferValue } from "./buffer";
export { applyBufferOp, scalarBuffer } from "./buffer";
export type { Step, InterpretOptions } from "./interpreter";
export { interpret } from "./interpreter";
