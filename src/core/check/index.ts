// src/core/check/index.ts

export type { Sort, CheckOptions } from "./checker";
export { Checker, TypedGraph, check } from "./checker";
export { tryCheck } from "./outcome";
export type { OrderConflict } from "./order";
export { PartialOrder, UsageOrder } from "./order";
