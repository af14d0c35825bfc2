// src/core/types/types.ts
// Ordered stream types: five formers plus the checker's unification variable

import { z } from "zod";

// ─────────────────────────────────────────────────────────────────
// Type Formers
// ─────────────────────────────────────────────────────────────────

/** Name of the kind of value a Singleton carries, e.g. "number". */
export type ElemKind = string;

export type Scalar = string | number | boolean | null;

export type StreamType =
  | { readonly tag: "Singleton"; readonly elem: ElemKind }
  | { readonly tag: "Cat"; readonly left: StreamType; readonly right: StreamType }
  | { readonly tag: "Sum"; readonly left: StreamType; readonly right: StreamType }
  | { readonly tag: "Star"; readonly elem: StreamType }
  | { readonly tag: "Eps" }
  /** Unification variable. Only the checker creates these. */
  | { readonly tag: "Meta"; readonly id: number };

export type SingletonType = Extract<StreamType, { tag: "Singleton" }>;

export const tEps: StreamType = { tag: "Eps" };

export function tSingleton(elem: ElemKind): StreamType {
  return { tag: "Singleton", elem };
}

export function tCat(left: StreamType, right: StreamType): StreamType {
  return { tag: "Cat", left, right };
}

export function tSum(left: StreamType, right: StreamType): StreamType {
  return { tag: "Sum", left, right };
}

export function tStar(elem: StreamType): StreamType {
  return { tag: "Star", elem };
}

export function tMeta(id: number): StreamType {
  return { tag: "Meta", id };
}

export const tNumber = tSingleton("number");
export const tString = tSingleton("string");
export const tBool = tSingleton("boolean");

/**
 * Right-nested concatenation of a list of types; `tCats([])` is Eps.
 */
export function tCats(types: StreamType[]): StreamType {
  if (types.length === 0) return tEps;
  let acc = types[types.length - 1];
  for (let i = types.length - 2; i >= 0; i--) {
    acc = tCat(types[i], acc);
  }
  return acc;
}

/** Element kind a scalar carries when none is named. */
export function kindOf(value: Scalar): ElemKind {
  if (value === null) return "null";
  return typeof value;
}

// ─────────────────────────────────────────────────────────────────
// Structural Operations
// ─────────────────────────────────────────────────────────────────

export function typeEquals(a: StreamType, b: StreamType): boolean {
  if (a === b) return true;
  switch (a.tag) {
    case "Singleton":
      return b.tag === "Singleton" && a.elem === b.elem;
    case "Cat":
      return b.tag === "Cat" && typeEquals(a.left, b.left) && typeEquals(a.right, b.right);
    case "Sum":
      return b.tag === "Sum" && typeEquals(a.left, b.left) && typeEquals(a.right, b.right);
    case "Star":
      return b.tag === "Star" && typeEquals(a.elem, b.elem);
    case "Eps":
      return b.tag === "Eps";
    case "Meta":
      return b.tag === "Meta" && a.id === b.id;
  }
}

/**
 * A declared type is well formed when every Singleton names a kind and no
 * unification variable remains.
 */
export function wellFormed(t: StreamType): boolean {
  switch (t.tag) {
    case "Singleton":
      return typeof t.elem === "string" && t.elem.length > 0;
    case "Cat":
    case "Sum":
      return wellFormed(t.left) && wellFormed(t.right);
    case "Star":
      return wellFormed(t.elem);
    case "Eps":
      return true;
    case "Meta":
      return false;
  }
}

/** True when the type admits the empty token sequence. */
export function nullable(t: StreamType): boolean {
  switch (t.tag) {
    case "Eps":
      return true;
    case "Cat":
      return nullable(t.left) && nullable(t.right);
    default:
      return false;
  }
}

export function showType(t: StreamType): string {
  switch (t.tag) {
    case "Singleton":
      return t.elem;
    case "Cat":
      return `(${showType(t.left)} . ${showType(t.right)})`;
    case "Sum":
      return `(${showType(t.left)} + ${showType(t.right)})`;
    case "Star":
      return `${showType(t.elem)}*`;
    case "Eps":
      return "eps";
    case "Meta":
      return `?${t.id}`;
  }
}

// ─────────────────────────────────────────────────────────────────
// JSON Form
// ─────────────────────────────────────────────────────────────────

export type TypeJson =
  | { tag: "Singleton"; elem: string }
  | { tag: "Cat"; left: TypeJson; right: TypeJson }
  | { tag: "Sum"; left: TypeJson; right: TypeJson }
  | { tag: "Star"; elem: TypeJson }
  | { tag: "Eps" };

export const typeSchema: z.ZodType<TypeJson> = z.lazy(() =>
  z.discriminatedUnion("tag", [
    z.object({ tag: z.literal("Singleton"), elem: z.string().min(1) }),
    z.object({ tag: z.literal("Cat"), left: typeSchema, right: typeSchema }),
    z.object({ tag: z.literal("Sum"), left: typeSchema, right: typeSchema }),
    z.object({ tag: z.literal("Star"), elem: typeSchema }),
    z.object({ tag: z.literal("Eps") }),
  ])
);

/**
 * Parse a type from its JSON form. Throws a ZodError on malformed input.
 */
export function parseType(json: unknown): StreamType {
  return typeSchema.parse(json);
}
