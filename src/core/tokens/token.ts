// src/core/tokens/token.ts
// Runtime event protocol: the flat token form of every stream

import { z } from "zod";
import type { Scalar } from "../types";

export type Token =
  | { readonly tag: "Value"; readonly value: Scalar }
  | { readonly tag: "TagLeft" }
  | { readonly tag: "TagRight" }
  | { readonly tag: "More" }
  | { readonly tag: "Done" };

export const TAG_LEFT: Token = { tag: "TagLeft" };
export const TAG_RIGHT: Token = { tag: "TagRight" };
export const MORE: Token = { tag: "More" };
export const DONE: Token = { tag: "Done" };

export function val(value: Scalar): Token {
  return { tag: "Value", value };
}

/** Token list for a Star of single values: `MORE v1 MORE v2 ... DONE`. */
export function starOf(values: Scalar[]): Token[] {
  const out: Token[] = [];
  for (const v of values) {
    out.push(MORE, val(v));
  }
  out.push(DONE);
  return out;
}

export function tokenEquals(a: Token, b: Token): boolean {
  if (a.tag === "Value") {
    return b.tag === "Value" && Object.is(a.value, b.value);
  }
  return a.tag === b.tag;
}

export function tokensEqual(a: readonly Token[], b: readonly Token[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!tokenEquals(a[i], b[i])) return false;
  }
  return true;
}

/** Index of the first differing token, or -1 when the lists are equal. */
export function firstMismatch(a: readonly Token[], b: readonly Token[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (!tokenEquals(a[i], b[i])) return i;
  }
  return a.length === b.length ? -1 : n;
}

export function showToken(t: Token): string {
  switch (t.tag) {
    case "Value":
      return `VALUE(${JSON.stringify(t.value)})`;
    case "TagLeft":
      return "TAG_LEFT";
    case "TagRight":
      return "TAG_RIGHT";
    case "More":
      return "MORE";
    case "Done":
      return "DONE";
  }
}

export function showTokens(ts: readonly Token[]): string {
  return `[${ts.map(showToken).join(", ")}]`;
}

// ─────────────────────────────────────────────────────────────────
// JSON Form
// ─────────────────────────────────────────────────────────────────

export const tokenSchema = z.discriminatedUnion("tag", [
  z.object({ tag: z.literal("Value"), value: z.union([z.string(), z.number(), z.boolean(), z.null()]) }),
  z.object({ tag: z.literal("TagLeft") }),
  z.object({ tag: z.literal("TagRight") }),
  z.object({ tag: z.literal("More") }),
  z.object({ tag: z.literal("Done") }),
]);

export const tokenListSchema = z.array(tokenSchema);

/**
 * Parse a serialized token list. Throws a ZodError on malformed input.
 */
export function parseTokens(json: unknown): Token[] {
  return tokenListSchema.parse(json);
}
