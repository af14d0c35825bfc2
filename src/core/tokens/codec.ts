// src/core/tokens/codec.ts
// Conversion between structured JS values and token sequences

import { showType, type Scalar, type StreamType } from "../types";
import { StreamRuntimeError } from "../errors";
import { DONE, MORE, TAG_LEFT, TAG_RIGHT, showToken, val, type Token } from "./token";
import { valueFits } from "./shape";

/**
 * Structured form of a stream value. Cat is a `[left, right]` pair, Sum an
 * object with a `left` or `right` key, Star an array and Eps `null`.
 */
export type StreamValue =
  | Scalar
  | StreamValue[]
  | { left: StreamValue }
  | { right: StreamValue };

function isScalar(v: StreamValue): v is Scalar {
  return v === null || typeof v !== "object";
}

function misfit(type: StreamType, v: StreamValue): Error {
  return new Error(`Value ${JSON.stringify(v)} does not fit ${showType(type)}`);
}

export function encodeValue(type: StreamType, v: StreamValue): Token[] {
  const out: Token[] = [];
  encodeInto(type, v, out);
  return out;
}

function encodeInto(type: StreamType, v: StreamValue, out: Token[]): void {
  switch (type.tag) {
    case "Singleton":
      if (!isScalar(v) || !valueFits(type.elem, v)) throw misfit(type, v);
      out.push(val(v));
      return;
    case "Eps":
    case "Meta":
      if (v !== null) throw misfit(type, v);
      return;
    case "Cat":
      if (!Array.isArray(v) || v.length !== 2) throw misfit(type, v);
      encodeInto(type.left, v[0], out);
      encodeInto(type.right, v[1], out);
      return;
    case "Sum":
      if (isScalar(v) || Array.isArray(v)) throw misfit(type, v);
      if ("left" in v) {
        out.push(TAG_LEFT);
        encodeInto(type.left, v.left, out);
      } else {
        out.push(TAG_RIGHT);
        encodeInto(type.right, v.right, out);
      }
      return;
    case "Star":
      if (!Array.isArray(v)) throw misfit(type, v);
      for (const item of v) {
        out.push(MORE);
        encodeInto(type.elem, item, out);
      }
      out.push(DONE);
      return;
  }
}

/**
 * Decode a complete token list. Raises the same runtime errors an input
 * stream would, naming the stream `label`.
 */
export function decodeValue(type: StreamType, tokens: readonly Token[], label = "value"): StreamValue {
  let pos = 0;

  const next = (expected: string): Token => {
    const tok = tokens[pos];
    if (!tok) throw new StreamRuntimeError("ShortInput", { input: label, expected });
    pos++;
    return tok;
  };
  const unexpected = (expected: string, tok: Token): StreamRuntimeError =>
    new StreamRuntimeError("UnexpectedToken", {
      input: label,
      index: pos - 1,
      expected,
      actual: showToken(tok),
    });

  const go = (t: StreamType): StreamValue => {
    switch (t.tag) {
      case "Singleton": {
        const tok = next(`VALUE(${t.elem})`);
        if (tok.tag !== "Value" || !valueFits(t.elem, tok.value)) throw unexpected(`VALUE(${t.elem})`, tok);
        return tok.value;
      }
      case "Eps":
      case "Meta":
        return null;
      case "Cat":
        return [go(t.left), go(t.right)];
      case "Sum": {
        const tok = next("TAG_LEFT or TAG_RIGHT");
        if (tok.tag === "TagLeft") return { left: go(t.left) };
        if (tok.tag === "TagRight") return { right: go(t.right) };
        throw unexpected("TAG_LEFT or TAG_RIGHT", tok);
      }
      case "Star": {
        const items: StreamValue[] = [];
        for (;;) {
          const tok = next("MORE or DONE");
          if (tok.tag === "Done") return items;
          if (tok.tag !== "More") throw unexpected("MORE or DONE", tok);
          items.push(go(t.elem));
        }
      }
    }
  };

  const result = go(type);
  if (pos < tokens.length) {
    throw new StreamRuntimeError("TrailingInput", { input: label, count: tokens.length - pos });
  }
  return result;
}
