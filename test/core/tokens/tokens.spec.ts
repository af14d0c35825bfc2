// test/core/tokens/tokens.spec.ts
// Token protocol: shapes, JSON form and structured values

import { describe, it, expect } from "vitest";
import {
  DONE,
  MORE,
  TAG_LEFT,
  TAG_RIGHT,
  firstMismatch,
  parseTokens,
  showTokens,
  starOf,
  tokenEquals,
  tokensEqual,
  val,
} from "../../../src/core/tokens/token";
import { ShapeReader, checkTokens, valueFits } from "../../../src/core/tokens/shape";
import { decodeValue, encodeValue } from "../../../src/core/tokens/codec";
import { tBool, tCat, tEps, tNumber, tSingleton, tStar, tString, tSum } from "../../../src/core/types/types";
import { StreamRuntimeError } from "../../../src/core/errors";

describe("Tokens", () => {
  it("builds star token lists", () => {
    expect(starOf([1, 2])).toEqual([MORE, val(1), MORE, val(2), DONE]);
    expect(starOf([])).toEqual([DONE]);
  });

  it("compares values with Object.is", () => {
    expect(tokenEquals(val(NaN), val(NaN))).toBe(true);
    expect(tokenEquals(val(0), val(-0))).toBe(false);
    expect(tokenEquals(MORE, DONE)).toBe(false);
    expect(tokensEqual([TAG_LEFT, val("a")], [TAG_LEFT, val("a")])).toBe(true);
  });

  it("finds the first mismatch", () => {
    expect(firstMismatch([MORE, val(1)], [MORE, val(2)])).toBe(1);
    expect(firstMismatch([MORE], [MORE, DONE])).toBe(1);
    expect(firstMismatch([DONE], [DONE])).toBe(-1);
  });

  it("shows tokens", () => {
    expect(showTokens([MORE, val("a"), TAG_RIGHT, val(null), DONE])).toBe(
      '[MORE, VALUE("a"), TAG_RIGHT, VALUE(null), DONE]'
    );
  });

  it("parses serialized token lists", () => {
    expect(parseTokens([{ tag: "More" }, { tag: "Value", value: 3 }, { tag: "Done" }])).toEqual([
      MORE,
      val(3),
      DONE,
    ]);
    expect(() => parseTokens([{ tag: "Bogus" }])).toThrow();
    expect(() => parseTokens([{ tag: "Value", value: { nested: true } }])).toThrow();
  });
});

describe("ShapeReader", () => {
  it("accepts a well-formed sequence", () => {
    const type = tCat(tNumber, tStar(tSum(tString, tBool)));
    const tokens = [val(1), MORE, TAG_LEFT, val("a"), MORE, TAG_RIGHT, val(true), DONE];
    expect(checkTokens(type, tokens)).toBeUndefined();
  });

  it("reports what it expected at the first bad token", () => {
    expect(checkTokens(tStar(tNumber), [MORE, DONE])).toEqual({ index: 1, expected: "VALUE(number)" });
    expect(checkTokens(tSum(tNumber, tNumber), [MORE])).toEqual({ index: 0, expected: "TAG_LEFT or TAG_RIGHT" });
    expect(checkTokens(tNumber, [val(1), val(2)])).toEqual({ index: 1, expected: "end of stream" });
  });

  it("reports a short sequence at its end", () => {
    expect(checkTokens(tCat(tNumber, tNumber), [val(1)])).toEqual({ index: 1, expected: "VALUE(number)" });
    expect(checkTokens(tStar(tNumber), [])).toEqual({ index: 0, expected: "MORE or DONE" });
  });

  it("is complete at once for eps", () => {
    const reader = new ShapeReader(tCat(tEps, tEps));
    expect(reader.complete).toBe(true);
    expect(reader.expected()).toBe("end of stream");
  });

  it("tracks its position", () => {
    const reader = new ShapeReader(tStar(tNumber));
    expect(reader.accept(MORE)).toEqual({ ok: true });
    expect(reader.accept(val("x"))).toEqual({ ok: false, expected: "VALUE(number)" });
    expect(reader.accept(val(4))).toEqual({ ok: true });
    expect(reader.position).toBe(2);
    expect(reader.complete).toBe(false);
  });

  it("lets opaque kinds carry any scalar", () => {
    expect(valueFits("id", "x")).toBe(true);
    expect(valueFits("id", 7)).toBe(true);
    expect(valueFits("number", "7")).toBe(false);
    expect(checkTokens(tSingleton("id"), [val(true)])).toBeUndefined();
  });
});

describe("Value codec", () => {
  const type = tCat(tNumber, tStar(tSum(tString, tBool)));

  it("encodes structured values", () => {
    expect(encodeValue(type, [1, [{ left: "a" }, { right: true }]])).toEqual([
      val(1),
      MORE,
      TAG_LEFT,
      val("a"),
      MORE,
      TAG_RIGHT,
      val(true),
      DONE,
    ]);
    expect(encodeValue(tCat(tEps, tNumber), [null, 5])).toEqual([val(5)]);
  });

  it("decodes token lists", () => {
    expect(decodeValue(type, [val(2), MORE, TAG_RIGHT, val(false), DONE])).toEqual([2, [{ right: false }]]);
  });

  it("rejects values that do not fit", () => {
    expect(() => encodeValue(tNumber, "x")).toThrow('Value "x" does not fit number');
    expect(() => encodeValue(tStar(tNumber), 3)).toThrow("Value 3 does not fit number*");
  });

  it("raises runtime errors on bad token lists", () => {
    expect(() => decodeValue(tNumber, [val(1), val(2)], "n")).toThrow(
      "TrailingInput: Input n has 1 trailing token(s)"
    );
    expect(() => decodeValue(tCat(tNumber, tNumber), [val(1)], "p")).toThrow(
      "ShortInput: Input p ended early: expected VALUE(number)"
    );
    expect(() => decodeValue(tStar(tNumber), [val(1)])).toThrow(StreamRuntimeError);
  });
});
