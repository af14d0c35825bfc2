// test/core/types/types.spec.ts
// Type formers, structural operations and unification

import { describe, it, expect } from "vitest";
import {
  kindOf,
  nullable,
  parseType,
  showType,
  tBool,
  tCat,
  tCats,
  tEps,
  tMeta,
  tNumber,
  tSingleton,
  tStar,
  tString,
  tSum,
  typeEquals,
  wellFormed,
} from "../../../src/core/types/types";
import { Substitution } from "../../../src/core/types/unify";

describe("Stream types", () => {
  it("renders types compactly", () => {
    expect(showType(tCat(tNumber, tStar(tSum(tString, tEps))))).toBe("(number . (string + eps)*)");
    expect(showType(tSingleton("id"))).toBe("id");
    expect(showType(tMeta(3))).toBe("?3");
  });

  it("nests tCats to the right", () => {
    expect(tCats([tNumber, tString, tBool])).toEqual(tCat(tNumber, tCat(tString, tBool)));
    expect(tCats([tNumber])).toEqual(tNumber);
    expect(tCats([])).toEqual(tEps);
  });

  it("compares structurally", () => {
    expect(typeEquals(tStar(tCat(tNumber, tString)), tStar(tCat(tNumber, tString)))).toBe(true);
    expect(typeEquals(tSum(tNumber, tString), tSum(tString, tNumber))).toBe(false);
    expect(typeEquals(tCat(tNumber, tEps), tNumber)).toBe(false);
  });

  it("rejects malformed types", () => {
    expect(wellFormed(tCat(tNumber, tStar(tString)))).toBe(true);
    expect(wellFormed(tSingleton(""))).toBe(false);
    expect(wellFormed(tSum(tNumber, tMeta(0)))).toBe(false);
  });

  it("knows which types admit no tokens", () => {
    expect(nullable(tEps)).toBe(true);
    expect(nullable(tCat(tEps, tEps))).toBe(true);
    expect(nullable(tStar(tNumber))).toBe(false);
    expect(nullable(tCat(tEps, tNumber))).toBe(false);
  });

  it("names the kind of a scalar", () => {
    expect(kindOf(1)).toBe("number");
    expect(kindOf("a")).toBe("string");
    expect(kindOf(false)).toBe("boolean");
    expect(kindOf(null)).toBe("null");
  });

  it("parses the JSON form", () => {
    const t = parseType({
      tag: "Cat",
      left: { tag: "Singleton", elem: "number" },
      right: { tag: "Star", elem: { tag: "Eps" } },
    });
    expect(t).toEqual(tCat(tNumber, tStar(tEps)));
    expect(() => parseType({ tag: "Singleton", elem: "" })).toThrow();
    expect(() => parseType({ tag: "Meta", id: 0 })).toThrow();
  });
});

describe("Substitution", () => {
  it("solves variables by unification", () => {
    const s = new Substitution();
    const m = s.fresh();
    expect(s.unify(tCat(m, tNumber), tCat(tString, tNumber))).toBe(true);
    expect(s.zonk(m)).toEqual(tString);
    expect(s.size).toBe(1);
  });

  it("follows chains of bindings", () => {
    const s = new Substitution();
    const a = s.fresh();
    const b = s.fresh();
    expect(s.unify(a, b)).toBe(true);
    expect(s.unify(b, tStar(tBool))).toBe(true);
    expect(s.zonk(tSum(a, tNumber))).toEqual(tSum(tStar(tBool), tNumber));
  });

  it("fails on mismatched formers", () => {
    const s = new Substitution();
    expect(s.unify(tSum(tNumber, tNumber), tCat(tNumber, tNumber))).toBe(false);
    expect(s.unify(tNumber, tString)).toBe(false);
  });

  it("refuses cyclic solutions", () => {
    const s = new Substitution();
    const m = s.fresh();
    expect(s.unify(m, tStar(m))).toBe(false);
  });

  it("defaults unsolved variables to eps", () => {
    const s = new Substitution();
    const m = s.fresh();
    expect(s.zonk(tStar(m))).toEqual(tStar(tEps));
    expect(s.zonk(m, tNumber)).toEqual(tNumber);
    expect(s.show(tStar(m))).toEqual(tStar(m));
  });
});
