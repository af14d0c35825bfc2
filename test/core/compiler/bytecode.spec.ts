// test/core/compiler/bytecode.spec.ts
// Fusion compiler: emitted code and static fusion

import { describe, it, expect } from "vitest";
import { GraphBuilder } from "../../../src/core/graph/builder";
import { compile, countInstructions, disassemble } from "../../../src/core/compiler/bytecode";
import { runProgram } from "../../../src/core/compiler/vm";
import { DONE, MORE, TAG_LEFT, TAG_RIGHT, val } from "../../../src/core/tokens/token";
import { tBool, tCat, tNumber, tStar, tString, tSum } from "../../../src/core/types/types";

function roundTrip() {
  const b = new GraphBuilder();
  const z = b.input("z", tCat(tString, tString));
  const [p, q] = b.catl(z);
  return b.build(b.catr(p, q));
}

function doubled() {
  const b = new GraphBuilder();
  const xs = b.input("xs", tStar(tNumber));
  return b.build(b.map(xs, (x) => b.emit(b.bufferOp("mul", b.wait(x), b.bufferConst(2)))));
}

/** `catl(catr(a, b))`: a split of a pair built in the same graph. */
function rebuiltPair() {
  const b = new GraphBuilder();
  const a = b.input("a", tString);
  const n = b.input("n", tNumber);
  const [p, q] = b.catl(b.catr(a, n));
  return b.build(b.catr(p, q));
}

function fusedCount(run: (trace: (msg: string, data?: unknown) => void) => void): unknown {
  let fused: unknown;
  run((msg, data) => {
    if (msg === "compile.done" && typeof data === "object" && data !== null && "fused" in data) {
      fused = data.fused;
    }
  });
  return fused;
}

describe("compile", () => {
  it("splits an input and copies both parts", () => {
    expect(disassemble(compile(roundTrip()))).toBe(
      [
        "; block 0 main : (string . string)",
        "     0: SPLIT r0 -> r2, r3",
        "     1: COPY r2",
        "     2: COPY r3",
        "     3: HALT",
      ].join("\n")
    );
  });

  it("compiles a case into a tag test with both branches inline", () => {
    const b = new GraphBuilder();
    const x = b.input("x", tSum(tNumber, tNumber));
    const typed = b.build(
      b.case(
        x,
        (n) => b.catr(b.singleton("L"), n),
        (m) => b.catr(b.singleton("R"), m)
      )
    );
    expect(disassemble(compile(typed))).toBe(
      [
        "; block 0 main : (string . number)",
        "     0: SUM r0 -> r1 | r4 else 4",
        '     1: EMIT VALUE("L")',
        "     2: COPY r1",
        "     3: JUMP 6",
        '     4: EMIT VALUE("R")',
        "     5: COPY r4",
        "     6: HALT",
      ].join("\n")
    );
  });

  it("compiles a loop into a rebind and a backward jump", () => {
    const program = compile(doubled());
    expect(disassemble(program)).toBe(
      [
        "; block 0 main : number*",
        "     0: REBIND r0 -> r1",
        "     1: STAR r1 -> r3, r4 done 7",
        "     2: EMIT MORE",
        "     3: RELEASE mul(wait(r3), 2)",
        "     4: REBIND r4 -> r1",
        "     5: JUMP 1",
        "     6: JUMP 8",
        "     7: EMIT DONE",
        "     8: HALT",
      ].join("\n")
    );
    expect(countInstructions(program)).toBe(9);
    expect(program.outputType).toEqual(tStar(tNumber));
    expect(program.inputs).toEqual([{ name: "xs", type: tStar(tNumber), reg: 0 }]);
  });
});

describe("fusion", () => {
  it("aliases the parts of a split pair", () => {
    const typed = rebuiltPair();
    const fused = fusedCount((trace) => {
      expect(disassemble(compile(typed, { trace }))).toBe(
        [
          "; block 0 main : (string . number)",
          "     0: ALIAS r0, r1 -> r4, r5",
          "     1: COPY r4",
          "     2: COPY r5",
          "     3: HALT",
        ].join("\n")
      );
    });
    expect(fused).toBe(1);
  });

  it("evaluates an unread computed left part before the right one", () => {
    const b = new GraphBuilder();
    const x = b.input("x", tNumber);
    const y = b.input("y", tNumber);
    const [, q] = b.catl(b.catr(b.emit(b.wait(x)), y));
    const typed = b.build(q);
    const program = compile(typed);
    expect(disassemble(program)).toBe(
      [
        "; block 0 main : number",
        "     0: SPAWN b1 -> r3",
        "     1: ALIAS r3, r1 -> r6, r7",
        "     2: COPY r7",
        "     3: HALT",
        "",
        "; block 1 emit#3 : number",
        "     0: RELEASE wait(r0)",
        "     1: HALT",
      ].join("\n")
    );
    expect(runProgram(program, [[val(9)], [val(4)]])).toEqual([val(4)]);
    // x is read, and found short, before y's bad token is seen
    expect(() => runProgram(program, [[], [val("bad")]])).toThrow(
      "ShortInput: Input x ended early: expected VALUE(number)"
    );
  });

  it("spawns the pair when fusion is off", () => {
    const typed = rebuiltPair();
    const program = compile(typed, { fusion: false });
    expect(disassemble(program)).toBe(
      [
        "; block 0 main : (string . number)",
        "     0: SPAWN b1 -> r2",
        "     1: SPLIT r2 -> r4, r5",
        "     2: COPY r4",
        "     3: COPY r5",
        "     4: HALT",
        "",
        "; block 1 catr#2 : (string . number)",
        "     0: COPY r0",
        "     1: COPY r1",
        "     2: HALT",
      ].join("\n")
    );
    const inputs = [[val("a")], [val(7)]];
    expect(runProgram(program, inputs)).toEqual([val("a"), val(7)]);
    expect(runProgram(compile(typed), inputs)).toEqual([val("a"), val(7)]);
  });

  it("selects the branch of a case on an injection", () => {
    const b = new GraphBuilder();
    const x = b.input("x", tNumber);
    const typed = b.build(b.case(b.inl(x, tString), (n) => n, () => b.singleton(0)));

    expect(disassemble(compile(typed))).toBe(
      ["; block 0 main : number", "     0: COPY r0", "     1: HALT"].join("\n")
    );
    const unfused = compile(typed, { fusion: false });
    expect(disassemble(unfused)).toBe(
      [
        "; block 0 main : number",
        "     0: SPAWN b1 -> r1",
        "     1: SUM r1 -> r2 | r3 else 4",
        "     2: COPY r2",
        "     3: JUMP 5",
        "     4: EMIT VALUE(0)",
        "     5: HALT",
        "",
        "; block 1 inj#1 : (number + string)",
        "     0: EMIT TAG_LEFT",
        "     1: COPY r0",
        "     2: HALT",
      ].join("\n")
    );
    expect(runProgram(unfused, [[val(5)]])).toEqual([val(5)]);
  });

  it("selects the branch of a condition on a constant", () => {
    const b = new GraphBuilder();
    const typed = b.build(b.cond(b.singleton(true), () => b.singleton("yes"), () => b.singleton("no")));
    expect(disassemble(compile(typed))).toBe(
      ["; block 0 main : string", '     0: EMIT VALUE("yes")', "     1: HALT"].join("\n")
    );
    expect(runProgram(compile(typed, { fusion: false }), [])).toEqual([val("yes")]);
  });

  it("selects the branch of a star case on a cons", () => {
    const b = new GraphBuilder();
    const x = b.input("x", tNumber);
    const typed = b.build(
      b.starcase(
        b.cons(x, b.nil()),
        () => b.singleton(0),
        (h) => h
      )
    );
    const fused = fusedCount((trace) => {
      expect(disassemble(compile(typed, { trace }))).toBe(
        [
          "; block 0 main : number",
          "     0: SPAWN b1 -> r1",
          "     1: ALIAS r0, r1 -> r4, r5",
          "     2: COPY r4",
          "     3: HALT",
          "",
          "; block 1 nil#1 : number*",
          "     0: EMIT DONE",
          "     1: HALT",
        ].join("\n")
      );
    });
    expect(fused).toBe(1);
    expect(runProgram(compile(typed), [[val(5)]])).toEqual([val(5)]);
  });

  it("keeps boolean tests on computed conditions", () => {
    const b = new GraphBuilder();
    const x = b.input("x", tNumber);
    const y = b.input("y", tNumber);
    const less = b.emit(b.bufferOp("lt", b.wait(x), b.wait(y)));
    const typed = b.build(b.cond(less, () => b.inl(b.singleton(1), tBool), () => b.inr(b.singleton(false), tNumber)));
    const program = compile(typed);
    expect(program.blocks).toHaveLength(2);
    expect(runProgram(program, [[val(1)], [val(2)]])).toEqual([TAG_LEFT, val(1)]);
    expect(runProgram(program, [[val(2)], [val(1)]])).toEqual([TAG_RIGHT, val(false)]);
  });
});

describe("compiled combinators", () => {
  it("runs concat and concatMap", () => {
    const b = new GraphBuilder();
    const xs = b.input("xs", tStar(tNumber));
    const ys = b.input("ys", tStar(tNumber));
    const program = compile(b.build(b.concat(xs, ys)));
    expect(runProgram(program, [[MORE, val(1), DONE], [MORE, val(2), DONE]])).toEqual([
      MORE,
      val(1),
      MORE,
      val(2),
      DONE,
    ]);

    const c = new GraphBuilder();
    const zs = c.input("zs", tStar(tNumber));
    const pairs = compile(c.build(c.concatMap(zs, (z) => c.cons(z, c.cons(c.singleton(0), c.nil())))));
    expect(runProgram(pairs, [[MORE, val(1), MORE, val(2), DONE]])).toEqual([
      MORE,
      val(1),
      MORE,
      val(0),
      MORE,
      val(2),
      MORE,
      val(0),
      DONE,
    ]);
  });
});
