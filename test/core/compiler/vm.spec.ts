// test/core/compiler/vm.spec.ts
// Segment-register VM: stepping, lazy output and runtime errors

import { describe, it, expect } from "vitest";
import { GraphBuilder } from "../../../src/core/graph/builder";
import { compile } from "../../../src/core/compiler/bytecode";
import {
  createVMState,
  defaultVMConfig,
  getResult,
  openProgram,
  run,
  runProgram,
  step,
} from "../../../src/core/compiler/vm";
import { InvariantError, StreamRuntimeError } from "../../../src/core/errors";
import { DEFAULT_MAX_STEPS } from "../../../src/core/eval/source";
import { DONE, MORE, val } from "../../../src/core/tokens/token";
import { tCat, tNumber, tStar, tString } from "../../../src/core/types/types";

function roundTrip() {
  const b = new GraphBuilder();
  const z = b.input("z", tCat(tString, tString));
  const [p, q] = b.catl(z);
  return compile(b.build(b.catr(p, q)));
}

function doubled() {
  const b = new GraphBuilder();
  const xs = b.input("xs", tStar(tNumber));
  return compile(b.build(b.map(xs, (x) => b.emit(b.bufferOp("mul", b.wait(x), b.bufferConst(2))))));
}

describe("VM", () => {
  it("uses the default step limit", () => {
    expect(defaultVMConfig.maxSteps).toBe(DEFAULT_MAX_STEPS);
  });

  it("steps one output token at a time", () => {
    const state = createVMState(roundTrip(), [[val("hello"), val("world")]]);
    expect(state.status).toBe("running");
    expect(step(state)).toEqual(val("hello"));
    expect(state.output).toEqual([val("hello")]);
    expect(step(state)).toEqual(val("world"));
    expect(step(state)).toBeUndefined();
    expect(state.status).toBe("completed");
    expect(step(state)).toBeUndefined();
    expect(getResult(state)).toEqual([val("hello"), val("world")]);
  });

  it("refuses a result before completion", () => {
    const state = createVMState(roundTrip(), [[val("a"), val("b")]]);
    expect(() => getResult(state)).toThrow(InvariantError);
    expect(getResult(run(state))).toEqual([val("a"), val("b")]);
  });

  it("runs a loop", () => {
    expect(runProgram(doubled(), [[MORE, val(1), MORE, val(2), DONE]])).toEqual([MORE, val(2), MORE, val(4), DONE]);
    expect(runProgram(doubled(), [[DONE]])).toEqual([DONE]);
  });

  it("pulls input only as output is taken", () => {
    const inputs = [[MORE, val(1), MORE, val("x"), DONE]];
    const tokens = openProgram(doubled(), inputs);
    expect(tokens.next().value).toEqual(MORE);
    expect(tokens.next().value).toEqual(val(2));
    expect(tokens.next().value).toEqual(MORE);
    expect(() => tokens.next()).toThrow('UnexpectedToken: Input xs token 3: expected VALUE(number), got VALUE("x")');

    expect(() => runProgram(doubled(), inputs)).toThrow(StreamRuntimeError);
  });

  it("records the error on the state", () => {
    const state = createVMState(roundTrip(), [[val("a")]]);
    expect(() => run(state)).toThrow("ShortInput: Input z ended early: expected VALUE(string)");
    expect(state.status).toBe("error");
    expect(state.error).toBe("ShortInput: Input z ended early: expected VALUE(string)");
  });

  it("rejects trailing input after halting", () => {
    expect(() => runProgram(roundTrip(), [[val("a"), val("b"), val("c")]])).toThrow(
      "TrailingInput: Input z has 1 trailing token(s)"
    );
  });

  it("checks the number of inputs", () => {
    expect(() => createVMState(roundTrip(), [[], []])).toThrow("InputArity: Expected 1 input stream(s), got 2");
  });

  it("counts instructions and copied tokens against the step limit", () => {
    const program = roundTrip();
    expect(() => runProgram(program, [[val("a"), val("b")]], { maxSteps: 1 })).toThrow(
      "StepLimit: Step limit of 1 exceeded"
    );
    // SPLIT, COPY, "a", COPY, "b", HALT
    expect(runProgram(program, [[val("a"), val("b")]], { maxSteps: 6 })).toEqual([val("a"), val("b")]);
    expect(() => runProgram(program, [[val("a"), val("b")]], { maxSteps: 5 })).toThrow(StreamRuntimeError);
  });

  it("writes trace lines when asked", () => {
    const lines: string[] = [];
    runProgram(roundTrip(), [[val("a"), val("b")]], { maxSteps: 100, trace: (msg) => lines.push(msg) });
    expect(lines).toEqual(["vm.start", "vm.finish"]);
  });
});
