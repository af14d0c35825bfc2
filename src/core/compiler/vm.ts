// src/core/compiler/vm.ts
// Segment-register VM: runs a compiled program one output token at a time

import { InvariantError } from "../errors";
import type { Token } from "../tokens";
import { noTrace } from "../trace";
import {
  DEFAULT_MAX_STEPS,
  ProducedSource,
  Segment,
  StepBudget,
  applyBufferOp,
  openInputs,
  scalarBuffer,
  type BufferValue,
} from "../eval";
import type { Block, BufferCode, IteratorProgram, Reg, VMConfig, VMState, VMThread } from "./types";

// ─────────────────────────────────────────────────────────────────
// VM Configuration
// ─────────────────────────────────────────────────────────────────

export const defaultVMConfig: VMConfig = {
  maxSteps: DEFAULT_MAX_STEPS,
};

// ─────────────────────────────────────────────────────────────────
// VM State Management
// ─────────────────────────────────────────────────────────────────

function createThread(block: Block, regs: Map<Reg, Segment>): VMThread {
  return { block, pc: 0, regs, pending: undefined };
}

function blockAt(program: IteratorProgram, id: number): Block {
  const block = program.blocks[id];
  if (!block) throw new InvariantError(`no block ${id}`);
  return block;
}

/**
 * Open the inputs and set up the main thread with one register per input.
 */
export function createVMState(
  program: IteratorProgram,
  inputs: ReadonlyArray<readonly Token[]>,
  config: VMConfig = defaultVMConfig
): VMState {
  const sources = openInputs(
    program.inputs.map((i) => i.name),
    program.inputs.map((i) => i.type),
    inputs
  );
  const regs = new Map<Reg, Segment>();
  program.inputs.forEach((decl, i) => regs.set(decl.reg, new Segment(sources[i], decl.type)));

  return {
    program,
    sources,
    main: createThread(blockAt(program, program.entry), regs),
    budget: new StepBudget(config.maxSteps),
    output: [],
    status: "running",
    log: config.trace ?? noTrace,
  };
}

function reg(thread: VMThread, r: Reg): Segment {
  const seg = thread.regs.get(r);
  if (!seg) throw new InvariantError(`register r${r} is empty in block ${thread.block.label}`, [r]);
  return seg;
}

function evalBuffer(thread: VMThread, code: BufferCode): BufferValue {
  switch (code.kind) {
    case "wait":
      return reg(thread, code.src).drain();
    case "const":
      return scalarBuffer(code.value);
    case "op":
      return applyBufferOp(code.op, evalBuffer(thread, code.left), evalBuffer(thread, code.right));
  }
}

// ─────────────────────────────────────────────────────────────────
// Execution
// ─────────────────────────────────────────────────────────────────

/**
 * Run `thread` until it outputs a token. Undefined once it has halted.
 */
function advance(state: VMState, thread: VMThread): Token | undefined {
  for (;;) {
    const pending = thread.pending;
    if (pending?.kind === "copy") {
      const tok = pending.seg.next();
      if (tok) {
        state.budget.tick();
        return tok;
      }
      thread.pending = undefined;
      continue;
    }
    if (pending?.kind === "replay") {
      const tok = pending.tokens[pending.index];
      if (tok) {
        pending.index++;
        return tok;
      }
      thread.pending = undefined;
      continue;
    }

    const instr = thread.block.code[thread.pc];
    if (!instr) throw new InvariantError(`block ${thread.block.label} ran past its end`);
    state.budget.tick();

    switch (instr.op) {
      case "EMIT":
        thread.pc++;
        return instr.token;

      case "COPY":
        thread.pending = { kind: "copy", seg: reg(thread, instr.src) };
        thread.pc++;
        break;

      case "SPLIT": {
        const [left, right] = reg(thread, instr.src).split();
        thread.regs.set(instr.left, left);
        thread.regs.set(instr.right, right);
        thread.pc++;
        break;
      }

      case "ALIAS": {
        const left = reg(thread, instr.left);
        const right = reg(thread, instr.right);
        right.follow(left);
        thread.regs.set(instr.toLeft, left);
        thread.regs.set(instr.toRight, right);
        thread.pc++;
        break;
      }

      case "SUM": {
        const { side, payload } = reg(thread, instr.src).openSum();
        if (side === "left") {
          thread.regs.set(instr.left, payload);
          thread.pc++;
        } else {
          thread.regs.set(instr.right, payload);
          thread.pc = instr.onRight;
        }
        break;
      }

      case "STAR": {
        const opened = reg(thread, instr.src).openStar();
        if (opened) {
          thread.regs.set(instr.head, opened.head);
          thread.regs.set(instr.tail, opened.tail);
          thread.pc++;
        } else {
          thread.pc = instr.onDone;
        }
        break;
      }

      case "BOOL":
        thread.pc = reg(thread, instr.src).openBool() ? thread.pc + 1 : instr.onFalse;
        break;

      case "JUMP":
        thread.pc = instr.target;
        break;

      case "SPAWN": {
        const block = blockAt(state.program, instr.block);
        const child = createThread(block, new Map(thread.regs));
        const source = new ProducedSource(() => advance(state, child), block.label);
        thread.regs.set(instr.dst, new Segment(source, block.type));
        thread.pc++;
        break;
      }

      case "REBIND": {
        const segs = instr.moves.map((m) => reg(thread, m.from));
        instr.moves.forEach((m, i) => thread.regs.set(m.to, segs[i]));
        thread.pc++;
        break;
      }

      case "RELEASE":
        thread.pending = { kind: "replay", tokens: evalBuffer(thread, instr.buffer), index: 0 };
        thread.pc++;
        break;

      case "HALT":
        return undefined;
    }
  }
}

/**
 * Produce the next output token. When the program halts, every input is
 * read to its end and checked for trailing tokens.
 */
export function step(state: VMState): Token | undefined {
  if (state.status !== "running") return undefined;
  try {
    const tok = advance(state, state.main);
    if (tok) {
      state.output.push(tok);
      return tok;
    }
    for (const src of state.sources) src.finish();
    state.status = "completed";
    state.log("vm.finish", { tokens: state.output.length, steps: state.budget.steps });
    return undefined;
  } catch (e) {
    state.status = "error";
    state.error = e instanceof Error ? e.message : String(e);
    throw e;
  }
}

/**
 * Run VM until completion.
 */
export function run(state: VMState): VMState {
  while (step(state) !== undefined) {
    // output is collected by step
  }
  return state;
}

export function getResult(state: VMState): Token[] {
  if (state.status !== "completed") {
    throw new InvariantError(`VM result requested while ${state.status}`);
  }
  return state.output;
}

/**
 * Lazily run a program: input is pulled only as output tokens are taken.
 */
export function* openProgram(
  program: IteratorProgram,
  inputs: ReadonlyArray<readonly Token[]>,
  config: VMConfig = defaultVMConfig
): Generator<Token, void, undefined> {
  const state = createVMState(program, inputs, config);
  state.log("vm.start", { blocks: program.blocks.length, inputs: inputs.map((ts) => ts.length) });
  for (let tok = step(state); tok !== undefined; tok = step(state)) {
    yield tok;
  }
}

export function runProgram(
  program: IteratorProgram,
  inputs: ReadonlyArray<readonly Token[]>,
  config: VMConfig = defaultVMConfig
): Token[] {
  const state = createVMState(program, inputs, config);
  state.log("vm.start", { blocks: program.blocks.length, inputs: inputs.map((ts) => ts.length) });
  return getResult(run(state));
}
