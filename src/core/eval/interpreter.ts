// src/core/eval/interpreter.ts
// Pull-based interpreter over a typed graph

import { InvariantError } from "../errors";
import { DONE, MORE, TAG_LEFT, TAG_RIGHT, val, type Token } from "../tokens";
import { noTrace, type TraceLog } from "../trace";
import { ROOT_SCOPE, labelOf, type NodeId, type NodeOf, type ScopeId } from "../graph/ir";
import type { TypedGraph } from "../check/checker";
import { Segment } from "./segment";
import { ProducedSource, StepBudget, openInputs } from "./source";
import { applyBufferOp, scalarBuffer, type BufferValue } from "./buffer";

// ─────────────────────────────────────────────────────────────────
// Producers
// ─────────────────────────────────────────────────────────────────

/**
 * One step of a node's output. `restart` travels up from a `recur` through
 * tail positions to the loop it names.
 */
export type Step =
  | { readonly tag: "emit"; readonly token: Token }
  | { readonly tag: "end" }
  | { readonly tag: "restart"; readonly loop: ScopeId; readonly args: readonly Segment[] };

interface Producer {
  next(): Step;
}

const END: Step = { tag: "end" };

function emitting(tokens: readonly Token[]): Producer {
  let i = 0;
  return {
    next: () => (i < tokens.length ? { tag: "emit", token: tokens[i++] } : END),
  };
}

function forward(seg: Segment): Producer {
  return {
    next: () => {
      const token = seg.next();
      return token ? { tag: "emit", token } : END;
    },
  };
}

/** Parts are created only when the previous one has ended. */
function sequence(parts: ReadonlyArray<() => Producer>): Producer {
  let index = 0;
  let current: Producer | undefined;
  return {
    next: () => {
      for (;;) {
        if (!current) {
          const make = parts[index++];
          if (!make) return END;
          current = make();
        }
        const step = current.next();
        if (step.tag !== "end") return step;
        current = undefined;
      }
    },
  };
}

function deferred(make: () => Producer): Producer {
  let inner: Producer | undefined;
  return {
    next: () => {
      inner ??= make();
      return inner.next();
    },
  };
}

// ─────────────────────────────────────────────────────────────────
// Environments
// ─────────────────────────────────────────────────────────────────

/** Bindings of one scope instance; every branch entry and loop iteration makes one. */
class Env {
  private readonly bound = new Map<NodeId, Segment>();
  private readonly splits = new Map<NodeId, [Segment, Segment]>();

  constructor(
    readonly scope: ScopeId,
    readonly parent: Env | undefined
  ) {}

  bind(id: NodeId, seg: Segment): void {
    this.bound.set(id, seg);
  }

  lookup(id: NodeId): Segment {
    for (let env: Env | undefined = this; env; env = env.parent) {
      const seg = env.bound.get(id);
      if (seg) return seg;
    }
    throw new InvariantError(`node ${id} is not bound`, [id]);
  }

  /** The enclosing instance of `scope`. */
  at(scope: ScopeId): Env {
    for (let env: Env | undefined = this; env; env = env.parent) {
      if (env.scope === scope) return env;
    }
    throw new InvariantError(`scope ${scope} is not active`);
  }

  split(catl: NodeId, make: () => [Segment, Segment]): [Segment, Segment] {
    let parts = this.splits.get(catl);
    if (!parts) {
      parts = make();
      this.splits.set(catl, parts);
    }
    return parts;
  }
}

// ─────────────────────────────────────────────────────────────────
// Interpreter
// ─────────────────────────────────────────────────────────────────

class Interpreter {
  constructor(
    private readonly typed: TypedGraph,
    private readonly budget: StepBudget
  ) {}

  producer(id: NodeId, env: Env): Producer {
    const inner = this.make(id, env);
    return {
      next: () => {
        this.budget.tick();
        return inner.next();
      },
    };
  }

  private make(id: NodeId, env: Env): Producer {
    const node = this.typed.node(id);
    const home = env.at(node.scope);
    switch (node.kind) {
      case "input":
      case "proj":
      case "param":
        return forward(this.segment(id, home));
      case "eps":
        return emitting([]);
      case "const":
        return emitting([val(node.value)]);
      case "catr":
        return sequence([() => this.producer(node.left, home), () => this.producer(node.right, home)]);
      case "inj":
        return sequence([
          () => emitting([node.side === "left" ? TAG_LEFT : TAG_RIGHT]),
          () => this.producer(node.payload, home),
        ]);
      case "nil":
        return emitting([DONE]);
      case "cons":
        return sequence([
          () => emitting([MORE]),
          () => this.producer(node.head, home),
          () => this.producer(node.tail, home),
        ]);
      case "case":
        return deferred(() => {
          const { side, payload } = this.segment(node.scrutinee, home).openSum();
          const br = side === "left" ? node.left : node.right;
          return this.producer(br.result, this.enter(br.scope, home, br.params, [payload]));
        });
      case "starcase":
        return deferred(() => {
          const opened = this.segment(node.scrutinee, home).openStar();
          if (!opened) return this.producer(node.nil.result, this.enter(node.nil.scope, home, [], []));
          const br = node.cons;
          return this.producer(br.result, this.enter(br.scope, home, br.params, [opened.head, opened.tail]));
        });
      case "cond":
        return deferred(() => {
          const br = this.segment(node.scrutinee, home).openBool() ? node.then : node.else;
          return this.producer(br.result, this.enter(br.scope, home, [], []));
        });
      case "rec":
        return this.loop(node, home);
      case "recur": {
        let fired = false;
        return {
          next: () => {
            if (fired) return END;
            fired = true;
            return { tag: "restart", loop: node.loop, args: node.args.map((a) => this.segment(a, home)) };
          },
        };
      }
      case "emit":
        return deferred(() => emitting(this.buffer(node.buffer, home)));
      case "catl":
      case "wait":
      case "bconst":
      case "bop":
        throw new InvariantError(`${labelOf(this.typed.view, id)} is not a stream`, [id]);
    }
  }

  /** Trampoline: a restart aimed at this loop rebinds the parameters and runs the body again. */
  private loop(node: NodeOf<"rec">, home: Env): Producer {
    const { scope, params, result } = node.body;
    let args: readonly Segment[] | undefined;
    let body: Producer | undefined;
    return {
      next: () => {
        for (;;) {
          if (!body) {
            args ??= node.args.map((a) => this.segment(a, home));
            body = this.producer(result, this.enter(scope, home, params, args));
          }
          const step = body.next();
          if (step.tag !== "restart" || step.loop !== scope) return step;
          args = step.args;
          body = undefined;
        }
      },
    };
  }

  private enter(scope: ScopeId, parent: Env, params: readonly NodeId[], segs: readonly Segment[]): Env {
    const env = new Env(scope, parent);
    params.forEach((p, i) => {
      const seg = segs[i];
      if (!seg) throw new InvariantError(`no value for parameter ${p}`, [p]);
      env.bind(p, seg);
    });
    return env;
  }

  /** A readable view of a node's output: bound for atoms, computed lazily otherwise. */
  segment(id: NodeId, env: Env): Segment {
    const node = this.typed.node(id);
    const home = env.at(node.scope);
    switch (node.kind) {
      case "input":
      case "param":
        return home.lookup(id);
      case "proj": {
        const split = this.typed.node(node.split);
        if (split.kind !== "catl") throw new InvariantError(`projection of ${split.kind}`, [id]);
        const [left, right] = home.split(split.id, () => this.segment(split.source, home).split());
        return node.side === "left" ? left : right;
      }
      default: {
        const p = this.producer(id, home);
        const label = labelOf(this.typed.view, id);
        const source = new ProducedSource(() => {
          const step = p.next();
          if (step.tag === "emit") return step.token;
          if (step.tag === "end") return undefined;
          throw new InvariantError(`restart escaped from ${label}`, [id]);
        }, label);
        return new Segment(source, this.typed.typeOf(id));
      }
    }
  }

  private buffer(id: NodeId, env: Env): BufferValue {
    const node = this.typed.node(id);
    const home = env.at(node.scope);
    switch (node.kind) {
      case "wait":
        return this.segment(node.source, home).drain();
      case "bconst":
        return scalarBuffer(node.value);
      case "bop":
        return applyBufferOp(node.op, this.buffer(node.left, home), this.buffer(node.right, home));
      default:
        throw new InvariantError(`${labelOf(this.typed.view, id)} is not a buffer`, [id]);
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────

export type InterpretOptions = {
  maxSteps?: number;
  trace?: TraceLog;
};

/**
 * Run a typed graph on one token list per input. Every input is read to its
 * end before returning, so unread or trailing tokens are still rejected.
 */
export function interpret(
  typed: TypedGraph,
  inputs: ReadonlyArray<readonly Token[]>,
  options: InterpretOptions = {}
): Token[] {
  const log = options.trace ?? noTrace;
  const sources = openInputs(
    typed.graph.inputs.map((i) => i.name),
    typed.inputTypes,
    inputs
  );
  const budget = new StepBudget(options.maxSteps);
  const root = new Env(ROOT_SCOPE, undefined);
  typed.graph.inputs.forEach((decl, i) => root.bind(decl.node, new Segment(sources[i], sources[i].type)));
  log("interpret.start", { inputs: inputs.map((ts) => ts.length) });

  const top = new Interpreter(typed, budget).producer(typed.graph.output, root);
  const out: Token[] = [];
  for (;;) {
    const step = top.next();
    if (step.tag === "end") break;
    if (step.tag === "restart") throw new InvariantError(`restart of loop ${step.loop} reached the output`);
    out.push(step.token);
  }
  for (const src of sources) src.finish();

  log("interpret.finish", { tokens: out.length, steps: budget.steps });
  return out;
}
