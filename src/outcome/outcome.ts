import type { Failure } from "./failure";

export interface OutcomeMeta {
  durationMs?: number;
  steps?: number;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;
export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
