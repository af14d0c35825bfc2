// src/core/types/index.ts

export type { ElemKind, Scalar, StreamType, SingletonType, TypeJson } from "./types";
export {
  tEps,
  tSingleton,
  tCat,
  tSum,
  tStar,
  tMeta,
  tNumber,
  tString,
  tBool,
  tCats,
  kindOf,
  typeEquals,
  wellFormed,
  nullable,
  showType,
  typeSchema,
  parseType,
} from "./types";
export { Substitution } from "./unify";
