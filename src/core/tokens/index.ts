// src/core/tokens/index.ts

export type { Token } from "./token";
export {
  TAG_LEFT,
  TAG_RIGHT,
  MORE,
  DONE,
  val,
  starOf,
  tokenEquals,
  tokensEqual,
  firstMismatch,
  showToken,
  showTokens,
  tokenSchema,
  tokenListSchema,
  parseTokens,
} from "./token";
export type { ShapeStep } from "./shape";
export { ShapeReader, valueFits, checkTokens } from "./shape";
export type { StreamValue } from "./codec";
export { encodeValue, decodeValue } from "./codec";
