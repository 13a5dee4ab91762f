export {
  IndexOutOfRangeError,
  InvalidRootTypeError,
  KeyNotFoundError,
  KeypathError,
  KeypathSyntaxError,
  NestedKeypathError,
  PathBlockedError,
} from "./error"
export type {
  JSONArray,
  JSONContainer,
  JSONPrimitive,
  JSONRecord,
  JSONValue,
  Key,
  Keypath,
} from "./json"
export { DEFAULT_SEPARATOR, formatKeypath, parseKeypath } from "./keypathString"
export {
  NestedData,
  type DumpOptions,
  type NestedDataOptions,
  type NestedMatch,
  type NestedValue,
} from "./NestedData"
export { findAll, findAllWithValues, iterateKeyMatches, type KeyMatch } from "./search"
export { assign, ensurePath, remove, resolveParent, traverse } from "./traverse"
