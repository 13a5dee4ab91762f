import {
  IndexOutOfRangeError,
  KeyNotFoundError,
  KeypathSyntaxError,
  PathBlockedError,
} from "./error"
import type { JSONContainer, JSONValue, Key, Keypath } from "./json"
import { classify, hasOwn, setOwn } from "./utils"

/**
 * Distinguishes a full keypath from a bare key.
 */
export function isKeypath(keyOrKeypath: Key | Keypath): keyOrKeypath is Keypath {
  return typeof keyOrKeypath === "object"
}

/**
 * Converts a key to an array index.
 * Returns undefined if the key cannot address an array element.
 */
export function toIndex(key: Key): number | undefined {
  if (typeof key === "number") {
    return Number.isSafeInteger(key) && key >= 0 ? key : undefined
  }
  if (!/^\d+$/.test(key)) {
    return undefined
  }
  const index = Number(key)
  return Number.isSafeInteger(index) ? index : undefined
}

/**
 * Looks up `keypath[position]` on `current`.
 */
function step(current: JSONValue, keypath: Keypath, position: number): JSONValue {
  const key = keypath[position]
  const kind = classify(current)
  switch (kind.kind) {
    case "record": {
      const name = String(key)
      if (!hasOwn(kind.node, name)) {
        throw new KeyNotFoundError(keypath, position)
      }
      return kind.node[name]
    }
    case "array": {
      const index = toIndex(key)
      if (index === undefined || index >= kind.node.length) {
        throw new IndexOutOfRangeError(keypath, position, kind.node.length)
      }
      return kind.node[index]
    }
    case "scalar":
      throw new PathBlockedError(keypath, position)
  }
}

/**
 * Walks the first `end` keys of `keypath`.
 */
function walk(root: JSONContainer, keypath: Keypath, end: number): JSONValue {
  let current: JSONValue = root
  for (let i = 0; i < end; i++) {
    current = step(current, keypath, i)
  }
  return current
}

/**
 * Resolves a keypath (or a single key) within `root`.
 * An empty keypath resolves to `root` itself.
 *
 * @throws KeyNotFoundError if a record has no such property.
 * @throws IndexOutOfRangeError if an index is outside `[0, length)`.
 * @throws PathBlockedError if keys remain after reaching a primitive.
 */
export function traverse(root: JSONContainer, keyOrKeypath: Key | Keypath): JSONValue {
  if (!isKeypath(keyOrKeypath)) {
    return step(root, [keyOrKeypath], 0)
  }
  if (keyOrKeypath.length === 1) {
    return step(root, keyOrKeypath, 0)
  }
  return walk(root, keyOrKeypath, keyOrKeypath.length)
}

function requireDestination(keypath: Keypath): void {
  if (keypath.length === 0) {
    throw new KeypathSyntaxError("A keypath must contain at least one key")
  }
}

/**
 * Resolves the existing container holding the destination key of `keypath`.
 * Nothing is created.
 */
export function resolveParent(root: JSONContainer, keypath: Keypath): JSONContainer {
  requireDestination(keypath)
  const last = keypath.length - 1
  const parent = classify(walk(root, keypath, last))
  if (parent.kind === "scalar") {
    throw new PathBlockedError(keypath, last)
  }
  return parent.node
}

/**
 * Walks all but the last key of `keypath`, creating missing layers, and
 * returns the container the destination key belongs to.
 *
 * - A missing record property gets a new empty record.
 * - An array index equal to the array's length appends a new empty record.
 * - Arrays are never created; they must already exist.
 *
 * Layers created before a failure are left in place.
 */
export function ensurePath(root: JSONContainer, keypath: Keypath): JSONContainer {
  requireDestination(keypath)
  const last = keypath.length - 1

  let current: JSONValue = root
  for (let i = 0; i < last; i++) {
    const key = keypath[i]
    const kind = classify(current)
    switch (kind.kind) {
      case "record": {
        const name = String(key)
        if (!hasOwn(kind.node, name)) {
          setOwn(kind.node, name, {})
        }
        current = kind.node[name]
        break
      }
      case "array": {
        const index = toIndex(key)
        if (index === undefined || index > kind.node.length) {
          throw new IndexOutOfRangeError(keypath, i, kind.node.length)
        }
        if (index === kind.node.length) {
          kind.node.push({})
        }
        current = kind.node[index]
        break
      }
      case "scalar":
        throw new PathBlockedError(keypath, i)
    }
  }

  const parent = classify(current)
  if (parent.kind === "scalar") {
    throw new PathBlockedError(keypath, last)
  }
  return parent.node
}

/**
 * Stores `value` under `key` in `container`.
 * On a record any key is a property name; on an array the index must be within
 * `[0, length]`, where `length` appends.
 *
 * @param keypath - The full keypath `key` ends, used for error reporting.
 */
export function assign(
  container: JSONContainer,
  key: Key,
  value: JSONValue,
  keypath: Keypath = [key]
): void {
  const kind = classify(container)
  switch (kind.kind) {
    case "record":
      setOwn(kind.node, String(key), value)
      break
    case "array": {
      const index = toIndex(key)
      if (index === undefined || index > kind.node.length) {
        throw new IndexOutOfRangeError(keypath, keypath.length - 1, kind.node.length)
      }
      kind.node[index] = value
      break
    }
    case "scalar":
      throw new PathBlockedError(keypath, keypath.length - 1)
  }
}

/**
 * Removes `key` from `container` and returns the removed value.
 * Array elements after the index shift down by one.
 */
export function remove(container: JSONContainer, key: Key, keypath: Keypath = [key]): JSONValue {
  const position = keypath.length - 1
  const kind = classify(container)
  switch (kind.kind) {
    case "record": {
      const name = String(key)
      if (!hasOwn(kind.node, name)) {
        throw new KeyNotFoundError(keypath, position)
      }
      const value = kind.node[name]
      delete kind.node[name]
      return value
    }
    case "array": {
      const index = toIndex(key)
      if (index === undefined || index >= kind.node.length) {
        throw new IndexOutOfRangeError(keypath, position, kind.node.length)
      }
      return kind.node.splice(index, 1)[0]
    }
    case "scalar":
      throw new PathBlockedError(keypath, position)
  }
}
