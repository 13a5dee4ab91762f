import type { JSONValue, Key, Keypath } from "./json"
import { classify, hasOwn } from "./utils"

/**
 * A location of a searched key together with the value stored under it.
 */
export interface KeyMatch {
  keypath: Keypath
  value: JSONValue
}

interface Frame {
  node: JSONValue
  prefix: Keypath
}

/**
 * Lazily enumerates every place `targetKey` appears as a record property,
 * depth-first and pre-order (a record's own match comes before matches in its
 * children). Arrays are searched element by element.
 *
 * Uses an explicit stack, so nesting depth is not limited by the call stack.
 * Each yielded keypath is a fresh array.
 */
export function* iterateKeyMatches(root: JSONValue, targetKey: Key): Generator<KeyMatch> {
  const name = String(targetKey)
  const stack: Frame[] = [{ node: root, prefix: [] }]

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node, prefix } = frame
    const kind = classify(node)

    switch (kind.kind) {
      case "array":
        // pushed in reverse so that lower indices are visited first
        for (let i = kind.node.length - 1; i >= 0; i--) {
          stack.push({ node: kind.node[i], prefix: [...prefix, i] })
        }
        break

      case "record": {
        if (hasOwn(kind.node, name)) {
          yield { keypath: [...prefix, targetKey], value: kind.node[name] }
        }
        // integer-like names come first in Object.keys order
        const keys = Object.keys(kind.node)
        for (let i = keys.length - 1; i >= 0; i--) {
          const key = keys[i]
          stack.push({ node: kind.node[key], prefix: [...prefix, key] })
        }
        break
      }

      case "scalar":
        break
    }
  }
}

/**
 * Finds the keypaths of every occurrence of `targetKey`.
 */
export function findAll(root: JSONValue, targetKey: Key): Keypath[] {
  const found: Keypath[] = []
  for (const match of iterateKeyMatches(root, targetKey)) {
    found.push(match.keypath)
  }
  return found
}

/**
 * Like {@link findAll}, but pairs each keypath with its value. Values are not
 * copied.
 */
export function findAllWithValues(root: JSONValue, targetKey: Key): KeyMatch[] {
  return Array.from(iterateKeyMatches(root, targetKey))
}
