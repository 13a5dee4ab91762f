import {
  IndexOutOfRangeError,
  InvalidRootTypeError,
  KeyNotFoundError,
  PathBlockedError,
} from "./error"
import type { JSONContainer, JSONPrimitive, JSONRecord, JSONValue, Key, Keypath } from "./json"
import { DEFAULT_SEPARATOR, parseKeypath } from "./keypathString"
import { findAll, iterateKeyMatches } from "./search"
import { assign, ensurePath, isKeypath, remove, resolveParent, traverse } from "./traverse"
import { classify, deepEqual, isJSONContainer, setOwn, typeName } from "./utils"

export interface NestedDataOptions {
  /**
   * Separator used by the string keypath accessors (`get`, `set`) when none is
   * passed to the call.
   * Default: "."
   */
  separator?: string
}

export interface DumpOptions {
  /**
   * Indentation passed to `JSON.stringify`.
   * Default: none (compact output).
   */
  indent?: number | string

  /**
   * Replacer passed to `JSON.stringify`.
   */
  replacer?: (this: unknown, key: string, value: unknown) => unknown
}

/**
 * A read result: containers come back wrapped, primitives as they are.
 */
export type NestedValue = NestedData | JSONPrimitive

/**
 * A match returned by {@link NestedData.findAllWithValues}.
 */
export interface NestedMatch {
  keypath: Keypath
  value: NestedValue
}

/**
 * Wraps a JSON record or array for keypath navigation and key search.
 *
 * Keypaths may mix property names and array indices:
 * `data.at(["users", 0, "name"])` reads what `raw.users[0].name` would.
 *
 * The wrapper never copies: containers returned by reads are views over the
 * same underlying data, and writes through a view are visible from the root.
 */
export class NestedData implements Iterable<Key> {
  private readonly data: JSONContainer
  private readonly separator: string

  constructor(data?: JSONContainer | null, options: NestedDataOptions = {}) {
    if (data !== undefined && data !== null && !isJSONContainer(data)) {
      throw new InvalidRootTypeError(typeName(data))
    }
    this.data = data ?? {}
    this.separator = options.separator ?? DEFAULT_SEPARATOR
  }

  /**
   * Wraps an untyped value, such as the result of `JSON.parse`.
   * `null` and `undefined` give an empty record.
   *
   * @throws InvalidRootTypeError for anything other than a record or an array.
   */
  static from(value: unknown, options?: NestedDataOptions): NestedData {
    if (value === undefined || value === null) {
      return new NestedData(undefined, options)
    }
    if (!isJSONContainer(value)) {
      throw new InvalidRootTypeError(typeName(value))
    }
    return new NestedData(value, options)
  }

  private wrap(value: JSONValue): NestedValue {
    const kind = classify(value)
    if (kind.kind === "scalar") {
      return kind.value
    }
    return new NestedData(kind.node, { separator: this.separator })
  }

  /**
   * Reads the value at a key or keypath. Containers are returned as views.
   */
  at(keyOrKeypath: Key | Keypath): NestedValue {
    return this.wrap(traverse(this.data, keyOrKeypath))
  }

  /**
   * Reads the raw value at a key or keypath.
   */
  getValue(keyOrKeypath: Key | Keypath): JSONValue {
    return traverse(this.data, keyOrKeypath)
  }

  /**
   * Writes `value` at a key or keypath. The destination's parent must already
   * exist; use {@link insert} to create missing layers.
   */
  setAt(keyOrKeypath: Key | Keypath, value: JSONValue): void {
    const keypath = toKeypath(keyOrKeypath)
    const parent = resolveParent(this.data, keypath)
    assign(parent, keypath[keypath.length - 1], value, keypath)
  }

  /**
   * Writes `value` at `keypath`, creating missing record layers on the way.
   * An index equal to an array's length appends a new record to it.
   */
  insert(keypath: Keypath, value: JSONValue): void {
    const parent = ensurePath(this.data, keypath)
    assign(parent, keypath[keypath.length - 1], value, keypath)
  }

  /**
   * Reads using a delimited string keypath, such as `"users.0.name"`.
   */
  get(keypathString: string, separator: string = this.separator): NestedValue {
    return this.at(parseKeypath(keypathString, separator))
  }

  /**
   * Writes using a delimited string keypath. The parent must already exist.
   */
  set(keypathString: string, value: JSONValue, separator: string = this.separator): void {
    this.setAt(parseKeypath(keypathString, separator), value)
  }

  /**
   * Checks whether a key or keypath resolves.
   */
  has(keyOrKeypath: Key | Keypath): boolean {
    try {
      traverse(this.data, keyOrKeypath)
      return true
    } catch (e) {
      if (
        e instanceof KeyNotFoundError ||
        e instanceof IndexOutOfRangeError ||
        e instanceof PathBlockedError
      ) {
        return false
      }
      throw e
    }
  }

  /**
   * Removes the value at a key or keypath and returns it (raw).
   */
  delete(keyOrKeypath: Key | Keypath): JSONValue {
    const keypath = toKeypath(keyOrKeypath)
    const parent = resolveParent(this.data, keypath)
    return remove(parent, keypath[keypath.length - 1], keypath)
  }

  /**
   * Finds the keypath of every occurrence of `key` as a record property.
   */
  findAll(key: Key): Keypath[] {
    return findAll(this.data, key)
  }

  /**
   * Finds every occurrence of `key` together with its value.
   */
  findAllWithValues(key: Key): NestedMatch[] {
    const matches: NestedMatch[] = []
    for (const match of iterateKeyMatches(this.data, key)) {
      matches.push({ keypath: match.keypath, value: this.wrap(match.value) })
    }
    return matches
  }

  /**
   * Serializes the underlying data as JSON.
   * Errors thrown by `JSON.stringify` are not caught.
   */
  dump(options: DumpOptions = {}): string {
    return JSON.stringify(this.data, options.replacer, options.indent)
  }

  toJSON(): JSONContainer {
    return this.data
  }

  /**
   * Returns the underlying data (not a copy).
   */
  unnest(): JSONContainer {
    return this.data
  }

  /**
   * Property names of a record, or the indices of an array.
   * Record keys come in `Object.keys` order: integer-like names first in
   * ascending order, then the rest in insertion order.
   */
  keys(): Key[] {
    if (Array.isArray(this.data)) {
      return this.data.map((_, i) => i)
    }
    return Object.keys(this.data)
  }

  values(): NestedValue[] {
    return this.entries().map(([, value]) => value)
  }

  entries(): [Key, NestedValue][] {
    return this.keys().map((key) => [key, this.at(key)])
  }

  [Symbol.iterator](): Iterator<Key> {
    return this.keys()[Symbol.iterator]()
  }

  get length(): number {
    return this.keys().length
  }

  isEmpty(): boolean {
    return this.length === 0
  }

  /**
   * Deep equality against raw data or another wrapper.
   */
  equals(other: NestedData | JSONValue): boolean {
    return deepEqual(this.data, other instanceof NestedData ? other.data : other)
  }

  /**
   * Shallow copy: the top level container is new, its children are shared.
   */
  copy(): NestedData {
    if (Array.isArray(this.data)) {
      return new NestedData(this.data.slice(), { separator: this.separator })
    }
    const copied: JSONRecord = {}
    for (const key of Object.keys(this.data)) {
      setOwn(copied, key, this.data[key])
    }
    return new NestedData(copied, { separator: this.separator })
  }

  clear(): void {
    if (Array.isArray(this.data)) {
      this.data.length = 0
      return
    }
    for (const key of Object.keys(this.data)) {
      delete this.data[key]
    }
  }

  toString(): string {
    return `NestedData(${JSON.stringify(this.data)})`
  }
}

function toKeypath(keyOrKeypath: Key | Keypath): Keypath {
  return isKeypath(keyOrKeypath) ? keyOrKeypath : [keyOrKeypath]
}
