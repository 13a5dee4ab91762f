import type { Key, Keypath } from "./json"

export class NestedKeypathError extends Error {
  constructor(msg: string) {
    super(msg)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, NestedKeypathError.prototype)
  }
}

/**
 * Base for errors raised while walking a keypath.
 * Records the offending key and its zero-based position in the keypath.
 */
export class KeypathError extends NestedKeypathError {
  readonly key: Key
  readonly position: number
  readonly keypath: Keypath

  constructor(msg: string, keypath: Keypath, position: number) {
    super(msg)
    Object.setPrototypeOf(this, KeypathError.prototype)
    this.keypath = keypath
    this.position = position
    this.key = keypath[position]
  }
}

/**
 * A record lookup found no such property.
 */
export class KeyNotFoundError extends KeypathError {
  constructor(keypath: Keypath, position: number) {
    super(
      `Key ${describeKey(keypath[position])} not found at position ${position} of ${describeKeypath(keypath)}`,
      keypath,
      position
    )
    Object.setPrototypeOf(this, KeyNotFoundError.prototype)
  }
}

/**
 * An array index is not a valid position in the array.
 */
export class IndexOutOfRangeError extends KeypathError {
  constructor(keypath: Keypath, position: number, length: number) {
    super(
      `Index ${describeKey(keypath[position])} out of range (length ${length}) at position ${position} of ${describeKeypath(keypath)}`,
      keypath,
      position
    )
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype)
  }
}

/**
 * Keys remain but the walk reached a primitive.
 */
export class PathBlockedError extends KeypathError {
  constructor(keypath: Keypath, position: number) {
    super(
      `Cannot traverse through primitive at position ${position} of ${describeKeypath(keypath)}`,
      keypath,
      position
    )
    Object.setPrototypeOf(this, PathBlockedError.prototype)
  }
}

export class InvalidRootTypeError extends NestedKeypathError {
  readonly receivedType: string

  constructor(receivedType: string) {
    super(`Only a record or an array can be the root of a nested document, got ${receivedType}`)
    Object.setPrototypeOf(this, InvalidRootTypeError.prototype)
    this.receivedType = receivedType
  }
}

export class KeypathSyntaxError extends NestedKeypathError {
  constructor(msg: string) {
    super(msg)
    Object.setPrototypeOf(this, KeypathSyntaxError.prototype)
  }
}

function describeKey(key: Key): string {
  return typeof key === "number" ? String(key) : JSON.stringify(key)
}

function describeKeypath(keypath: Keypath): string {
  return `[${keypath.map(describeKey).join(", ")}]`
}
