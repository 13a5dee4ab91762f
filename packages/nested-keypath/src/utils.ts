import equal from "fast-deep-equal"
import type { JSONArray, JSONPrimitive, JSONRecord, JSONValue } from "./json"

/**
 * Deep equality check for JSONValues.
 */
export function deepEqual(a: JSONValue, b: JSONValue): boolean {
  return equal(a, b)
}

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * A node classified for a single traversal step.
 */
export type NodeKind =
  | { kind: "record"; node: JSONRecord }
  | { kind: "array"; node: JSONArray }
  | { kind: "scalar"; value: JSONPrimitive }

/**
 * Decides how the next key applies to `value`.
 */
export function classify(value: JSONValue): NodeKind {
  if (Array.isArray(value)) {
    return { kind: "array", node: value }
  }
  if (isObject(value)) {
    return { kind: "record", node: value }
  }
  return { kind: "scalar", value }
}

/**
 * Checks for an array or a record whose prototype is `Object.prototype` or null.
 * Instances such as `Date` or `Map` are neither.
 */
export function isJSONContainer(value: unknown): value is JSONArray | JSONRecord {
  if (Array.isArray(value)) return true
  if (!isObject(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function hasOwn(record: JSONRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key)
}

/**
 * Writes an own enumerable property, "__proto__" included.
 */
export function setOwn(record: JSONRecord, key: string, value: JSONValue): void {
  Object.defineProperty(record, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

/**
 * Name of a value's type for error messages.
 */
export function typeName(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (isObject(value) && !isJSONContainer(value)) {
    // "[object Date]" -> "Date"
    return Object.prototype.toString.call(value).slice(8, -1)
  }
  return typeof value
}
