/**
 * A single step of a keypath.
 * Whether it addresses a record property or an array index depends on the
 * container being visited, not on the key's own type.
 */
export type Key = string | number

/**
 * An ordered list of keys locating a value within a JSON document.
 */
export type Keypath = readonly Key[]

/**
 * A JSON primitive.
 * Note: `undefined` is supported for object properties only.
 */
export type JSONPrimitive = undefined | null | boolean | number | string

/**
 * A JSON record (map layer).
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON array (sequence layer).
 */
export type JSONArray = JSONValue[]

/**
 * A JSON container.
 */
export type JSONContainer = JSONRecord | JSONArray

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONContainer
