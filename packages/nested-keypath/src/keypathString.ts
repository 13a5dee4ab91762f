import { KeypathSyntaxError } from "./error"
import type { Key, Keypath } from "./json"

export const DEFAULT_SEPARATOR = "."

const integerPattern = /^-?\d+$/

function isQuoted(segment: string): boolean {
  if (segment.length < 2) return false
  const first = segment[0]
  return (first === '"' || first === "'") && segment[segment.length - 1] === first
}

function checkSeparator(separator: string): void {
  if (separator.length === 0) {
    throw new KeypathSyntaxError("Keypath separator must not be empty")
  }
}

/**
 * Parses a single segment of a string keypath.
 * Integer-like segments become numbers; quoted segments become the literal
 * string between the quotes.
 */
export function parseSegment(segment: string): Key {
  if (isQuoted(segment)) {
    return segment.slice(1, -1)
  }
  if (integerPattern.test(segment)) {
    const n = Number(segment)
    if (Number.isSafeInteger(n)) {
      return n
    }
  }
  return segment
}

/**
 * Splits a delimited string into a keypath.
 *
 * This is a best-effort conversion: `"a.3"` yields `["a", 3]`, which reads
 * property `"3"` on a record and index 3 on an array alike. To keep a
 * numeral as a string write it quoted (`"a.'3'"`). Segments cannot contain the
 * separator; use a structured keypath for such keys.
 */
export function parseKeypath(text: string, separator: string = DEFAULT_SEPARATOR): Keypath {
  checkSeparator(separator)
  return text.split(separator).map(parseSegment)
}

/**
 * Formats a keypath so that {@link parseKeypath} reads it back unchanged.
 */
export function formatKeypath(keypath: Keypath, separator: string = DEFAULT_SEPARATOR): string {
  checkSeparator(separator)
  return keypath
    .map((key) => {
      if (typeof key === "number") {
        if (!Number.isSafeInteger(key)) {
          throw new KeypathSyntaxError(`Number key ${key} has no string keypath form`)
        }
        return String(key)
      }
      if (key.includes(separator)) {
        throw new KeypathSyntaxError(
          `Key ${JSON.stringify(key)} contains the separator ${JSON.stringify(separator)}`
        )
      }
      return parseSegment(key) === key ? key : `"${key}"`
    })
    .join(separator)
}
