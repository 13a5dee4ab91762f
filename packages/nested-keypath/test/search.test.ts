import { describe, expect, it } from "vitest"
import type { JSONRecord, Key } from "../src/json"
import { findAll, findAllWithValues, iterateKeyMatches } from "../src/search"
import { traverse } from "../src/traverse"

function mixed(): JSONRecord {
  return {
    a: 1,
    b: [{ a: 2 }, { c: { a: 3 } }],
    d: { a: { a: 4 } },
  }
}

describe("findAll", () => {
  it("finds keys in depth-first pre-order", () => {
    expect(findAll(mixed(), "a")).toStrictEqual([
      ["a"],
      ["b", 0, "a"],
      ["b", 1, "c", "a"],
      ["d", "a"],
      ["d", "a", "a"],
    ])
  })

  it("finds keys inside arrays at the root", () => {
    const s = [{ a: { b: "v1", c: { d: "v2" } } }]
    expect(findAll(s, "d")).toStrictEqual([[0, "a", "c", "d"]])
  })

  it("returns nothing for an absent key", () => {
    expect(findAll(mixed(), "missing")).toStrictEqual([])
  })

  it("returns nothing for a primitive root", () => {
    expect(findAll("text", "a")).toStrictEqual([])
  })

  it("only matches record keys, not array indices", () => {
    expect(findAll([["x", "y"], { "1": "one" }], 1)).toStrictEqual([[1, 1]])
  })

  it("matches number keys against record properties", () => {
    const s = { "3": "x", list: [{ "3": "y" }] }
    expect(findAll(s, 3)).toStrictEqual([[3], ["list", 0, 3]])
  })

  it("returns independent keypaths", () => {
    const s = { x: { a: 1, b: { a: 2 } } }
    const paths = findAll(s, "a")
    expect(paths).toStrictEqual([
      ["x", "a"],
      ["x", "b", "a"],
    ])
    ;(paths[0] as Key[]).push("changed")
    expect(paths[1]).toStrictEqual(["x", "b", "a"])
  })

  it("searches structures deeper than the call stack would allow", () => {
    let node: JSONRecord = { target: true }
    for (let i = 0; i < 5000; i++) {
      node = { n: node }
    }
    const paths = findAll(node, "target")
    expect(paths).toHaveLength(1)
    expect(paths[0]).toHaveLength(5001)
    expect(paths[0][5000]).toBe("target")
  })
})

describe("findAllWithValues", () => {
  it("pairs each keypath with its value", () => {
    const s = [{ a: { b: "v1", c: { d: "v2" } } }]
    expect(findAllWithValues(s, "a")).toStrictEqual([
      { keypath: [0, "a"], value: { b: "v1", c: { d: "v2" } } },
    ])
  })

  it("returns values that traverse back to the same entries", () => {
    const s = mixed()
    const matches = findAllWithValues(s, "a")
    expect(matches.map((m) => m.value)).toStrictEqual([1, 2, 3, { a: 4 }, 4])
    for (const { keypath, value } of matches) {
      expect(traverse(s, keypath)).toBe(value)
    }
  })
})

describe("iterateKeyMatches", () => {
  it("produces matches lazily", () => {
    const iterator = iterateKeyMatches(mixed(), "a")
    expect(iterator.next().value).toStrictEqual({ keypath: ["a"], value: 1 })
    expect(iterator.next().value).toStrictEqual({ keypath: ["b", 0, "a"], value: 2 })
  })
})
