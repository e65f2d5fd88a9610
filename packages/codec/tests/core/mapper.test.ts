import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { makeBoundedAllocator } from "../../src/core/allocator.js"
import { ReadCode, WriteCode } from "../../src/core/flags.js"
import { makeValueMapper } from "../../src/core/mapper.js"
import type { MutableDocument } from "../../src/core/mutable.js"
import { createMutableDocument, freeMutableDocument } from "../../src/core/mutable.js"
import type { ReadNode } from "../../src/core/reader.js"
import { AS_ARRAY, AS_OBJECT, makeSentinelRegistry, NULL, sentinels } from "../../src/core/sentinel.js"
import { classifyTable } from "../../src/core/to-json.js"
import type { UnsupportedPolicy } from "../../src/core/to-json.js"
import { makeTable, MARKER_KEY } from "../../src/core/value.js"

const mapper = makeValueMapper()
const plain = { withNull: false, withRef: false }

const uint = (value: bigint): ReadNode => ({ _tag: "uint", value })

const nest = (levels: number): ReadNode => {
  let node: ReadNode = { _tag: "arr", items: [] }
  for (let i = 1; i < levels; i++) {
    node = { _tag: "arr", items: [node] }
  }
  return node
}

const withDocument = <A>(use: (doc: MutableDocument) => A): A => {
  const allocator = makeBoundedAllocator(0)
  const doc = Either.getOrThrow(createMutableDocument(allocator))
  const result = use(doc)
  freeMutableDocument(doc)
  allocator.dispose()
  return result
}

const toJson = (value: unknown, onUnsupported: UnsupportedPolicy = "null") =>
  withDocument((doc) => mapper.toJson(value, doc, { onUnsupported }))

const nodeOf = (value: unknown) => Option.getOrThrow(Either.getOrThrow(toJson(value)))

describe("toDynamic", () => {
  it.effect("maps array elements to 1-based positions and drops nulls", () =>
    Effect.sync(() => {
      const node: ReadNode = {
        _tag: "arr",
        items: [uint(1n), { _tag: "null" }, { _tag: "str", value: "x" }]
      }
      const table = Either.getOrThrow(mapper.toDynamic(node, plain))
      expect(table).toStrictEqual(makeTable([[1, 1], [3, "x"]]))
    }))

  it.effect("keeps explicit nulls and container markers when asked", () =>
    Effect.sync(() => {
      const node: ReadNode = {
        _tag: "obj",
        entries: [["a", { _tag: "null" }], ["b", { _tag: "arr", items: [] }]]
      }
      const table = Either.getOrThrow(mapper.toDynamic(node, { withNull: true, withRef: true }))
      expect(table).toStrictEqual(
        makeTable([[MARKER_KEY, AS_OBJECT], ["a", NULL], ["b", makeTable([[MARKER_KEY, AS_ARRAY]])]])
      )
    }))

  it.effect("lets a later duplicate key win and a null member delete it", () =>
    Effect.sync(() => {
      const overwrite: ReadNode = { _tag: "obj", entries: [["k", uint(1n)], ["k", uint(2n)]] }
      const erase: ReadNode = { _tag: "obj", entries: [["k", uint(1n)], ["k", { _tag: "null" }]] }
      expect(Either.getOrThrow(mapper.toDynamic(overwrite, plain))).toStrictEqual(makeTable([["k", 2]]))
      expect(Either.getOrThrow(mapper.toDynamic(erase, plain))).toStrictEqual(makeTable())
    }))

  it.effect("returns host numbers inside the safe range and bigints outside", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(mapper.toDynamic(uint(9007199254740991n), plain))).toBe(9007199254740991)
      expect(Either.getOrThrow(mapper.toDynamic(uint(9007199254740992n), plain))).toBe(9007199254740992n)
      expect(Either.getOrThrow(mapper.toDynamic({ _tag: "sint", value: -5n }, plain))).toBe(-5)
      expect(Either.getOrThrow(mapper.toDynamic({ _tag: "real", value: 2.5 }, plain))).toBe(2.5)
      expect(Either.getOrThrow(mapper.toDynamic({ _tag: "null" }, plain))).toBeNull()
    }))

  it.effect("rejects raw numbers with their engine type", () =>
    Effect.sync(() => {
      const node: ReadNode = { _tag: "arr", items: [{ _tag: "raw", value: "1.50" }] }
      expect(Either.getOrThrow(Either.flip(mapper.toDynamic(node, plain)))).toStrictEqual({
        _tag: "UnknownValueType",
        code: ReadCode.UNKNOWN_VALUE_TYPE,
        type: 1,
        message: "unknown value type 1"
      })
    }))

  it.effect("stops at the configured depth", () =>
    Effect.sync(() => {
      const shallow = makeValueMapper(sentinels, { maxDepth: 2 })
      expect(Either.isRight(shallow.toDynamic(nest(2), plain))).toBe(true)
      expect(Either.getOrThrow(Either.flip(shallow.toDynamic(nest(3), plain)))).toStrictEqual({
        _tag: "StackExhausted",
        code: ReadCode.STACK_EXHAUSTION,
        message: "out of stack space"
      })
    }))

  it.effect("uses the sentinels of its own registry", () =>
    Effect.sync(() => {
      const custom = makeSentinelRegistry("custom")
      const value = makeValueMapper(custom).toDynamic({ _tag: "null" }, { withNull: true, withRef: false })
      expect(Either.getOrThrow(value)).toBe(custom.null)
    }))
})

describe("classifyTable", () => {
  it.effect("prefers markers over the table's shape", () =>
    Effect.sync(() => {
      expect(classifyTable(makeTable([[MARKER_KEY, AS_OBJECT], [1, "a"]]), sentinels)).toBe("object")
      expect(classifyTable(makeTable([[MARKER_KEY, AS_ARRAY], ["a", 1]]), sentinels)).toBe("array")
      expect(classifyTable(makeTable([[1, "a"], ["b", 2]]), sentinels)).toBe("array")
      expect(classifyTable(makeTable([[2, "b"]]), sentinels)).toBe("object")
      expect(classifyTable(makeTable(), sentinels)).toBe("object")
      expect(classifyTable(makeTable([[MARKER_KEY, AS_ARRAY]]), makeSentinelRegistry("other"))).toBe("object")
    }))
})

describe("toJson", () => {
  it.effect("builds scalar nodes by host type", () =>
    Effect.sync(() => {
      expect(nodeOf(7)).toStrictEqual({ _tag: "uint", value: 7n })
      expect(nodeOf(0)).toStrictEqual({ _tag: "sint", value: 0n })
      expect(nodeOf(-3)).toStrictEqual({ _tag: "sint", value: -3n })
      expect(nodeOf(0.5)).toStrictEqual({ _tag: "real", value: 0.5 })
      expect(nodeOf(2 ** 53)).toStrictEqual({ _tag: "real", value: 2 ** 53 })
      expect(nodeOf(undefined)).toStrictEqual({ _tag: "null" })
      expect(nodeOf(NULL)).toStrictEqual({ _tag: "null" })
    }))

  it.effect("fills gaps in sparse arrays with nulls", () =>
    Effect.sync(() => {
      const node = nodeOf(makeTable([[1, 10], [2, 20], [5, 50]]))
      expect(node).toStrictEqual({
        _tag: "arr",
        items: [
          { _tag: "uint", value: 10n },
          { _tag: "uint", value: 20n },
          { _tag: "null" },
          { _tag: "null" },
          { _tag: "uint", value: 50n }
        ]
      })
    }))

  it.effect("places an out-of-order key at its own position", () =>
    Effect.sync(() => {
      const node = nodeOf(makeTable([[3, "c"], [1, "a"]]))
      expect(node).toStrictEqual({
        _tag: "arr",
        items: [{ _tag: "str", value: "a" }, { _tag: "null" }, { _tag: "str", value: "c" }]
      })
    }))

  it.effect("skips unsupported members under the null policy", () =>
    Effect.sync(() => {
      const node = nodeOf({ a: 1, f: () => 1, big: 2n ** 64n })
      expect(node).toStrictEqual({
        _tag: "obj",
        entries: [[{ _tag: "str", value: "a" }, { _tag: "uint", value: 1n }]]
      })
      expect(Option.isNone(Either.getOrThrow(toJson(Symbol("s"))))).toBe(true)
    }))

  it.effect("fails on the first unsupported value under the fail policy", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(Either.flip(toJson([1, new Date(0)], "fail")))).toStrictEqual({
        _tag: "UnsupportedValue",
        code: WriteCode.INVALID_VALUE_TYPE,
        valueType: "object",
        message: "unsupported value type: object"
      })
    }))

  it.effect("stops cyclic tables at the depth limit", () =>
    Effect.sync(() => {
      const cycle = makeTable()
      cycle.set("self", cycle)
      expect(Either.getOrThrow(Either.flip(toJson(cycle)))).toStrictEqual({
        _tag: "StackExhausted",
        code: WriteCode.STACK_EXHAUSTION,
        message: "out of stack space"
      })
    }))

  it.effect("reports allocation failures", () =>
    Effect.sync(() => {
      const allocator = makeBoundedAllocator(100)
      const doc = Either.getOrThrow(createMutableDocument(allocator))
      const failure = Either.getOrThrow(Either.flip(mapper.toJson([1], doc, { onUnsupported: "null" })))
      expect(failure._tag).toBe("OutOfMemory")
      freeMutableDocument(doc)
      allocator.dispose()
    }))
})
