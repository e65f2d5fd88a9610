import * as Either from "effect/Either"

import type { StackExhausted, UnknownValueType } from "./errors.js"
import { stackExhausted, unknownValueType } from "./errors.js"
import { ReadCode } from "./flags.js"
import type { ReadNode } from "./reader.js"
import { nodeType } from "./reader.js"
import type { SentinelRegistry } from "./sentinel.js"
import type { DynamicValue, Table, TableKey } from "./value.js"
import { MARKER_KEY } from "./value.js"

// CHANGE: map a read-only JSON tree onto dynamic values and tables
// WHY: callers work with host tables, optionally tagged with container intent and explicit nulls
// QUOTE(TZ): n/a
// REF: req-to-dynamic-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: depth(n) < maxDepth ∧ raw ∉ n → toDynamic(n) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a table never stores null; a nil member leaves its key absent
// COMPLEXITY: O(n) time, O(d) stack where d = nesting depth

export interface DecodeMapping {
  readonly withNull: boolean
  readonly withRef: boolean
}

export type ToDynamicError = UnknownValueType | StackExhausted

export type ToDynamic = (node: ReadNode, mapping: DecodeMapping) => Either.Either<DynamicValue, ToDynamicError>

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

export const toHostInteger = (value: bigint): number | bigint =>
  value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value

const store = (table: Table, key: TableKey, value: DynamicValue): void => {
  if (value === null) {
    table.delete(key)
  } else {
    table.set(key, value)
  }
}

type ReadContainer = Extract<ReadNode, { readonly _tag: "arr" | "obj" }>

type ReadLeaf = Exclude<ReadNode, ReadContainer>

interface Frame {
  readonly table: Table
  readonly members: Iterator<readonly [TableKey, ReadNode]>
  key: TableKey
}

const positions = function*(items: ReadonlyArray<ReadNode>): Generator<readonly [TableKey, ReadNode]> {
  for (const [index, item] of items.entries()) {
    yield [index + 1, item]
  }
}

const isContainer = (node: ReadNode): node is ReadContainer => node._tag === "arr" || node._tag === "obj"

/**
 * Build the decode direction of the value mapper.
 *
 * @param registry - Sentinels used for explicit null and container markers.
 * @param maxDepth - Container nesting allowed before the conversion aborts.
 *
 * @pure true
 * @invariant a failed conversion returns no partial table
 * @invariant nesting is tracked on an explicit stack, never the call stack
 * @complexity O(n)
 */
export const makeToDynamic = (registry: SentinelRegistry, maxDepth: number): ToDynamic => (node, mapping) => {
  const leaf = (current: ReadLeaf): Either.Either<DynamicValue, ToDynamicError> => {
    switch (current._tag) {
      case "null":
        return Either.right(mapping.withNull ? registry.null : null)
      case "bool":
      case "real":
      case "str":
        return Either.right(current.value)
      case "uint":
      case "sint":
        return Either.right(toHostInteger(current.value))
      case "raw":
        return Either.left(unknownValueType(nodeType(current)))
    }
  }

  const open = (current: ReadContainer): Frame => {
    const table: Table = new Map()
    if (mapping.withRef) {
      table.set(MARKER_KEY, current._tag === "arr" ? registry.asArray : registry.asObject)
    }
    const members = current._tag === "arr" ? positions(current.items) : current.entries.values()
    return { table, members, key: MARKER_KEY }
  }

  const stack: Array<Frame> = []
  let current: ReadNode = node
  for (;;) {
    let top: Frame
    if (isContainer(current)) {
      if (stack.length >= maxDepth) {
        return Either.left(stackExhausted(ReadCode.STACK_EXHAUSTION))
      }
      top = open(current)
      stack.push(top)
    } else {
      const value = leaf(current)
      const parent = stack.at(-1)
      if (Either.isLeft(value) || parent === undefined) {
        return value
      }
      store(parent.table, parent.key, value.right)
      top = parent
    }
    let member = top.members.next()
    while (member.done === true) {
      stack.pop()
      const parent = stack.at(-1)
      if (parent === undefined) {
        return Either.right(top.table)
      }
      store(parent.table, parent.key, top.table)
      top = parent
      member = top.members.next()
    }
    top.key = member.value[0]
    current = member.value[1]
  }
}
