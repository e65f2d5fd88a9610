import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { OutOfMemory } from "./allocator.js"
import type { StackExhausted, UnsupportedValue } from "./errors.js"
import { stackExhausted, unsupportedValue } from "./errors.js"
import { WriteCode } from "./flags.js"
import type { MutableDocument, MutArray, MutNode, MutObject } from "./mutable.js"
import {
  arrayAppend,
  arraySet,
  mutArray,
  mutBool,
  mutNull,
  mutObject,
  mutReal,
  mutSint,
  mutString,
  mutUint,
  objectAdd
} from "./mutable.js"
import type { SentinelRegistry } from "./sentinel.js"
import type { Table } from "./value.js"
import { isPosition, isTable, MARKER_KEY, tableLength } from "./value.js"

// CHANGE: map dynamic values onto a mutable JSON tree
// WHY: tables are written as arrays or objects by one decision, and sparse positions keep their index
// QUOTE(TZ): n/a
// REF: req-to-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: classify(t) = array → len(json(t)) = max{k ∈ keys(t) ∩ ℕ⁺ | t[k] representable}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: an allocation failure stops the traversal immediately
// COMPLEXITY: O(n + g) time where g = number of gap fillers, O(d) stack where d = nesting depth

export type ContainerKind = "array" | "object"

export type UnsupportedPolicy = "null" | "fail"

export interface EncodeMapping {
  readonly onUnsupported: UnsupportedPolicy
}

export type ToJsonError = OutOfMemory | StackExhausted | UnsupportedValue

type Encoded = Either.Either<Option.Option<MutNode>, ToJsonError>

export type ToJson = (value: unknown, doc: MutableDocument, mapping: EncodeMapping) => Encoded

const UINT64_MAX = (1n << 64n) - 1n
const INT64_MIN = -(1n << 63n)

/**
 * Decide whether a table is written as a JSON array or object.
 *
 * @pure true
 * @invariant marker sentinels win over the table's shape
 * @complexity O(n)
 */
export const classifyTable = (table: Table, registry: SentinelRegistry): ContainerKind => {
  const marker = table.get(MARKER_KEY)
  if (marker === registry.asObject) {
    return "object"
  }
  if (marker === registry.asArray) {
    return "array"
  }
  return tableLength(table) > 0 ? "array" : "object"
}

const isPlainObject = (value: object): value is Readonly<Record<string, unknown>> => {
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

const tablePositions = function*(table: Table): Generator<readonly [number, unknown]> {
  for (const [key, value] of table) {
    if (isPosition(key)) {
      yield [key, value]
    }
  }
}

const tableFields = function*(table: Table): Generator<readonly [string, unknown]> {
  for (const [key, value] of table) {
    if (typeof key === "string") {
      yield [key, value]
    }
  }
}

const listPositions = (items: ReadonlyArray<unknown>): ReadonlyArray<readonly [number, unknown]> =>
  Array.from(items, (item, index) => [index + 1, item] as const)

interface ArrayFrame {
  readonly _tag: "array"
  readonly node: MutArray
  readonly members: Iterator<readonly [number, unknown]>
  key: number
  previous: number
}

interface ObjectFrame {
  readonly _tag: "object"
  readonly node: MutObject
  readonly members: Iterator<readonly [string, unknown]>
  key: string
}

type Frame = ArrayFrame | ObjectFrame

type Step = Either.Either<Frame | Option.Option<MutNode>, ToJsonError>

const created = <A extends MutNode>(node: Either.Either<A, OutOfMemory>): Encoded =>
  Either.map(node, (value): Option.Option<MutNode> => Option.some(value))

const isFrame = (outcome: Frame | Option.Option<MutNode>): outcome is Frame =>
  outcome._tag === "array" || outcome._tag === "object"

const advance = (frame: Frame): Option.Option<unknown> => {
  if (frame._tag === "array") {
    const member = frame.members.next()
    if (member.done === true) {
      return Option.none()
    }
    frame.key = member.value[0]
    return Option.some(member.value[1])
  }
  const member = frame.members.next()
  if (member.done === true) {
    return Option.none()
  }
  frame.key = member.value[0]
  return Option.some(member.value[1])
}

/**
 * Build the encode direction of the value mapper.
 *
 * @param registry - Sentinels recognized as explicit null and container markers.
 * @param maxDepth - Container nesting allowed before the conversion aborts.
 *
 * @pure false
 * @effect allocates from the document's allocator
 * @invariant Right(None) only for unrepresentable values under the "null" policy
 * @invariant nesting is tracked on an explicit stack, never the call stack
 * @complexity O(n + g)
 */
export const makeToJson = (registry: SentinelRegistry, maxDepth: number): ToJson => (root, doc, mapping) => {
  const unsupported = (kind: string): Encoded =>
    mapping.onUnsupported === "fail" ? Either.left(unsupportedValue(kind)) : Either.right(Option.none())

  const arrayFrame = (entries: Iterable<readonly [number, unknown]>): Step =>
    Either.map(mutArray(doc), (node): Frame => ({
      _tag: "array",
      node,
      members: entries[Symbol.iterator](),
      key: 0,
      previous: 0
    }))

  const objectFrame = (entries: Iterable<readonly [string, unknown]>): Step =>
    Either.map(mutObject(doc), (node): Frame => ({
      _tag: "object",
      node,
      members: entries[Symbol.iterator](),
      key: ""
    }))

  const openContainer = (value: object, depth: number): Step => {
    if (depth >= maxDepth) {
      return Either.left(stackExhausted(WriteCode.STACK_EXHAUSTION))
    }
    if (isTable(value)) {
      return Match.value(classifyTable(value, registry)).pipe(
        Match.when("array", () => arrayFrame(tablePositions(value))),
        Match.when("object", () => objectFrame(tableFields(value))),
        Match.exhaustive
      )
    }
    if (Array.isArray(value)) {
      return arrayFrame(listPositions(value))
    }
    if (isPlainObject(value)) {
      return objectFrame(Object.entries(value))
    }
    return unsupported("object")
  }

  const encodeNumber = (value: number): Encoded => {
    if (!Number.isSafeInteger(value)) {
      return created(mutReal(doc, value))
    }
    return created(value > 0 ? mutUint(doc, BigInt(value)) : mutSint(doc, BigInt(value)))
  }

  const encodeBigint = (value: bigint): Encoded => {
    if (value > 0n && value <= UINT64_MAX) {
      return created(mutUint(doc, value))
    }
    if (value <= 0n && value >= INT64_MIN) {
      return created(mutSint(doc, value))
    }
    return unsupported("bigint")
  }

  const start = (value: unknown, depth: number): Step => {
    if (value === null || value === undefined || value === registry.null) {
      return created(mutNull(doc))
    }
    switch (typeof value) {
      case "boolean":
        return created(mutBool(doc, value))
      case "string":
        return created(mutString(doc, value))
      case "number":
        return encodeNumber(value)
      case "bigint":
        return encodeBigint(value)
      case "object":
        return openContainer(value, depth)
      default:
        return unsupported(typeof value)
    }
  }

  const attach = (frame: Frame, encoded: Option.Option<MutNode>): Either.Either<void, OutOfMemory> => {
    if (Option.isNone(encoded)) {
      return Either.right(undefined)
    }
    const value = encoded.value
    if (frame._tag === "object") {
      const object = frame.node
      return Either.map(mutString(doc, frame.key), (name) => {
        objectAdd(object, name, value)
      })
    }
    if (frame.key < frame.previous) {
      arraySet(frame.node, frame.key - 1, value)
      return Either.right(undefined)
    }
    for (let position = frame.previous + 1; position < frame.key; position++) {
      const filler = mutNull(doc)
      if (Either.isLeft(filler)) {
        return Either.left(filler.left)
      }
      arrayAppend(frame.node, filler.right)
    }
    arrayAppend(frame.node, value)
    frame.previous = frame.key
    return Either.right(undefined)
  }

  const stack: Array<Frame> = []
  let step = start(root, 0)
  for (;;) {
    if (Either.isLeft(step)) {
      return Either.left(step.left)
    }
    const outcome = step.right
    let top: Frame
    if (isFrame(outcome)) {
      stack.push(outcome)
      top = outcome
    } else {
      const parent = stack.at(-1)
      if (parent === undefined) {
        return Either.right(outcome)
      }
      const attached = attach(parent, outcome)
      if (Either.isLeft(attached)) {
        return Either.left(attached.left)
      }
      top = parent
    }
    const member = advance(top)
    if (Option.isSome(member)) {
      step = start(member.value, stack.length)
    } else {
      stack.pop()
      step = Either.right(Option.some(top.node))
    }
  }
}
