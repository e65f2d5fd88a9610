import type { Sentinel, SentinelRegistry } from "./sentinel.js"
import { sentinels } from "./sentinel.js"

// CHANGE: define the dynamic value domain the mapper produces and consumes
// WHY: tables carry both array positions and object fields in one container
// QUOTE(TZ): n/a
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t ∈ Table: length(t) = max{n | ∀i ≤ n: t.has(i)}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: decode never stores null inside a table
// COMPLEXITY: O(1)/O(1)

export type TableKey = number | string

/** Associative container with host-table semantics; positive integer keys are 1-based positions. */
export type Table = Map<TableKey, DynamicValue>

export type DynamicValue = null | boolean | number | bigint | string | Sentinel | Table

/** Slot right before the first array position; holds a container-intent sentinel. */
export const MARKER_KEY = -1

export const isTable = (value: unknown): value is Table => value instanceof Map

export const isPosition = (key: unknown): key is number =>
  typeof key === "number" && Number.isInteger(key) && key > 0

/**
 * Border of a table: the number of contiguous positions starting at 1.
 *
 * @pure true
 * @complexity O(n)
 */
export const tableLength = (table: ReadonlyMap<TableKey, unknown>): number => {
  let length = 0
  while (table.has(length + 1)) {
    length += 1
  }
  return length
}

export const makeTable = (entries: Iterable<readonly [TableKey, DynamicValue]> = []): Table =>
  new Map<TableKey, DynamicValue>(entries)

/** Build a table tagged as a JSON array, storing `items` at positions 1..n. */
export const asArrayTable = (
  items: ReadonlyArray<DynamicValue>,
  registry: SentinelRegistry = sentinels
): Table => {
  const table: Table = new Map<TableKey, DynamicValue>([[MARKER_KEY, registry.asArray]])
  items.forEach((item, index) => {
    if (item !== null) {
      table.set(index + 1, item)
    }
  })
  return table
}

/** Build a table tagged as a JSON object from a plain record. */
export const asObjectTable = (
  record: Readonly<Record<string, DynamicValue>>,
  registry: SentinelRegistry = sentinels
): Table => {
  const table: Table = new Map<TableKey, DynamicValue>([[MARKER_KEY, registry.asObject]])
  for (const [key, value] of Object.entries(record)) {
    table.set(key, value)
  }
  return table
}
