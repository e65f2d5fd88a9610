import * as Either from "effect/Either"

import { InvariantViolation } from "./errors.js"

// CHANGE: bound every engine allocation of one call by a byte ceiling
// WHY: decode and encode must fail early when the caller's memory budget is spent
// QUOTE(TZ): "maxMemory" | n/a
// REF: req-allocator-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: usage(t) = Σ size(r) for live records r ∧ (limit > 0 → usage(t) ≤ limit)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a failed request leaves usage and records untouched and sets outOfMemory
// COMPLEXITY: O(1) per operation (amortized)

/** Primitive allocate/reallocate/free triple that actually hands out memory. */
export interface RawAllocator {
  readonly allocate: (size: number) => Uint8Array | undefined
  readonly reallocate: (block: Uint8Array, size: number) => Uint8Array | undefined
  readonly free: (block: Uint8Array) => void
}

export const heapAllocator: RawAllocator = {
  allocate: (size) => new Uint8Array(size),
  reallocate: (block, size) => {
    const next = new Uint8Array(size)
    next.set(block.subarray(0, Math.min(block.length, size)))
    return next
  },
  free: () => {}
}

/** Opaque handle for one live allocation. */
export interface Allocation {
  readonly index: number
  readonly size: number
  readonly bytes: Uint8Array
}

export type OutOfMemory = {
  readonly _tag: "OutOfMemory"
  readonly requested: number
  readonly usage: number
  readonly limit: number
}

export interface BoundedAllocator {
  readonly limit: number
  readonly usage: () => number
  readonly outOfMemory: () => boolean
  readonly allocate: (size: number) => Either.Either<Allocation, OutOfMemory>
  readonly reallocate: (handle: Allocation, size: number) => Either.Either<Allocation, OutOfMemory>
  readonly free: (handle: Allocation) => void
  readonly dispose: () => void
}

interface AllocationRecord {
  readonly block: Uint8Array
  readonly size: number
}

/**
 * Create an allocator scoped to a single decode or encode call.
 *
 * @param maxBytes - Ceiling in bytes; 0 (or a negative value) means unlimited.
 * @param raw - Primitive allocator the records are backed by.
 *
 * @pure false
 * @invariant the arena is never shared between allocator instances
 * @complexity O(1)
 */
export const makeBoundedAllocator = (
  maxBytes: number,
  raw: RawAllocator = heapAllocator
): BoundedAllocator => {
  const limit = maxBytes > 0 ? maxBytes : 0
  const arena: Array<AllocationRecord | undefined> = []
  const vacant: Array<number> = []
  let usage = 0
  let nomem = false

  const exhausted = (requested: number, base: number): Either.Either<Allocation, OutOfMemory> => {
    nomem = true
    return Either.left({ _tag: "OutOfMemory", requested, usage: base, limit })
  }

  const exceeds = (base: number, size: number): boolean =>
    Number.MAX_SAFE_INTEGER - size < base || (limit > 0 && base + size > limit)

  const insert = (record: AllocationRecord): Allocation => {
    const index = vacant.pop() ?? arena.length
    arena[index] = record
    usage += record.size
    return { index, size: record.size, bytes: record.block }
  }

  const lookup = (handle: Allocation, operation: string): AllocationRecord => {
    const record = arena[handle.index]
    if (record === undefined || record.block !== handle.bytes) {
      throw new InvariantViolation(`${operation} of an allocation this allocator does not own`)
    }
    return record
  }

  const remove = (index: number, record: AllocationRecord): void => {
    arena[index] = undefined
    vacant.push(index)
    usage -= record.size
  }

  return {
    limit,
    usage: () => usage,
    outOfMemory: () => nomem,
    allocate: (size) => {
      if (exceeds(usage, size)) {
        return exhausted(size, usage)
      }
      const block = raw.allocate(size)
      if (block === undefined) {
        return exhausted(size, usage)
      }
      return Either.right(insert({ block, size }))
    },
    reallocate: (handle, size) => {
      const record = lookup(handle, "reallocate")
      const base = usage - record.size
      if (exceeds(base, size)) {
        return exhausted(size, usage)
      }
      const block = raw.reallocate(record.block, size)
      if (block === undefined) {
        return exhausted(size, usage)
      }
      remove(handle.index, record)
      return Either.right(insert({ block, size }))
    },
    free: (handle) => {
      const record = lookup(handle, "free")
      raw.free(record.block)
      remove(handle.index, record)
    },
    dispose: () => {
      if (usage !== 0) {
        throw new InvariantViolation(`allocator disposed with ${usage} bytes still in use`)
      }
    }
  }
}

/**
 * Run `use` with a fresh allocator and dispose it afterwards on every path.
 *
 * @pure false
 * @invariant the allocator never escapes `use`
 */
export const withBoundedAllocator = <A>(
  maxBytes: number,
  raw: RawAllocator,
  use: (allocator: BoundedAllocator) => A
): A => {
  const allocator = makeBoundedAllocator(maxBytes, raw)
  try {
    return use(allocator)
  } finally {
    allocator.dispose()
  }
}
