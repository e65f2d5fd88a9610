import * as Either from "effect/Either"

import type { Allocation, BoundedAllocator, OutOfMemory } from "./allocator.js"

// CHANGE: provide a mutable JSON tree whose values are carved out of allocator-backed chunks
// WHY: the encode direction builds a document under the same budget the writer uses
// QUOTE(TZ): n/a
// REF: req-mutable-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: charged(d) = MUT_DOC_SIZE + Σ (CHUNK_HEADER_SIZE + n_i × MUT_VALUE_SIZE)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a value is only created after its pool slot was paid for
// COMPLEXITY: O(1) amortized per value

export type MutNode =
  | { readonly _tag: "null" }
  | { readonly _tag: "bool"; readonly value: boolean }
  | { readonly _tag: "uint"; readonly value: bigint }
  | { readonly _tag: "sint"; readonly value: bigint }
  | { readonly _tag: "real"; readonly value: number }
  | MutString
  | MutArray
  | MutObject

export interface MutString {
  readonly _tag: "str"
  readonly value: string
}

export interface MutArray {
  readonly _tag: "arr"
  readonly items: Array<MutNode>
}

export interface MutObject {
  readonly _tag: "obj"
  readonly entries: Array<readonly [MutString, MutNode]>
}

export interface MutableDocument {
  readonly allocator: BoundedAllocator
  readonly chunks: Array<Allocation>
  readonly header: Allocation
  root: MutNode | undefined
  free: number
  nextChunk: number
}

export const MUT_DOC_SIZE = 64
export const MUT_VALUE_SIZE = 24
export const CHUNK_HEADER_SIZE = 16
const FIRST_CHUNK_VALUES = 16
const MAX_CHUNK_VALUES = 0x1000000

type Created<A> = Either.Either<A, OutOfMemory>

export const createMutableDocument = (allocator: BoundedAllocator): Created<MutableDocument> =>
  Either.map(allocator.allocate(MUT_DOC_SIZE), (header) => ({
    allocator,
    chunks: [],
    header,
    root: undefined,
    free: 0,
    nextChunk: FIRST_CHUNK_VALUES
  }))

const claim = <A extends MutNode>(doc: MutableDocument, node: A): Created<A> => {
  if (doc.free > 0) {
    doc.free -= 1
    return Either.right(node)
  }
  const count = doc.nextChunk
  return Either.map(doc.allocator.allocate(CHUNK_HEADER_SIZE + count * MUT_VALUE_SIZE), (chunk) => {
    doc.chunks.push(chunk)
    doc.free = count - 1
    doc.nextChunk = Math.min(count * 2, MAX_CHUNK_VALUES)
    return node
  })
}

export const mutNull = (doc: MutableDocument): Created<MutNode> => claim(doc, { _tag: "null" })

export const mutBool = (doc: MutableDocument, value: boolean): Created<MutNode> =>
  claim(doc, { _tag: "bool", value })

export const mutUint = (doc: MutableDocument, value: bigint): Created<MutNode> =>
  claim(doc, { _tag: "uint", value })

export const mutSint = (doc: MutableDocument, value: bigint): Created<MutNode> =>
  claim(doc, { _tag: "sint", value })

export const mutReal = (doc: MutableDocument, value: number): Created<MutNode> =>
  claim(doc, { _tag: "real", value })

export const mutString = (doc: MutableDocument, value: string): Created<MutString> =>
  claim(doc, { _tag: "str", value })

export const mutArray = (doc: MutableDocument): Created<MutArray> => claim(doc, { _tag: "arr", items: [] })

export const mutObject = (doc: MutableDocument): Created<MutObject> => claim(doc, { _tag: "obj", entries: [] })

export const arrayAppend = (array: MutArray, value: MutNode): void => {
  array.items.push(value)
}

/** Replace the element at 0-based `index`; the array must already be that long. */
export const arraySet = (array: MutArray, index: number, value: MutNode): boolean => {
  if (index < 0 || index >= array.items.length) {
    return false
  }
  array.items[index] = value
  return true
}

export const objectAdd = (
  object: MutObject,
  key: MutString,
  value: MutNode
): void => {
  object.entries.push([key, value])
}

export const setRoot = (doc: MutableDocument, root: MutNode): void => {
  doc.root = root
}

export const freeMutableDocument = (doc: MutableDocument): void => {
  for (const chunk of doc.chunks) {
    doc.allocator.free(chunk)
  }
  doc.chunks.length = 0
  doc.free = 0
  doc.root = undefined
  doc.allocator.free(doc.header)
}
