import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { BoundedAllocator } from "./allocator.js"
import { withBoundedAllocator } from "./allocator.js"
import type { DecodeError, EncodeError } from "./errors.js"
import { invalidParameter, memoryError, readError, writeError } from "./errors.js"
import { hasFlag, PADDING_SIZE, ReadCode, ReadFlag } from "./flags.js"
import { makeValueMapper } from "./mapper.js"
import type { MutableDocument } from "./mutable.js"
import { createMutableDocument, freeMutableDocument, mutNull, setRoot } from "./mutable.js"
import type { DecodeOptions, EncodeOptions, ResolvedDecodeOptions, ResolvedEncodeOptions } from "./options.js"
import { resolveDecodeOptions, resolveEncodeOptions } from "./options.js"
import { freeDocument, readDocument } from "./reader.js"
import type { DynamicValue } from "./value.js"
import { writeDocument } from "./writer.js"

// CHANGE: expose decode/encode as single calls that own their allocator end to end
// WHY: a call either returns a complete value or a typed error, and never leaves memory charged
// QUOTE(TZ): "decode" | "encode"
// REF: req-facade-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v, o: decode(encode(v, o)) = Right(v') where v' ≅ v modulo container markers
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: allocator usage is 0 when decode or encode returns
// COMPLEXITY: O(n)/O(n)

export interface Decoded {
  readonly value: DynamicValue
  /** Bytes of input consumed by the reader. */
  readonly consumed: number
}

const utf8 = new TextEncoder()
const text = new TextDecoder()

const toBytes = (input: string | Uint8Array): Uint8Array => typeof input === "string" ? utf8.encode(input) : input

const readRoot = (
  bytes: Uint8Array,
  length: number,
  options: ResolvedDecodeOptions,
  allocator: BoundedAllocator
): Either.Either<Decoded, DecodeError> => {
  const read = readDocument(bytes, length, options.flags, allocator)
  if (Either.isLeft(read)) {
    const { code, message, position } = read.left
    return Either.left(readError(code, message, position))
  }
  const doc = read.right
  const mapper = makeValueMapper(options.sentinels, { maxDepth: options.maxDepth })
  const value = mapper.toDynamic(doc.root, options)
  freeDocument(doc)
  return Either.map(value, (decoded) => ({ value: decoded, consumed: doc.readSize }))
}

/**
 * Decode a JSON text into a dynamic value.
 *
 * With `ReadFlag.INSITU` the last `PADDING_SIZE` bytes of `input` are padding and
 * are not parsed. With `ReadFlag.STOP_WHEN_DONE`, `consumed` is the offset right
 * after the first document.
 *
 * @param input - JSON text, or its UTF-8 bytes.
 * @param options - Mapping, memory and reader options.
 *
 * @pure true
 * @invariant the allocator is disposed on every path
 * @complexity O(n)
 */
export const decode = (
  input: string | Uint8Array,
  options: DecodeOptions = {}
): Either.Either<Decoded, DecodeError> =>
  Either.flatMap(resolveDecodeOptions(options), (resolved) => {
    const bytes = toBytes(input)
    const insitu = hasFlag(resolved.flags, ReadFlag.INSITU)
    const length = insitu ? bytes.length - PADDING_SIZE : bytes.length
    if (length < 0) {
      return Either.left(
        invalidParameter(ReadCode.INVALID_PARAMETER, `in-situ input must end with ${PADDING_SIZE} padding bytes`)
      )
    }
    return withBoundedAllocator(
      resolved.maxMemory,
      resolved.rawAllocator,
      (allocator) => readRoot(bytes, length, resolved, allocator)
    )
  })

const writeRoot = (
  value: unknown,
  doc: MutableDocument,
  options: ResolvedEncodeOptions,
  allocator: BoundedAllocator
): Either.Either<string, EncodeError> => {
  const mapper = makeValueMapper(options.sentinels, { maxDepth: options.maxDepth })
  const mapped = mapper.toJson(value, doc, options)
  if (Either.isLeft(mapped)) {
    const failure = mapped.left
    return Either.left(failure._tag === "OutOfMemory" ? memoryError() : failure)
  }
  if (allocator.outOfMemory()) {
    return Either.left(memoryError())
  }
  const root = Option.isSome(mapped.right) ? Either.right(mapped.right.value) : mutNull(doc)
  if (Either.isLeft(root)) {
    return Either.left(memoryError())
  }
  setRoot(doc, root.right)

  const written = writeDocument(doc, options.flags, allocator)
  if (Either.isLeft(written)) {
    return Either.left(writeError(written.left.code, written.left.message))
  }
  const { allocation, length } = written.right
  const json = text.decode(allocation.bytes.subarray(0, length))
  allocator.free(allocation)
  return Either.right(json)
}

/**
 * Encode a dynamic value as JSON text.
 *
 * @param value - Value to encode; tables, arrays and plain objects become containers.
 * @param options - Encoding, memory and writer options.
 *
 * @pure true
 * @invariant a memory failure anywhere in the call is reported as `MemoryError`
 * @complexity O(n)
 */
export const encode = (value: unknown, options: EncodeOptions = {}): Either.Either<string, EncodeError> =>
  Either.flatMap(resolveEncodeOptions(options), (resolved) =>
    withBoundedAllocator(resolved.maxMemory, resolved.rawAllocator, (allocator) => {
      const created = createMutableDocument(allocator)
      if (Either.isLeft(created)) {
        return Either.left(memoryError())
      }
      const doc = created.right
      const result = writeRoot(value, doc, resolved, allocator)
      freeMutableDocument(doc)
      return result
    }))

export type DecodeTuple =
  | readonly [value: DynamicValue, message: null, code: null, consumed: number]
  | readonly [value: null, message: string, code: number]

export type EncodeTuple =
  | readonly [json: string]
  | readonly [json: null, message: string, code: number]

/** Positional form of a decode result: `[value, null, null, consumed]` or `[null, message, code]`. */
export const toDecodeTuple = (result: Either.Either<Decoded, DecodeError>): DecodeTuple =>
  Either.match(result, {
    onLeft: (error): DecodeTuple => [null, error.message, error.code],
    onRight: (decoded): DecodeTuple => [decoded.value, null, null, decoded.consumed]
  })

/** Positional form of an encode result: `[json]` or `[null, message, code]`. */
export const toEncodeTuple = (result: Either.Either<string, EncodeError>): EncodeTuple =>
  Either.match(result, {
    onLeft: (error): EncodeTuple => [null, error.message, error.code],
    onRight: (json): EncodeTuple => [json]
  })
