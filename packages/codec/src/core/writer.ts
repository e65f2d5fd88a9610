import * as Either from "effect/Either"

import type { Allocation, BoundedAllocator } from "./allocator.js"
import { hasFlag, WriteCode, WriteFlag } from "./flags.js"
import type { MutableDocument, MutArray, MutNode, MutObject, MutString } from "./mutable.js"

// CHANGE: serialize a mutable document into an allocator-owned UTF-8 buffer
// WHY: the output buffer is part of the call's memory budget and is released by the caller
// QUOTE(TZ): n/a
// REF: req-writer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: write(d) = Right(o) → utf8(o.allocation.bytes[0..o.length]) is a JSON text
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: on failure the output buffer has already been freed
// COMPLEXITY: O(n) where n = output length, O(d) stack where d = nesting depth

export interface WrittenOutput {
  readonly allocation: Allocation
  readonly length: number
}

export interface WriteFailure {
  readonly code: WriteCode
  readonly message: string
}

const INITIAL_OUTPUT_SIZE = 64
const encoder = new TextEncoder()

const namedEscapes: ReadonlyMap<number, string> = new Map([
  [0x08, "\\b"],
  [0x09, "\\t"],
  [0x0a, "\\n"],
  [0x0c, "\\f"],
  [0x0d, "\\r"],
  [0x22, "\\\""],
  [0x5c, "\\\\"]
])

const unicodeEscape = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

export interface WriterOptions {
  readonly indent: string
  readonly escapeUnicode: boolean
  readonly escapeSlashes: boolean
  readonly allowInfAndNan: boolean
  readonly infAndNanAsNull: boolean
  readonly allowInvalidUnicode: boolean
}

export const resolveWriterOptions = (flags: number): WriterOptions => ({
  indent: hasFlag(flags, WriteFlag.PRETTY_TWO_SPACES)
    ? "  "
    : hasFlag(flags, WriteFlag.PRETTY)
    ? "    "
    : "",
  escapeUnicode: hasFlag(flags, WriteFlag.ESCAPE_UNICODE),
  escapeSlashes: hasFlag(flags, WriteFlag.ESCAPE_SLASHES),
  allowInfAndNan: hasFlag(flags, WriteFlag.ALLOW_INF_AND_NAN),
  infAndNanAsNull: hasFlag(flags, WriteFlag.INF_AND_NAN_AS_NULL),
  allowInvalidUnicode: hasFlag(flags, WriteFlag.ALLOW_INVALID_UNICODE)
})

/**
 * Quote and escape a string; `undefined` when it holds a lone surrogate that may not be written.
 *
 * @pure true
 * @complexity O(n)
 */
export const escapeString = (value: string, options: WriterOptions): string | undefined => {
  const parts: Array<string> = ["\""]
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i)
    const named = namedEscapes.get(code)
    if (named !== undefined) {
      parts.push(named)
    } else if (code < 0x20) {
      parts.push(unicodeEscape(code))
    } else if (code === 0x2f && options.escapeSlashes) {
      parts.push("\\/")
    } else if (code < 0x80) {
      parts.push(value.charAt(i))
    } else if (isHighSurrogate(code) && isLowSurrogate(value.charCodeAt(i + 1))) {
      const low = value.charCodeAt(i + 1)
      parts.push(options.escapeUnicode ? unicodeEscape(code) + unicodeEscape(low) : value.slice(i, i + 2))
      i += 1
    } else if (isHighSurrogate(code) || isLowSurrogate(code)) {
      if (!options.allowInvalidUnicode) {
        return undefined
      }
      parts.push(options.escapeUnicode ? unicodeEscape(0xfffd) : "\ufffd")
    } else {
      parts.push(options.escapeUnicode ? unicodeEscape(code) : value.charAt(i))
    }
  }
  parts.push("\"")
  return parts.join("")
}

/**
 * Render a double; non-finite values follow the inf/nan flags.
 *
 * Integral values get a `.0` suffix. The value mapper sends safe integers
 * through `mutUint`/`mutSint`, so through `encode` only integral doubles
 * outside the safe range reach this suffix; `decode("1.0")` re-encodes as `1`.
 *
 * @pure true
 */
export const formatReal = (value: number, options: WriterOptions): string | undefined => {
  if (!Number.isFinite(value)) {
    if (options.infAndNanAsNull) {
      return "null"
    }
    if (!options.allowInfAndNan) {
      return undefined
    }
    return Number.isNaN(value) ? "NaN" : value > 0 ? "Infinity" : "-Infinity"
  }
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  const text = String(value)
  return /^-?\d+$/.test(text) ? `${text}.0` : text
}

class OutputBuffer {
  length = 0

  constructor(private readonly allocator: BoundedAllocator, public allocation: Allocation) {}

  append(text: string): boolean {
    const bytes = encoder.encode(text)
    const needed = this.length + bytes.length
    if (needed > this.allocation.size) {
      const size = Math.max(needed, Math.ceil(this.allocation.size * 1.5))
      const grown = this.allocator.reallocate(this.allocation, size)
      if (Either.isLeft(grown)) {
        return false
      }
      this.allocation = grown.right
    }
    this.allocation.bytes.set(bytes, this.length)
    this.length = needed
    return true
  }
}

interface WriteFrame {
  readonly node: MutArray | MutObject
  readonly level: number
  index: number
}

const memberAt = (node: MutArray | MutObject, index: number): readonly [MutString | undefined, MutNode] | undefined => {
  if (node._tag === "obj") {
    return node.entries[index]
  }
  const item = node.items[index]
  return item === undefined ? undefined : [undefined, item]
}

class DocumentWriter {
  private failure: WriteFailure = { code: WriteCode.SUCCESS, message: "" }

  constructor(private readonly out: OutputBuffer, private readonly options: WriterOptions) {}

  get error(): WriteFailure {
    return this.failure
  }

  private fail(code: WriteCode, message: string): false {
    this.failure = { code, message }
    return false
  }

  private emit(text: string): boolean {
    return this.out.append(text) || this.fail(WriteCode.MEMORY_ALLOCATION, "memory allocation failed")
  }

  private newline(level: number): boolean {
    return this.options.indent === "" || this.emit(`\n${this.options.indent.repeat(level)}`)
  }

  write(root: MutNode): boolean {
    const stack: Array<WriteFrame> = []
    let current: MutNode = root
    for (;;) {
      if (!this.writeValue(current, stack)) {
        return false
      }
      let next: MutNode | undefined
      while (next === undefined) {
        const top = stack.at(-1)
        if (top === undefined) {
          return true
        }
        const member = memberAt(top.node, top.index)
        if (member === undefined) {
          stack.pop()
          if (!this.newline(top.level) || !this.emit(top.node._tag === "arr" ? "]" : "}")) {
            return false
          }
          continue
        }
        if (top.index > 0 && !this.emit(",")) {
          return false
        }
        top.index++
        const [key, value] = member
        if (!this.newline(top.level + 1) || (key !== undefined && !this.writeKey(key))) {
          return false
        }
        next = value
      }
      current = next
    }
  }

  private writeValue(node: MutNode, stack: Array<WriteFrame>): boolean {
    switch (node._tag) {
      case "null":
        return this.emit("null")
      case "bool":
        return this.emit(node.value ? "true" : "false")
      case "uint":
      case "sint":
        return this.emit(node.value.toString())
      case "real": {
        const text = formatReal(node.value, this.options)
        return text === undefined
          ? this.fail(WriteCode.NAN_OR_INF, "nan or inf number is not allowed")
          : this.emit(text)
      }
      case "str":
        return this.writeString(node.value)
      case "arr":
      case "obj":
        return this.openContainer(node, stack)
    }
  }

  private openContainer(node: MutArray | MutObject, stack: Array<WriteFrame>): boolean {
    const open = node._tag === "arr" ? "[" : "{"
    if (memberAt(node, 0) === undefined) {
      return this.emit(node._tag === "arr" ? "[]" : "{}")
    }
    stack.push({ node, level: stack.length, index: 0 })
    return this.emit(open)
  }

  private writeKey(key: MutString): boolean {
    return this.writeString(key.value) && this.emit(this.options.indent === "" ? ":" : ": ")
  }

  private writeString(value: string): boolean {
    const text = escapeString(value, this.options)
    return text === undefined
      ? this.fail(WriteCode.INVALID_VALUE_TYPE, "invalid utf-8 encoding in string")
      : this.emit(text)
  }
}

/**
 * Serialize `doc` with the given write flags.
 *
 * @param doc - Document whose root has been set.
 * @param flags - Bitwise combination of `WriteFlag` values.
 * @param allocator - Allocator that owns the returned output buffer.
 * @returns The output allocation and its used length, or the engine failure.
 *
 * @pure false
 * @invariant the caller must free `allocation` through the same allocator
 * @complexity O(n)
 */
export const writeDocument = (
  doc: MutableDocument,
  flags: number,
  allocator: BoundedAllocator
): Either.Either<WrittenOutput, WriteFailure> => {
  const root = doc.root
  if (root === undefined) {
    return Either.left({ code: WriteCode.INVALID_PARAMETER, message: "input document has no root value" })
  }
  const initial = allocator.allocate(INITIAL_OUTPUT_SIZE)
  if (Either.isLeft(initial)) {
    return Either.left({ code: WriteCode.MEMORY_ALLOCATION, message: "memory allocation failed" })
  }
  const out = new OutputBuffer(allocator, initial.right)
  const writer = new DocumentWriter(out, resolveWriterOptions(flags))
  if (!writer.write(root)) {
    allocator.free(out.allocation)
    return Either.left(writer.error)
  }
  return Either.right({ allocation: out.allocation, length: out.length })
}
