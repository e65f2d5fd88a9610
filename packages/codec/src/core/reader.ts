import * as Either from "effect/Either"

import type { Allocation, BoundedAllocator } from "./allocator.js"
import { InvariantViolation } from "./errors.js"
import { hasFlag, PADDING_SIZE, ReadCode, ReadFlag } from "./flags.js"

// CHANGE: read JSON bytes into an immutable node tree through the bounded allocator
// WHY: the value mapper walks a typed tree, and every byte the reader holds counts against the call budget
// QUOTE(TZ): n/a
// REF: req-reader-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: read(b) = Right(d) → d.readSize ≤ |b| ∧ d.root is a complete JSON value
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: nesting depth is tracked on an explicit stack, never on the call stack
// COMPLEXITY: O(n) where n = input length

export const NodeType = {
  NONE: 0,
  RAW: 1,
  NULL: 2,
  BOOL: 3,
  NUM: 4,
  STR: 5,
  ARR: 6,
  OBJ: 7
} as const

export type ReadNode =
  | { readonly _tag: "null" }
  | { readonly _tag: "bool"; readonly value: boolean }
  | { readonly _tag: "uint"; readonly value: bigint }
  | { readonly _tag: "sint"; readonly value: bigint }
  | { readonly _tag: "real"; readonly value: number }
  | { readonly _tag: "str"; readonly value: string }
  | { readonly _tag: "raw"; readonly value: string }
  | { readonly _tag: "arr"; readonly items: ReadonlyArray<ReadNode> }
  | { readonly _tag: "obj"; readonly entries: ReadonlyArray<readonly [string, ReadNode]> }

export interface ReadFailure {
  readonly code: ReadCode
  readonly message: string
  readonly position: number
}

export interface ReadDocument {
  readonly root: ReadNode
  readonly readSize: number
  readonly allocator: BoundedAllocator
  readonly allocations: ReadonlyArray<Allocation>
}

export const DOC_HEADER_SIZE = 32
export const NODE_SIZE = 16
const ESTIMATED_BYTES_PER_NODE = 6

const UINT64_MAX = (1n << 64n) - 1n
const INT64_MIN = -(1n << 63n)

const EOF = -1
const TAB = 0x09
const LF = 0x0a
const CR = 0x0d
const SPACE = 0x20
const QUOTE = 0x22
const PLUS = 0x2b
const COMMA = 0x2c
const MINUS = 0x2d
const DOT = 0x2e
const SLASH = 0x2f
const ZERO = 0x30
const NINE = 0x39
const COLON = 0x3a
const STAR = 0x2a
const LBRACKET = 0x5b
const BACKSLASH = 0x5c
const RBRACKET = 0x5d
const LBRACE = 0x7b
const RBRACE = 0x7d

const simpleEscapes: ReadonlyMap<number, string> = new Map([
  [0x22, "\""],
  [0x5c, "\\"],
  [0x2f, "/"],
  [0x62, "\b"],
  [0x66, "\f"],
  [0x6e, "\n"],
  [0x72, "\r"],
  [0x74, "\t"]
])

const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })
const lenientDecoder = new TextDecoder("utf-8", { fatal: false, ignoreBOM: true })

const isDigit = (c: number): boolean => c >= ZERO && c <= NINE

const hexValue = (c: number): number => {
  if (c >= ZERO && c <= NINE) {
    return c - ZERO
  }
  const lower = c | 0x20
  if (lower >= 0x61 && lower <= 0x66) {
    return lower - 0x61 + 10
  }
  return -1
}

const decodeStrict = (bytes: Uint8Array): string | undefined => {
  try {
    return strictDecoder.decode(bytes)
  } catch {
    return undefined
  }
}

export const nodeType = (node: ReadNode): number => {
  switch (node._tag) {
    case "null":
      return NodeType.NULL
    case "bool":
      return NodeType.BOOL
    case "uint":
    case "sint":
    case "real":
      return NodeType.NUM
    case "str":
      return NodeType.STR
    case "raw":
      return NodeType.RAW
    case "arr":
      return NodeType.ARR
    case "obj":
      return NodeType.OBJ
  }
}

type Frame =
  | { readonly _tag: "arr"; readonly items: Array<ReadNode> }
  | { readonly _tag: "obj"; readonly entries: Array<readonly [string, ReadNode]>; key: string }

type Separator = "next" | "close"

class DocumentReader {
  private pos = 0
  private count = 0
  private failure: ReadFailure | undefined

  private readonly allowComments: boolean
  private readonly allowTrailingCommas: boolean
  private readonly allowInfAndNan: boolean
  private readonly allowInvalidUnicode: boolean
  private readonly numberAsRaw: boolean
  private readonly bignumAsRaw: boolean

  constructor(
    private readonly buf: Uint8Array,
    private readonly end: number,
    private readonly flags: number,
    private readonly allocator: BoundedAllocator,
    public pool: Allocation,
    private capacity: number
  ) {
    this.allowComments = hasFlag(flags, ReadFlag.ALLOW_COMMENTS)
    this.allowTrailingCommas = hasFlag(flags, ReadFlag.ALLOW_TRAILING_COMMAS)
    this.allowInfAndNan = hasFlag(flags, ReadFlag.ALLOW_INF_AND_NAN)
    this.allowInvalidUnicode = hasFlag(flags, ReadFlag.ALLOW_INVALID_UNICODE)
    this.numberAsRaw = hasFlag(flags, ReadFlag.NUMBER_AS_RAW)
    this.bignumAsRaw = hasFlag(flags, ReadFlag.BIGNUM_AS_RAW)
  }

  read(): Either.Either<{ readonly root: ReadNode; readonly readSize: number }, ReadFailure> {
    if (this.byte(0) === 0xef && this.byte(1) === 0xbb && this.byte(2) === 0xbf) {
      this.fail(ReadCode.UNEXPECTED_CONTENT, "byte order mark (BOM) is not supported", 0)
      return this.failed()
    }
    if (!this.skipSpace()) {
      return this.failed()
    }
    if (this.pos >= this.end) {
      this.fail(ReadCode.EMPTY_CONTENT, "input data is empty", this.pos)
      return this.failed()
    }
    const root = this.readRoot()
    if (root === undefined) {
      return this.failed()
    }
    if (!hasFlag(this.flags, ReadFlag.STOP_WHEN_DONE)) {
      if (!this.skipSpace()) {
        return this.failed()
      }
      if (this.pos < this.end) {
        this.fail(ReadCode.UNEXPECTED_CONTENT, "unexpected content after document", this.pos)
        return this.failed()
      }
    }
    return Either.right({ root, readSize: this.pos })
  }

  private failed(): Either.Either<never, ReadFailure> {
    if (this.failure === undefined) {
      throw new InvariantViolation("reader stopped without recording a failure")
    }
    return Either.left(this.failure)
  }

  private fail(code: ReadCode, message: string, position: number): undefined {
    this.failure = { code, message, position }
    return undefined
  }

  private byte(index: number): number {
    return index < this.end ? this.buf[index] ?? EOF : EOF
  }

  private reserve(): boolean {
    if (this.count < this.capacity) {
      this.count += 1
      return true
    }
    const capacity = this.capacity * 2
    const grown = this.allocator.reallocate(this.pool, DOC_HEADER_SIZE + capacity * NODE_SIZE)
    if (Either.isLeft(grown)) {
      this.fail(ReadCode.MEMORY_ALLOCATION, "memory allocation failed", this.pos)
      return false
    }
    this.pool = grown.right
    this.capacity = capacity
    this.count += 1
    return true
  }

  private skipSpace(): boolean {
    for (;;) {
      const c = this.byte(this.pos)
      if (c === SPACE || c === TAB || c === LF || c === CR) {
        this.pos += 1
        continue
      }
      if (c !== SLASH || !this.allowComments) {
        return true
      }
      const next = this.byte(this.pos + 1)
      if (next === SLASH) {
        this.pos += 2
        while (this.pos < this.end && this.byte(this.pos) !== LF) {
          this.pos += 1
        }
        continue
      }
      if (next !== STAR) {
        return true
      }
      const start = this.pos
      this.pos += 2
      while (this.pos < this.end && !(this.byte(this.pos) === STAR && this.byte(this.pos + 1) === SLASH)) {
        this.pos += 1
      }
      if (this.pos >= this.end) {
        this.fail(ReadCode.INVALID_COMMENT, "unclosed multiline comment", start)
        return false
      }
      this.pos += 2
    }
  }

  private readRoot(): ReadNode | undefined {
    const stack: Array<Frame> = []
    for (;;) {
      let node: ReadNode
      const c = this.byte(this.pos)
      if (c === LBRACKET || c === LBRACE) {
        if (!this.reserve()) {
          return undefined
        }
        this.pos += 1
        if (!this.skipSpace()) {
          return undefined
        }
        const opened = this.openContainer(c)
        if (opened === undefined) {
          return undefined
        }
        if (opened !== "empty") {
          stack.push(opened)
          continue
        }
        node = c === LBRACKET ? { _tag: "arr", items: [] } : { _tag: "obj", entries: [] }
      } else {
        const scalar = this.readScalar()
        if (scalar === undefined) {
          return undefined
        }
        node = scalar
      }

      for (;;) {
        const top = stack[stack.length - 1]
        if (top === undefined) {
          return node
        }
        if (top._tag === "arr") {
          top.items.push(node)
        } else {
          top.entries.push([top.key, node])
        }
        if (!this.skipSpace()) {
          return undefined
        }
        const separator = this.readSeparator(top)
        if (separator === undefined) {
          return undefined
        }
        if (separator === "next") {
          break
        }
        stack.pop()
        node = top._tag === "arr" ? { _tag: "arr", items: top.items } : { _tag: "obj", entries: top.entries }
      }
    }
  }

  private openContainer(open: number): Frame | "empty" | undefined {
    const c = this.byte(this.pos)
    if (c === (open === LBRACKET ? RBRACKET : RBRACE)) {
      this.pos += 1
      return "empty"
    }
    if (open === LBRACKET) {
      return { _tag: "arr", items: [] }
    }
    const key = this.readKey()
    return key === undefined ? undefined : { _tag: "obj", entries: [], key }
  }

  private readSeparator(top: Frame): Separator | undefined {
    const close = top._tag === "arr" ? RBRACKET : RBRACE
    const c = this.byte(this.pos)
    if (c === close) {
      this.pos += 1
      return "close"
    }
    if (c === COMMA) {
      this.pos += 1
      if (!this.skipSpace()) {
        return undefined
      }
      if (this.byte(this.pos) === close) {
        if (!this.allowTrailingCommas) {
          return this.fail(ReadCode.JSON_STRUCTURE, "trailing comma is not allowed", this.pos)
        }
        this.pos += 1
        return "close"
      }
      if (top._tag === "obj") {
        const key = this.readKey()
        if (key === undefined) {
          return undefined
        }
        top.key = key
      }
      return "next"
    }
    if (c === EOF) {
      return this.fail(ReadCode.UNEXPECTED_END, "unexpected end of data", this.pos)
    }
    return this.fail(
      ReadCode.JSON_STRUCTURE,
      top._tag === "arr"
        ? "unexpected character, expected a comma or a closing bracket"
        : "unexpected character, expected a comma or a closing brace",
      this.pos
    )
  }

  private readKey(): string | undefined {
    const c = this.byte(this.pos)
    if (c === EOF) {
      return this.fail(ReadCode.UNEXPECTED_END, "unexpected end of data", this.pos)
    }
    if (c !== QUOTE) {
      return this.fail(ReadCode.JSON_STRUCTURE, "unexpected character, expected a string for object key", this.pos)
    }
    const key = this.readString()
    if (key === undefined || !this.skipSpace()) {
      return undefined
    }
    const colon = this.byte(this.pos)
    if (colon !== COLON) {
      return colon === EOF
        ? this.fail(ReadCode.UNEXPECTED_END, "unexpected end of data", this.pos)
        : this.fail(ReadCode.JSON_STRUCTURE, "unexpected character, expected a colon after object key", this.pos)
    }
    this.pos += 1
    return this.skipSpace() ? key : undefined
  }

  private readScalar(): ReadNode | undefined {
    const c = this.byte(this.pos)
    if (c === EOF) {
      return this.fail(ReadCode.UNEXPECTED_END, "unexpected end of data", this.pos)
    }
    if (c === QUOTE) {
      const value = this.readString()
      return value === undefined ? undefined : { _tag: "str", value }
    }
    if (c === MINUS || isDigit(c)) {
      return this.readNumber()
    }
    if (c === 0x74) {
      return this.readLiteral("true", { _tag: "bool", value: true })
    }
    if (c === 0x66) {
      return this.readLiteral("false", { _tag: "bool", value: false })
    }
    if (c === 0x6e && this.matches(this.pos, "null", false)) {
      return this.readLiteral("null", { _tag: "null" })
    }
    if (this.allowInfAndNan && this.matchInfOrNan(this.pos) !== undefined) {
      return this.readNumber()
    }
    if (c === 0x6e) {
      return this.fail(ReadCode.LITERAL, "invalid literal", this.pos)
    }
    return this.fail(ReadCode.UNEXPECTED_CHARACTER, "unexpected character", this.pos)
  }

  private matches(at: number, word: string, ignoreCase: boolean): boolean {
    for (let i = 0; i < word.length; i++) {
      const c = this.byte(at + i)
      const expected = word.charCodeAt(i)
      if (c !== expected && !(ignoreCase && (c | 0x20) === expected)) {
        return false
      }
    }
    return true
  }

  private matchInfOrNan(at: number): { readonly value: number; readonly length: number } | undefined {
    if (this.matches(at, "infinity", true)) {
      return { value: Number.POSITIVE_INFINITY, length: 8 }
    }
    if (this.matches(at, "inf", true)) {
      return { value: Number.POSITIVE_INFINITY, length: 3 }
    }
    if (this.matches(at, "nan", true)) {
      return { value: Number.NaN, length: 3 }
    }
    return undefined
  }

  private readLiteral(word: string, node: ReadNode): ReadNode | undefined {
    if (!this.matches(this.pos, word, false)) {
      return this.fail(ReadCode.LITERAL, "invalid literal", this.pos)
    }
    if (!this.reserve()) {
      return undefined
    }
    this.pos += word.length
    return node
  }

  private text(start: number, stop: number): string {
    return lenientDecoder.decode(this.buf.subarray(start, stop))
  }

  private readNumber(): ReadNode | undefined {
    const start = this.pos
    let p = start
    const negative = this.byte(p) === MINUS
    if (negative) {
      p += 1
    }
    if (!isDigit(this.byte(p))) {
      const special = this.allowInfAndNan ? this.matchInfOrNan(p) : undefined
      if (special === undefined) {
        return negative
          ? this.fail(ReadCode.INVALID_NUMBER, "no digit after minus sign", p)
          : this.fail(ReadCode.UNEXPECTED_CHARACTER, "unexpected character", start)
      }
      if (!this.reserve()) {
        return undefined
      }
      this.pos = p + special.length
      if (this.numberAsRaw) {
        return { _tag: "raw", value: this.text(start, this.pos) }
      }
      return { _tag: "real", value: negative ? -special.value : special.value }
    }
    if (this.byte(p) === ZERO && isDigit(this.byte(p + 1))) {
      return this.fail(ReadCode.INVALID_NUMBER, "number with leading zero is not allowed", p)
    }
    while (isDigit(this.byte(p))) {
      p += 1
    }
    let integral = true
    if (this.byte(p) === DOT) {
      integral = false
      p += 1
      if (!isDigit(this.byte(p))) {
        return this.fail(ReadCode.INVALID_NUMBER, "no digit after decimal point", p)
      }
      while (isDigit(this.byte(p))) {
        p += 1
      }
    }
    if ((this.byte(p) | 0x20) === 0x65) {
      integral = false
      p += 1
      if (this.byte(p) === PLUS || this.byte(p) === MINUS) {
        p += 1
      }
      if (!isDigit(this.byte(p))) {
        return this.fail(ReadCode.INVALID_NUMBER, "no digit after exponent sign", p)
      }
      while (isDigit(this.byte(p))) {
        p += 1
      }
    }
    if (!this.reserve()) {
      return undefined
    }
    const text = this.text(start, p)
    this.pos = p
    if (this.numberAsRaw) {
      return { _tag: "raw", value: text }
    }
    if (integral) {
      const value = BigInt(text)
      if (!negative && value <= UINT64_MAX) {
        return { _tag: "uint", value }
      }
      if (negative && value >= INT64_MIN) {
        return { _tag: "sint", value }
      }
      if (this.bignumAsRaw) {
        return { _tag: "raw", value: text }
      }
    }
    const real = Number(text)
    if (!Number.isFinite(real)) {
      if (this.bignumAsRaw) {
        return { _tag: "raw", value: text }
      }
      if (!this.allowInfAndNan) {
        return this.fail(ReadCode.INVALID_NUMBER, "number is infinity when parsed as double", start)
      }
    }
    return { _tag: "real", value: real }
  }

  private readUnicodeEscape(at: number): number {
    if (this.byte(at) !== BACKSLASH || this.byte(at + 1) !== 0x75) {
      return -1
    }
    let code = 0
    for (let i = 2; i < 6; i++) {
      const digit = hexValue(this.byte(at + i))
      if (digit < 0) {
        return -1
      }
      code = code * 16 + digit
    }
    return code
  }

  private readString(): string | undefined {
    const start = this.pos
    const parts: Array<string> = []
    let p = start + 1
    let run = p

    const flush = (stop: number): boolean => {
      if (stop === run) {
        return true
      }
      const bytes = this.buf.subarray(run, stop)
      const decoded = this.allowInvalidUnicode ? lenientDecoder.decode(bytes) : decodeStrict(bytes)
      if (decoded === undefined) {
        this.fail(ReadCode.INVALID_STRING, "invalid utf-8 encoding in string", run)
        return false
      }
      parts.push(decoded)
      return true
    }

    for (;;) {
      const c = this.byte(p)
      if (c === EOF) {
        return this.fail(ReadCode.UNEXPECTED_END, "unclosed string", start)
      }
      if (c === QUOTE) {
        if (!flush(p)) {
          return undefined
        }
        p += 1
        break
      }
      if (c < SPACE) {
        return this.fail(ReadCode.INVALID_STRING, "unexpected control character in string", p)
      }
      if (c !== BACKSLASH) {
        p += 1
        continue
      }
      if (!flush(p)) {
        return undefined
      }
      const escape = this.byte(p + 1)
      const simple = simpleEscapes.get(escape)
      if (simple !== undefined) {
        parts.push(simple)
        p += 2
      } else if (escape === 0x75) {
        const high = this.readUnicodeEscape(p)
        if (high < 0) {
          return this.fail(ReadCode.INVALID_STRING, "invalid escaped unicode in string", p)
        }
        if (high >= 0xdc00 && high <= 0xdfff) {
          return this.fail(ReadCode.INVALID_STRING, "invalid high surrogate in string", p)
        }
        if (high >= 0xd800 && high <= 0xdbff) {
          const low = this.readUnicodeEscape(p + 6)
          if (low < 0) {
            return this.fail(ReadCode.INVALID_STRING, "no low surrogate in string", p)
          }
          if (low < 0xdc00 || low > 0xdfff) {
            return this.fail(ReadCode.INVALID_STRING, "invalid low surrogate in string", p + 6)
          }
          parts.push(String.fromCharCode(high, low))
          p += 12
        } else {
          parts.push(String.fromCharCode(high))
          p += 6
        }
      } else if (escape === EOF) {
        return this.fail(ReadCode.UNEXPECTED_END, "unclosed string", start)
      } else {
        return this.fail(ReadCode.INVALID_STRING, "invalid escaped character in string", p)
      }
      run = p
    }

    if (!this.reserve()) {
      return undefined
    }
    this.pos = p
    return parts.join("")
  }
}

/**
 * Parse `length` bytes of `buffer` into a read-only document.
 *
 * @param buffer - Input bytes; with `READ_INSITU` it is parsed in place.
 * @param length - Usable byte length, excluding any in-situ padding.
 * @param flags - Bitwise combination of `ReadFlag` values.
 * @param allocator - Call-scoped allocator charged for the scratch copy and the node pool.
 * @returns The document, or the engine failure with its byte offset.
 *
 * @pure false
 * @invariant on failure every allocation made here has been released
 * @complexity O(n)
 */
export const readDocument = (
  buffer: Uint8Array,
  length: number,
  flags: number,
  allocator: BoundedAllocator
): Either.Either<ReadDocument, ReadFailure> => {
  if (length <= 0) {
    return Either.left({ code: ReadCode.INVALID_PARAMETER, message: "input length is 0", position: 0 })
  }
  const outOfMemory: ReadFailure = {
    code: ReadCode.MEMORY_ALLOCATION,
    message: "memory allocation failed",
    position: 0
  }

  let scratch: Allocation | undefined
  let source = buffer
  if (!hasFlag(flags, ReadFlag.INSITU)) {
    const copy = allocator.allocate(length + PADDING_SIZE)
    if (Either.isLeft(copy)) {
      return Either.left(outOfMemory)
    }
    scratch = copy.right
    scratch.bytes.set(buffer.subarray(0, length))
    source = scratch.bytes
  }

  const capacity = Math.ceil(length / ESTIMATED_BYTES_PER_NODE) + 4
  const pool = allocator.allocate(DOC_HEADER_SIZE + capacity * NODE_SIZE)
  if (Either.isLeft(pool)) {
    if (scratch !== undefined) {
      allocator.free(scratch)
    }
    return Either.left(outOfMemory)
  }

  const reader = new DocumentReader(source, length, flags, allocator, pool.right, capacity)
  const result = reader.read()
  const allocations = scratch === undefined ? [reader.pool] : [scratch, reader.pool]
  if (Either.isLeft(result)) {
    for (const allocation of allocations) {
      allocator.free(allocation)
    }
    return Either.left(result.left)
  }
  return Either.right({ ...result.right, allocator, allocations })
}

export const freeDocument = (doc: ReadDocument): void => {
  for (const allocation of doc.allocations) {
    doc.allocator.free(allocation)
  }
}
