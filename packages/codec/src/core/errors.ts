import { ReadCode, WriteCode } from "./flags.js"

// CHANGE: unify the error algebra for decode, encode and the file shell
// WHY: every failure is a returned value with a stable tag, code and message
// QUOTE(TZ): n/a
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ DecodeError ∪ EncodeError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every error carries the numeric code reported to callers
// COMPLEXITY: O(1)/O(1)

export type ReadError = {
  readonly _tag: "ReadError"
  readonly code: ReadCode
  readonly message: string
  readonly position: number
}
export type WriteError = { readonly _tag: "WriteError"; readonly code: WriteCode; readonly message: string }
export type MemoryError = { readonly _tag: "MemoryError"; readonly code: WriteCode; readonly message: string }
export type InvalidParameter = {
  readonly _tag: "InvalidParameter"
  readonly code: ReadCode | WriteCode
  readonly message: string
}
export type UnknownValueType = {
  readonly _tag: "UnknownValueType"
  readonly code: ReadCode
  readonly type: number
  readonly message: string
}
export type StackExhausted = {
  readonly _tag: "StackExhausted"
  readonly code: ReadCode | WriteCode
  readonly message: string
}
export type UnsupportedValue = {
  readonly _tag: "UnsupportedValue"
  readonly code: WriteCode
  readonly valueType: string
  readonly message: string
}
export type FileError = {
  readonly _tag: "FileError"
  readonly code: ReadCode | WriteCode
  readonly path: string
  readonly message: string
}

export type DecodeError = ReadError | InvalidParameter | UnknownValueType | StackExhausted
export type EncodeError = WriteError | MemoryError | InvalidParameter | StackExhausted | UnsupportedValue

/** Failures the value mapper can raise on its own. */
export type MapperError = UnknownValueType | StackExhausted | UnsupportedValue

export const readError = (code: ReadCode, message: string, position: number): ReadError => ({
  _tag: "ReadError",
  code,
  message: `${message} at ${position}`,
  position
})

export const writeError = (code: WriteCode, message: string): WriteError => ({
  _tag: "WriteError",
  code,
  message
})

export const memoryError = (): MemoryError => ({
  _tag: "MemoryError",
  code: WriteCode.MEMORY_ALLOCATION,
  message: "Cannot allocate memory"
})

export const invalidParameter = (code: ReadCode | WriteCode, message: string): InvalidParameter => ({
  _tag: "InvalidParameter",
  code,
  message
})

export const unknownValueType = (type: number): UnknownValueType => ({
  _tag: "UnknownValueType",
  code: ReadCode.UNKNOWN_VALUE_TYPE,
  type,
  message: `unknown value type ${type}`
})

export const stackExhausted = (code: ReadCode | WriteCode): StackExhausted => ({
  _tag: "StackExhausted",
  code,
  message: "out of stack space"
})

export const unsupportedValue = (valueType: string): UnsupportedValue => ({
  _tag: "UnsupportedValue",
  code: WriteCode.INVALID_VALUE_TYPE,
  valueType,
  message: `unsupported value type: ${valueType}`
})

export const fileError = (code: ReadCode | WriteCode, path: string, reason: string): FileError => ({
  _tag: "FileError",
  code,
  path,
  message: `${reason}: ${path}`
})

// CHANGE: flag broken internal invariants as defects rather than results
// WHY: a leaked or stale allocation is a programming error, not a user-facing failure
// QUOTE(TZ): n/a
// REF: req-errors-2
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: never returned inside Either
export class InvariantViolation extends Error {
  override readonly name = "InvariantViolation"
}
