// CHANGE: expose reader/writer flag bits and result codes as typed constants
// WHY: callers combine flags bitwise and match error codes numerically
// QUOTE(TZ): n/a
// REF: req-flags-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ ReadFlag ∪ WriteFlag: popcount(f) ≤ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: engine codes keep the numeric values of the reference engine
// COMPLEXITY: O(1)/O(1)

/** Bytes the caller must append to an in-situ input. */
export const PADDING_SIZE = 4

export const ReadFlag = {
  NOFLAG: 0,
  INSITU: 1 << 0,
  STOP_WHEN_DONE: 1 << 1,
  ALLOW_TRAILING_COMMAS: 1 << 2,
  ALLOW_COMMENTS: 1 << 3,
  ALLOW_INF_AND_NAN: 1 << 4,
  NUMBER_AS_RAW: 1 << 5,
  ALLOW_INVALID_UNICODE: 1 << 6,
  BIGNUM_AS_RAW: 1 << 7
} as const

export const ReadCode = {
  SUCCESS: 0,
  INVALID_PARAMETER: 1,
  MEMORY_ALLOCATION: 2,
  EMPTY_CONTENT: 3,
  UNEXPECTED_CONTENT: 4,
  UNEXPECTED_END: 5,
  UNEXPECTED_CHARACTER: 6,
  JSON_STRUCTURE: 7,
  INVALID_COMMENT: 8,
  INVALID_NUMBER: 9,
  INVALID_STRING: 10,
  LITERAL: 11,
  FILE_OPEN: 12,
  FILE_READ: 13,
  UNKNOWN_VALUE_TYPE: 100,
  STACK_EXHAUSTION: 101
} as const

export const WriteFlag = {
  NOFLAG: 0,
  PRETTY: 1 << 0,
  ESCAPE_UNICODE: 1 << 1,
  ESCAPE_SLASHES: 1 << 2,
  ALLOW_INF_AND_NAN: 1 << 3,
  INF_AND_NAN_AS_NULL: 1 << 4,
  ALLOW_INVALID_UNICODE: 1 << 5,
  PRETTY_TWO_SPACES: 1 << 6
} as const

export const WriteCode = {
  SUCCESS: 0,
  INVALID_PARAMETER: 1,
  MEMORY_ALLOCATION: 2,
  INVALID_VALUE_TYPE: 3,
  NAN_OR_INF: 4,
  FILE_OPEN: 5,
  FILE_WRITE: 6,
  STACK_EXHAUSTION: 101
} as const

export type ReadCode = (typeof ReadCode)[keyof typeof ReadCode]
export type WriteCode = (typeof WriteCode)[keyof typeof WriteCode]

export const hasFlag = (flags: number, flag: number): boolean => (flags & flag) !== 0
