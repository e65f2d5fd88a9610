// CHANGE: collect the public surface of the package
// WHY: callers import decode/encode, flags, sentinels and table helpers from one entry
// QUOTE(TZ): n/a
// REF: req-index-1
// SOURCE: n/a
// PURITY: CORE
// INVARIANT: the shell is the only export that requires a FileSystem service

export type { Allocation, BoundedAllocator, OutOfMemory, RawAllocator } from "./core/allocator.js"
export { heapAllocator, makeBoundedAllocator, withBoundedAllocator } from "./core/allocator.js"
export type {
  DecodeError,
  EncodeError,
  FileError,
  InvalidParameter,
  MapperError,
  MemoryError,
  ReadError,
  StackExhausted,
  UnknownValueType,
  UnsupportedValue,
  WriteError
} from "./core/errors.js"
export { InvariantViolation } from "./core/errors.js"
export type { Decoded, DecodeTuple, EncodeTuple } from "./core/facade.js"
export { decode, encode, toDecodeTuple, toEncodeTuple } from "./core/facade.js"
export { hasFlag, PADDING_SIZE, ReadCode, ReadFlag, WriteCode, WriteFlag } from "./core/flags.js"
export type { MapperSettings, ValueMapper } from "./core/mapper.js"
export { DEFAULT_MAX_DEPTH, makeValueMapper } from "./core/mapper.js"
export type { DecodeOptions, EncodeOptions } from "./core/options.js"
export type { SentinelKind, SentinelRegistry } from "./core/sentinel.js"
export { AS_ARRAY, AS_OBJECT, isSentinel, makeSentinelRegistry, NULL, Sentinel, sentinels } from "./core/sentinel.js"
export type { ContainerKind, UnsupportedPolicy } from "./core/to-json.js"
export { classifyTable } from "./core/to-json.js"
export type { DynamicValue, Table, TableKey } from "./core/value.js"
export { asArrayTable, asObjectTable, isTable, makeTable, MARKER_KEY, tableLength } from "./core/value.js"
export { decodeFile, encodeFile } from "./shell/document-file.js"
