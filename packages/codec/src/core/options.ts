import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { RawAllocator } from "./allocator.js"
import { heapAllocator } from "./allocator.js"
import type { InvalidParameter } from "./errors.js"
import { invalidParameter } from "./errors.js"
import { ReadCode, WriteCode } from "./flags.js"
import { DEFAULT_MAX_DEPTH } from "./mapper.js"
import type { SentinelRegistry } from "./sentinel.js"
import { sentinels } from "./sentinel.js"
import type { UnsupportedPolicy } from "./to-json.js"

// CHANGE: validate per-call decode/encode options and merge them with defaults
// WHY: options arrive from untyped callers, and a rejected option is reported before any allocation
// QUOTE(TZ): "withNull" | "withRef" | "maxMemory" | "flags"
// REF: req-options-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(o).k = o.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxMemory ≥ 0 ∧ resolved maxDepth ≥ 1
// COMPLEXITY: O(1)/O(1)

const sharedFields = {
  maxMemory: S.Int,
  flags: S.Int.pipe(S.nonNegative()),
  maxDepth: S.Int.pipe(S.positive())
}

const DecodeSettingsSchema = S.partial(
  S.Struct({
    ...sharedFields,
    withNull: S.Boolean,
    withRef: S.Boolean
  })
)

const EncodeSettingsSchema = S.partial(
  S.Struct({
    ...sharedFields,
    onUnsupported: S.Literal("null", "fail")
  })
)

interface HostOptions {
  /** Registry whose sentinels mark explicit null and container intent. */
  readonly sentinels?: SentinelRegistry
  /** Primitive allocator backing the call's bounded allocator. */
  readonly rawAllocator?: RawAllocator
}

export type DecodeOptions = S.Schema.Type<typeof DecodeSettingsSchema> & HostOptions
export type EncodeOptions = S.Schema.Type<typeof EncodeSettingsSchema> & HostOptions

interface ResolvedShared {
  readonly maxMemory: number
  readonly flags: number
  readonly maxDepth: number
  readonly sentinels: SentinelRegistry
  readonly rawAllocator: RawAllocator
}

export interface ResolvedDecodeOptions extends ResolvedShared {
  readonly withNull: boolean
  readonly withRef: boolean
}

export interface ResolvedEncodeOptions extends ResolvedShared {
  readonly onUnsupported: UnsupportedPolicy
}

const resolveShared = (
  settings: {
    readonly maxMemory?: number | undefined
    readonly flags?: number | undefined
    readonly maxDepth?: number | undefined
  },
  host: HostOptions
): ResolvedShared => ({
  maxMemory: Math.max(0, settings.maxMemory ?? 0),
  flags: settings.flags ?? 0,
  maxDepth: settings.maxDepth ?? DEFAULT_MAX_DEPTH,
  sentinels: host.sentinels ?? sentinels,
  rawAllocator: host.rawAllocator ?? heapAllocator
})

/**
 * Validate decode options; unknown keys are ignored.
 *
 * @returns Resolved options, or `InvalidParameter` with the read-side code.
 *
 * @pure true
 * @invariant every field of the result is defined
 */
export const resolveDecodeOptions = (
  options: DecodeOptions = {}
): Either.Either<ResolvedDecodeOptions, InvalidParameter> =>
  pipe(
    S.decodeUnknownEither(DecodeSettingsSchema)(options),
    Either.mapLeft((error) => invalidParameter(ReadCode.INVALID_PARAMETER, TreeFormatter.formatErrorSync(error))),
    Either.map((settings) => ({
      ...resolveShared(settings, options),
      withNull: settings.withNull ?? false,
      withRef: settings.withRef ?? false
    }))
  )

/**
 * Validate encode options; unknown keys are ignored.
 *
 * @returns Resolved options, or `InvalidParameter` with the write-side code.
 *
 * @pure true
 */
export const resolveEncodeOptions = (
  options: EncodeOptions = {}
): Either.Either<ResolvedEncodeOptions, InvalidParameter> =>
  pipe(
    S.decodeUnknownEither(EncodeSettingsSchema)(options),
    Either.mapLeft((error) => invalidParameter(WriteCode.INVALID_PARAMETER, TreeFormatter.formatErrorSync(error))),
    Either.map((settings) => ({
      ...resolveShared(settings, options),
      onUnsupported: settings.onUnsupported ?? "null"
    }))
  )
