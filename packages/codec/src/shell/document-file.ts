import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { DecodeError, EncodeError, FileError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { Decoded } from "../core/facade.js"
import { decode, encode } from "../core/facade.js"
import { hasFlag, PADDING_SIZE, ReadCode, ReadFlag, WriteCode } from "../core/flags.js"
import type { DecodeOptions, EncodeOptions } from "../core/options.js"

// CHANGE: decode JSON files and write encoded values through the Effect file system
// WHY: keep file IO in the shell while the core stays synchronous and pure
// QUOTE(TZ): n/a
// REF: req-document-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: decodeFile(p) = decode(bytes(p)) when p is readable
// PURITY: SHELL
// EFFECT: Effect<Decoded | void, DecodeError | EncodeError | FileError, FileSystem>
// INVARIANT: core errors surface unchanged; only IO failures become FileError
// COMPLEXITY: O(n)

const fromEither = <A, E>(result: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(result) ? Effect.fail(result.left) : Effect.succeed(result.right)

const cannotOpen = (error: PlatformError): boolean =>
  error._tag === "SystemError" && (error.reason === "NotFound" || error.reason === "PermissionDenied")

const mapReadError = (path: string) => (error: PlatformError): FileError =>
  cannotOpen(error)
    ? fileError(ReadCode.FILE_OPEN, path, "file opening failed")
    : fileError(ReadCode.FILE_READ, path, "file reading failed")

const mapWriteError = (path: string) => (error: PlatformError): FileError =>
  cannotOpen(error)
    ? fileError(WriteCode.FILE_OPEN, path, "file opening failed")
    : fileError(WriteCode.FILE_WRITE, path, "file writing failed")

const padded = (bytes: Uint8Array): Uint8Array => {
  const buffer = new Uint8Array(bytes.length + PADDING_SIZE)
  buffer.set(bytes)
  return buffer
}

/**
 * Read `path` and decode its contents.
 *
 * With `ReadFlag.INSITU` the padding is appended here; the file itself holds only JSON.
 *
 * @pure false
 * @effect FileSystem read
 * @invariant a missing or forbidden file fails with `ReadCode.FILE_OPEN`
 */
export const decodeFile = (
  path: string,
  options: DecodeOptions = {}
): Effect.Effect<Decoded, DecodeError | FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(fs.readFile(path).pipe(Effect.mapError(mapReadError(path))))
    yield* _(Effect.logDebug("file read").pipe(Effect.annotateLogs("bytes", bytes.length)))
    const input = hasFlag(options.flags ?? 0, ReadFlag.INSITU) ? padded(bytes) : bytes
    return yield* _(fromEither(decode(input, options)))
  }).pipe(Effect.annotateLogs("path", path))

/**
 * Encode `value` and write the JSON text to `path`.
 *
 * @pure false
 * @effect FileSystem write
 * @invariant nothing is written when encoding fails
 */
export const encodeFile = (
  path: string,
  value: unknown,
  options: EncodeOptions = {}
): Effect.Effect<void, EncodeError | FileError, FileSystemService> =>
  Effect.gen(function*(_) {
    const json = yield* _(fromEither(encode(value, options)))
    const fs = yield* _(FileSystem)
    yield* _(fs.writeFileString(path, json).pipe(Effect.mapError(mapWriteError(path))))
    yield* _(Effect.logDebug("file written").pipe(Effect.annotateLogs("length", json.length)))
  }).pipe(Effect.annotateLogs("path", path))
