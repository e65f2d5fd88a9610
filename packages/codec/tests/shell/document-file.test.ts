import * as FileSystem from "@effect/platform/FileSystem"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import type * as Layer from "effect/Layer"

import { ReadCode, ReadFlag, WriteCode } from "../../src/core/flags.js"
import { makeTable } from "../../src/core/value.js"
import { decodeFile, encodeFile } from "../../src/shell/document-file.js"

const utf8 = new TextEncoder()
const text = new TextDecoder()

const memoryFileSystem = (files: Map<string, Uint8Array>): Layer.Layer<FileSystem.FileSystem> => {
  const missing = FileSystem.makeNoop({})
  return FileSystem.layerNoop({
    readFile: (path) => {
      const contents = files.get(path)
      return contents === undefined ? missing.readFile(path) : Effect.succeed(contents)
    },
    writeFileString: (path, data) =>
      Effect.sync(() => {
        files.set(path, utf8.encode(data))
      })
  })
}

const withFiles = (entries: ReadonlyArray<readonly [string, string]>): Map<string, Uint8Array> =>
  new Map(entries.map(([path, contents]) => [path, utf8.encode(contents)]))

describe("decodeFile", () => {
  it.effect("decodes the file contents", () => {
    const files = withFiles([["doc.json", `{"a":[1,2]}`]])
    return Effect.gen(function*(_) {
      const decoded = yield* _(decodeFile("doc.json"))
      expect(decoded).toStrictEqual({ value: makeTable([["a", makeTable([[1, 1], [2, 2]])]]), consumed: 11 })
    }).pipe(Effect.provide(memoryFileSystem(files)))
  })

  it.effect("pads the buffer for in-situ reads", () => {
    const files = withFiles([["doc.json", "[true]"]])
    return Effect.gen(function*(_) {
      const decoded = yield* _(decodeFile("doc.json", { flags: ReadFlag.INSITU }))
      expect(decoded).toStrictEqual({ value: makeTable([[1, true]]), consumed: 6 })
    }).pipe(Effect.provide(memoryFileSystem(files)))
  })

  it.effect("fails with an open error for a missing file", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(decodeFile("missing.json")))
      expect(Either.getOrThrow(Either.flip(result))).toStrictEqual({
        _tag: "FileError",
        code: ReadCode.FILE_OPEN,
        path: "missing.json",
        message: "file opening failed: missing.json"
      })
    }).pipe(Effect.provide(memoryFileSystem(new Map()))))

  it.effect("surfaces decode errors unchanged", () => {
    const files = withFiles([["bad.json", "[1,]"]])
    return Effect.gen(function*(_) {
      const result = yield* _(Effect.either(decodeFile("bad.json")))
      expect(Either.getOrThrow(Either.flip(result))).toStrictEqual({
        _tag: "ReadError",
        code: ReadCode.JSON_STRUCTURE,
        message: "trailing comma is not allowed at 3",
        position: 3
      })
    }).pipe(Effect.provide(memoryFileSystem(files)))
  })
})

describe("encodeFile", () => {
  it.effect("writes the encoded text", () => {
    const files = new Map<string, Uint8Array>()
    return Effect.gen(function*(_) {
      yield* _(encodeFile("out.json", makeTable([[1, "a"], [3, "c"]])))
      const written = files.get("out.json")
      expect(written === undefined ? undefined : text.decode(written)).toBe(`["a",null,"c"]`)
    }).pipe(Effect.provide(memoryFileSystem(files)))
  })

  it.effect("writes nothing when encoding fails", () => {
    const files = new Map<string, Uint8Array>()
    return Effect.gen(function*(_) {
      const result = yield* _(Effect.either(encodeFile("out.json", 2n ** 64n, { onUnsupported: "fail" })))
      expect(Either.getOrThrow(Either.flip(result))._tag).toBe("UnsupportedValue")
      expect(files.has("out.json")).toBe(false)
    }).pipe(Effect.provide(memoryFileSystem(files)))
  })

  it.effect("fails with an open error when the file cannot be created", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(encodeFile("locked.json", true)))
      expect(Either.getOrThrow(Either.flip(result))).toStrictEqual({
        _tag: "FileError",
        code: WriteCode.FILE_OPEN,
        path: "locked.json",
        message: "file opening failed: locked.json"
      })
    }).pipe(Effect.provide(FileSystem.layerNoop({}))))
})
