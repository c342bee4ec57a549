import * as S from "@effect/schema/Schema"
import { describe, expect, it } from "@effect/vitest"
import { Effect, Logger, LogLevel } from "effect"
import * as Either from "effect/Either"
import * as HashMap from "effect/HashMap"
import * as List from "effect/List"
import * as Option from "effect/Option"

import { makeMapCodec } from "../../src/core/codec.js"
import { mapTarget, vecTarget } from "../../src/core/targets.js"
import { readJsonMapFile, writeJsonMapFile } from "../../src/shell/json-map-file.js"
import { pointCodec, pointMapJson, samplePairs } from "../core/fixtures.js"
import { runOnNode, withMapFile } from "./test-helpers.js"

describe("writeJsonMapFile / readJsonMapFile", () => {
  it.effect("writes the object text and reads it back", () =>
    withMapFile("points.json", ({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(writeJsonMapFile(file, new Map(samplePairs), pointCodec))
        const text = yield* _(fs.readFileString(file))
        const pairs = yield* _(readJsonMapFile(file, pointCodec, vecTarget()))

        expect(text).toBe(pointMapJson)
        expect(pairs).toEqual(samplePairs)
      })
    ).pipe(runOnNode))

  it.effect("writes indented text when the codec asks for it", () =>
    withMapFile("counts.json", ({ file, fs }) =>
      Effect.gen(function*(_) {
        const codec = makeMapCodec(S.String, S.Number, { indent: 2 })
        yield* _(writeJsonMapFile(file, [["a", 1], ["b", 2]], codec))
        const text = yield* _(fs.readFileString(file))

        expect(text).toBe("{\n  \"a\": 1,\n  \"b\": 2\n}")
      })
    ).pipe(runOnNode))

  it.effect("fails with FileError for a missing file", () =>
    withMapFile("missing.json", ({ file }) =>
      Effect.gen(function*(_) {
        const result = yield* _(Effect.either(readJsonMapFile(file, pointCodec, mapTarget())))

        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("FileError")
          expect(result.left).toHaveProperty("path", file)
        }
      })
    ).pipe(runOnNode))

  it.effect("surfaces decode errors from the file contents", () =>
    withMapFile("list.json", ({ file, fs }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(file, "[1,2]"))
        const result = yield* _(Effect.either(readJsonMapFile(file, pointCodec, mapTarget())))

        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("NotJsonObject")
        }
      })
    ).pipe(runOnNode))

  it.effect("leaves no file behind when a pair fails to encode", () =>
    withMapFile("ints.json", ({ file, fs }) =>
      Effect.gen(function*(_) {
        const codec = makeMapCodec(S.Int, S.String)
        const result = yield* _(Effect.either(writeJsonMapFile(file, [[1, "a"], [1.5, "b"]], codec)))
        const exists = yield* _(fs.exists(file))

        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left).toHaveProperty("_tag", "KeyEncodeError")
        }
        expect(exists).toBe(false)
      })
    ).pipe(runOnNode))

  it.effect("logs the written path at debug level inside a span", () => {
    const seen: Array<{ readonly level: string; readonly path: unknown; readonly spans: ReadonlyArray<string> }> = []
    const capture = Logger.make(({ annotations, logLevel, spans }) => {
      seen.push({
        level: logLevel.label,
        path: Option.getOrUndefined(HashMap.get(annotations, "path")),
        spans: List.toArray(spans).map((span) => span.label)
      })
    })
    return withMapFile("logged.json", ({ file }) =>
      Effect.gen(function*(_) {
        yield* _(writeJsonMapFile(file, [["a", 1]], makeMapCodec(S.String, S.Number)))

        expect(seen).toEqual([{ level: "DEBUG", path: file, spans: ["writeJsonMapFile"] }])
      })
    ).pipe(
      Logger.withMinimumLogLevel(LogLevel.Debug),
      Effect.provide(Logger.replace(Logger.defaultLogger, capture)),
      runOnNode
    )
  })
})
