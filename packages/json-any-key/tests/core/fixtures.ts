import * as S from "@effect/schema/Schema"
import { expect } from "@effect/vitest"
import * as Either from "effect/Either"

import { makeMapCodec } from "../../src/core/codec.js"

export const Point = S.Struct({ a: S.Int, b: S.Int })
export type Point = S.Schema.Type<typeof Point>

export const pointCodec = makeMapCodec(Point, Point)

export const pointMapJson = "{\"{\\\"a\\\":3,\\\"b\\\":5}\":{\"a\":7,\"b\":9}}"

export const samplePairs: ReadonlyArray<readonly [Point, Point]> = [[{ a: 3, b: 5 }, { a: 7, b: 9 }]]

export const expectRight = <A, E>(either: Either.Either<A, E>): A => {
  expect(Either.isRight(either)).toBe(true)
  return Either.getOrThrowWith(either, (error) => new Error(`expected Right, got ${JSON.stringify(error)}`))
}

export const expectLeft = <A, E>(either: Either.Either<A, E>): E => {
  expect(Either.isLeft(either)).toBe(true)
  return Either.getOrThrowWith(Either.flip(either), () => new Error("expected Left"))
}
