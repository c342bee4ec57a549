import type { ParseError } from "@effect/schema/ParseResult"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { EncodeError, MapCodecError } from "./errors.js"
import { keyDecodeError, keyEncodeError, valueDecodeError, valueEncodeError } from "./errors.js"
import type { CodecOptions, ResolvedFormat } from "./format.js"
import { resolveFormat } from "./format.js"
import type { KeyMode } from "./key-field.js"
import { keyFieldSchema, keyModeOf } from "./key-field.js"
import type { ObjectWriter } from "./object-writer.js"
import type { ReaderState } from "./object-reader.js"
import { nextField, openObject } from "./object-reader.js"
import type { Pair, PairSource } from "./sources.js"
import type { PairTarget } from "./targets.js"

// CHANGE: transcode key-value pairs to and from a JSON object in a single pass
// WHY: non-string keys need a field-name form without building a string-keyed copy first
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀ps: decode(encode(ps)) ≅ ps when the key and value schemas round-trip
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: pairs are written and read in iteration/document order; the first failure aborts
// COMPLEXITY: O(n) where n = total size of keys and values

/**
 * Compiled description of how one key type and one value type map onto a JSON object.
 */
export interface MapCodec<K, V, VI = unknown> {
  readonly keyMode: KeyMode
  readonly keyField: S.Schema<K, string>
  readonly value: S.Schema<V, VI>
  readonly format: ResolvedFormat
}

/**
 * Build a codec from a key schema and a value schema.
 *
 * @param key - Schema of the key; string-encoded keys are used as field names verbatim.
 * @param value - Schema of the value.
 * @param options - Output formatting.
 *
 * @pure true
 * @complexity O(|key ast|)
 */
export const makeMapCodec = <K, KI, V, VI>(
  key: S.Schema<K, KI>,
  value: S.Schema<V, VI>,
  options?: CodecOptions
): MapCodec<K, V, VI> => {
  const keyMode = keyModeOf(key)
  return {
    keyMode,
    keyField: keyFieldSchema(key, keyMode),
    value,
    format: resolveFormat(options)
  }
}

const formatParseError = (error: ParseError): string => TreeFormatter.formatErrorSync(error)

const encodeKey = <K, V, VI>(codec: MapCodec<K, V, VI>, key: K, index: number): Either.Either<string, EncodeError> =>
  Either.mapLeft(S.encodeEither(codec.keyField)(key), (error) => keyEncodeError(index, formatParseError(error)))

const encodeValue = <K, V, VI>(codec: MapCodec<K, V, VI>, value: V, index: number): Either.Either<VI, EncodeError> =>
  Either.mapLeft(S.encodeEither(codec.value)(value), (error) => valueEncodeError(index, formatParseError(error)))

/**
 * Encode every pair of the source into the writer.
 *
 * @param codec - Key and value schemas.
 * @param source - Pairs in the order they should appear.
 * @param writer - Destination object writer.
 * @returns The writer's result, or the first encode failure.
 *
 * @pure false
 * @effect pulls the source iterator once; writes to the writer
 * @invariant no field is written after a failure
 * @complexity O(n)
 */
export const encodeEntries = <K, V, VI, R>(
  codec: MapCodec<K, V, VI>,
  source: PairSource<K, V>,
  writer: ObjectWriter<VI, R>
): Either.Either<R, EncodeError> => {
  let index = 0
  for (const [key, value] of source) {
    const name = encodeKey(codec, key, index)
    if (Either.isLeft(name)) {
      return Either.left(name.left)
    }
    const encoded = encodeValue(codec, value, index)
    if (Either.isLeft(encoded)) {
      return Either.left(encoded.left)
    }
    const written = writer.field(name.right, encoded.right)
    if (Either.isLeft(written)) {
      const { message, on } = written.left
      return Either.left(on === "name" ? keyEncodeError(index, message) : valueEncodeError(index, message))
    }
    index += 1
  }
  return Either.right(writer.finish())
}

/**
 * Decode a single field into a pair.
 *
 * @pure true
 */
export const decodeField = <K, V, VI>(
  codec: MapCodec<K, V, VI>,
  name: string,
  value: unknown
): Either.Either<Pair<K, V>, MapCodecError> => {
  const key = Either.mapLeft(S.decodeEither(codec.keyField)(name), (error) => keyDecodeError(name, formatParseError(error)))
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  return Either.map(
    Either.mapLeft(S.decodeUnknownEither(codec.value)(value), (error) => valueDecodeError(name, formatParseError(error))),
    (decoded): Pair<K, V> => [key.right, decoded]
  )
}

/**
 * Decode already separated fields (e.g. an encoded record) into the target.
 *
 * @pure true
 * @invariant the target sees fields in the order the iterable yields them
 * @complexity O(n)
 */
export const decodeFields = <K, V, VI, C>(
  codec: MapCodec<K, V, VI>,
  fields: Iterable<readonly [string, unknown]>,
  target: PairTarget<K, V, C>
): Either.Either<C, MapCodecError> => {
  const builder = target.make()
  for (const [name, value] of fields) {
    const pair = decodeField(codec, name, value)
    if (Either.isLeft(pair)) {
      return Either.left(pair.left)
    }
    builder.add(pair.right[0], pair.right[1])
  }
  return Either.right(builder.build())
}

/**
 * Decode JSON object text into the target collection.
 *
 * @param text - JSON object text.
 * @param codec - Key and value schemas.
 * @param target - Collection to build.
 * @returns The built collection, or the first failure; no partial result.
 *
 * @pure true
 * @invariant "{}" yields an empty collection
 * @complexity O(n) where n = text length
 */
export const decodeEntries = <K, V, VI, C>(
  text: string,
  codec: MapCodec<K, V, VI>,
  target: PairTarget<K, V, C>
): Either.Either<C, MapCodecError> => {
  const opened = openObject(text)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  const builder = target.make()
  let state: ReaderState = opened.right
  while (true) {
    const step = nextField(text, state)
    if (Either.isLeft(step)) {
      return Either.left(step.left)
    }
    if (step.right._tag === "End") {
      return Either.right(builder.build())
    }
    const pair = decodeField(codec, step.right.name, step.right.value)
    if (Either.isLeft(pair)) {
      return Either.left(pair.left)
    }
    builder.add(pair.right[0], pair.right[1])
    state = step.right.state
  }
}

/**
 * Decode JSON object text lazily: each pull scans and decodes one field.
 *
 * The outer Either only checks that the text opens an object; later syntax or decode
 * failures arrive as a Left item, after which iteration stops.
 *
 * @pure true
 * @complexity O(k) per item
 */
export const decodeEntriesLazily = <K, V, VI>(
  text: string,
  codec: MapCodec<K, V, VI>
): Either.Either<Iterable<Either.Either<Pair<K, V>, MapCodecError>>, MapCodecError> =>
  Either.map(openObject(text), (initial) => ({
    *[Symbol.iterator]() {
      let state: ReaderState = initial
      while (true) {
        const step = nextField(text, state)
        if (Either.isLeft(step)) {
          yield Either.left<MapCodecError>(step.left)
          return
        }
        if (step.right._tag === "End") {
          return
        }
        const pair = decodeField(codec, step.right.name, step.right.value)
        yield pair
        if (Either.isLeft(pair)) {
          return
        }
        state = step.right.state
      }
    }
  }))
