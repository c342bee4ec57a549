import * as Either from "effect/Either"
import type * as HashMap from "effect/HashMap"

import type { MapCodec } from "./codec.js"
import { decodeEntries, decodeEntriesLazily, encodeEntries } from "./codec.js"
import type { EncodeError, MapCodecError } from "./errors.js"
import type { TextSink } from "./object-writer.js"
import { makeTextWriter, stringSink } from "./object-writer.js"
import type { Pair, PairSource } from "./sources.js"
import { fromIterator, isIterable } from "./sources.js"
import type { PairTarget } from "./targets.js"
import { hashMapTarget, mapTarget, vecTarget } from "./targets.js"

// CHANGE: expose container-shaped entry points over the codec
// WHY: callers hand over maps, tuple arrays or iterators without building iterators by hand
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀c: serialize*(c) = encodeEntries(pairs(c)); deserialize*(t) = decodeEntries(t, target*)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no entry point reorders, deduplicates or buffers pairs
// COMPLEXITY: O(n)

/**
 * Stream the source as JSON object text into the sink.
 *
 * On failure the sink may hold a partial, invalid object; discarding it is up to the caller.
 *
 * @pure false
 * @effect writes to sink
 */
export const serializeToSink = <K, V, VI>(
  source: PairSource<K, V>,
  codec: MapCodec<K, V, VI>,
  sink: TextSink
): Either.Either<void, EncodeError> => encodeEntries(codec, source, makeTextWriter(sink, codec.format))

const serializeToString = <K, V, VI>(
  source: PairSource<K, V>,
  codec: MapCodec<K, V, VI>
): Either.Either<string, EncodeError> => {
  const sink = stringSink()
  return Either.map(serializeToSink(source, codec, sink), () => sink.text())
}

/**
 * Serialize a Map, ReadonlyMap or effect HashMap.
 *
 * @example
 * ```ts
 * const Point = S.Struct({ a: S.Int, b: S.Int })
 * const codec = makeMapCodec(Point, Point)
 * serializeMapToJson(new Map([[{ a: 3, b: 5 }, { a: 7, b: 9 }]]), codec)
 * // Right('{"{\"a\":3,\"b\":5}":{"a":7,"b":9}}')
 * ```
 */
export const serializeMapToJson = <K, V, VI>(
  map: ReadonlyMap<K, V> | HashMap.HashMap<K, V>,
  codec: MapCodec<K, V, VI>
): Either.Either<string, EncodeError> => serializeToString(map, codec)

export const serializeVecToJson = <K, V, VI>(
  pairs: ReadonlyArray<Pair<K, V>>,
  codec: MapCodec<K, V, VI>
): Either.Either<string, EncodeError> => serializeToString(pairs, codec)

/**
 * Serialize any iterable of pairs, or a bare iterator (consumed).
 */
export const serializePairIterToJson = <K, V, VI>(
  pairs: PairSource<K, V> | Iterator<Pair<K, V>>,
  codec: MapCodec<K, V, VI>
): Either.Either<string, EncodeError> => serializeToString(isIterable(pairs) ? pairs : fromIterator(pairs), codec)

export const deserializeJson = <K, V, VI, C>(
  text: string,
  codec: MapCodec<K, V, VI>,
  target: PairTarget<K, V, C>
): Either.Either<C, MapCodecError> => decodeEntries(text, codec, target)

export const deserializeJsonToMap = <K, V, VI>(
  text: string,
  codec: MapCodec<K, V, VI>
): Either.Either<Map<K, V>, MapCodecError> => decodeEntries(text, codec, mapTarget<K, V>())

export const deserializeJsonToVec = <K, V, VI>(
  text: string,
  codec: MapCodec<K, V, VI>
): Either.Either<Array<Pair<K, V>>, MapCodecError> => decodeEntries(text, codec, vecTarget<K, V>())

export const deserializeJsonToHashMap = <K, V, VI>(
  text: string,
  codec: MapCodec<K, V, VI>
): Either.Either<HashMap.HashMap<K, V>, MapCodecError> => decodeEntries(text, codec, hashMapTarget<K, V>())

/**
 * Lazily decode pairs; see decodeEntriesLazily.
 */
export const deserializeJsonToIter = <K, V, VI>(
  text: string,
  codec: MapCodec<K, V, VI>
): Either.Either<Iterable<Either.Either<Pair<K, V>, MapCodecError>>, MapCodecError> =>
  decodeEntriesLazily(text, codec)
