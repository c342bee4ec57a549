import type * as AST from "@effect/schema/AST"
import * as ParseResult from "@effect/schema/ParseResult"
import * as S from "@effect/schema/Schema"
import * as Either from "effect/Either"

import { decodeFields, encodeEntries, makeMapCodec } from "./codec.js"
import type { MapCodecError } from "./errors.js"
import { renderMapCodecError } from "./errors.js"
import { makeRecordWriter } from "./object-writer.js"
import type { PairTarget } from "./targets.js"
import { hashMapTarget, mapTarget, vecTarget } from "./targets.js"

// CHANGE: let a Struct field opt into the object-shaped map encoding
// WHY: maps and pair arrays with non-string keys otherwise have no JSON object form inside a larger value
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀f: JSON.stringify(encode(Struct{f: AnyKeyMap}))(x).f = serializeMapToJson(x.f)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the encoded side is a string-keyed record of encoded values; no pair is dropped or merged
// COMPLEXITY: O(n) per field

const toIssue = (ast: AST.AST, actual: unknown, error: MapCodecError): ParseResult.ParseIssue =>
  new ParseResult.Type(ast, actual, renderMapCodecError(error))

type EncodedRecord = { readonly [key: string]: unknown }

const isEncodedRecord = (input: unknown): input is EncodedRecord =>
  typeof input === "object" && input !== null && !Array.isArray(input)

// passed through as-is, so an own "__proto__" field reaches the codec in both directions
const EncodedRecord = S.declare(isEncodedRecord, { identifier: "EncodedRecord" })

const makeEmbedding = <K, KI, V, VI, C extends Iterable<readonly [K, V]>>(
  key: S.Schema<K, KI>,
  value: S.Schema<V, VI>,
  to: S.Schema<C>,
  target: PairTarget<K, V, C>
) => {
  const codec = makeMapCodec(key, value)
  return S.transformOrFail(EncodedRecord, to, {
    strict: true,
    decode: (record, _options, ast) =>
      Either.mapLeft(
        decodeFields(codec, Object.entries(record), target),
        (error) => toIssue(ast, record, error)
      ),
    encode: (collection, _options, ast) =>
      Either.mapLeft(
        encodeEntries(codec, collection, makeRecordWriter<VI>()),
        (error) => toIssue(ast, collection, error)
      )
  })
}

/**
 * Field strategy for `ReadonlyMap<K, V>`. Distinct keys that encode to the same name fail to encode.
 *
 * @example
 * ```ts
 * const Point = S.Struct({ a: S.Int, b: S.Int })
 * const Holder = S.Struct({ inner: AnyKeyMap(Point, Point) })
 * JSON.stringify(S.encodeSync(Holder)({ inner: new Map([[{ a: 3, b: 5 }, { a: 7, b: 9 }]]) }))
 * // '{"inner":{"{\"a\":3,\"b\":5}":{"a":7,"b":9}}}'
 * ```
 */
export const AnyKeyMap = <K, KI, V, VI>(key: S.Schema<K, KI>, value: S.Schema<V, VI>) =>
  makeEmbedding(
    key,
    value,
    S.ReadonlyMapFromSelf({ key: S.typeSchema(key), value: S.typeSchema(value) }),
    mapTarget<K, V>()
  )

/**
 * Field strategy for `ReadonlyArray<readonly [K, V]>`.
 *
 * Pair order follows the encoded record's property order: names that look like array
 * indices ("2", "10") come first in ascending order, the rest keep pair order. Two pairs
 * whose keys encode to the same name fail to encode.
 */
export const AnyKeyVec = <K, KI, V, VI>(key: S.Schema<K, KI>, value: S.Schema<V, VI>) =>
  makeEmbedding(
    key,
    value,
    S.Array(S.Tuple(S.typeSchema(key), S.typeSchema(value))),
    vecTarget<K, V>()
  )

/**
 * Field strategy for an effect `HashMap<K, V>`; use Data keys for structural equality.
 */
export const AnyKeyHashMap = <K, KI, V, VI>(key: S.Schema<K, KI>, value: S.Schema<V, VI>) =>
  makeEmbedding(
    key,
    value,
    S.HashMapFromSelf({ key: S.typeSchema(key), value: S.typeSchema(value) }),
    hashMapTarget<K, V>()
  )
