import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { MapCodec } from "../core/codec.js"
import { decodeEntries } from "../core/codec.js"
import { serializeToSink } from "../core/collections.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { stringSink } from "../core/object-writer.js"
import type { PairSource } from "../core/sources.js"
import type { PairTarget } from "../core/targets.js"

// CHANGE: persist pair collections as JSON map files
// WHY: keep file IO at the edge while the codec stays pure
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀ps: read(write(ps)) ≅ ps
// PURITY: SHELL
// EFFECT: Effect<A, AppError, FileSystem>
// INVARIANT: nothing is written when encoding fails
// COMPLEXITY: O(n)

const encodeText = <K, V, VI>(
  source: PairSource<K, V>,
  codec: MapCodec<K, V, VI>
): Either.Either<string, AppError> => {
  const sink = stringSink()
  return Either.map(serializeToSink(source, codec, sink), () => sink.text())
}

/**
 * Serialize pairs and write them to a file.
 *
 * @param path - Destination file; replaced if it exists.
 * @param source - Pairs to write.
 * @param codec - Key and value schemas.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant the file is untouched when any pair fails to encode
 * @complexity O(n)
 */
export const writeJsonMapFile = <K, V, VI>(
  path: string,
  source: PairSource<K, V>,
  codec: MapCodec<K, V, VI>
): Effect.Effect<void, AppError, FileSystemService> =>
  pipe(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const text = yield* _(encodeText(source, codec))
      yield* _(
        fs.writeFileString(path, text).pipe(Effect.mapError((error) => fileError(path, String(error))))
      )
      yield* _(Effect.logDebug("json map written").pipe(Effect.annotateLogs({ path, bytes: text.length })))
    }),
    Effect.withLogSpan("writeJsonMapFile")
  )

/**
 * Read a file and decode it into the target collection.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @complexity O(n)
 */
export const readJsonMapFile = <K, V, VI, C>(
  path: string,
  codec: MapCodec<K, V, VI>,
  target: PairTarget<K, V, C>
): Effect.Effect<C, AppError, FileSystemService> =>
  pipe(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const text = yield* _(
        fs.readFileString(path).pipe(Effect.mapError((error) => fileError(path, String(error))))
      )
      const decoded = yield* _(decodeEntries(text, codec, target))
      yield* _(Effect.logDebug("json map read").pipe(Effect.annotateLogs({ path, bytes: text.length })))
      return decoded
    }),
    Effect.withLogSpan("readJsonMapFile")
  )
