import * as Either from "effect/Either"

import type { ResolvedFormat } from "./format.js"
import { defaultFormat } from "./format.js"

// CHANGE: write JSON object fields one at a time into a sink
// WHY: transcoded keys go straight to the output instead of into a string-keyed copy
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀fs: text(fs) = JSON.stringify(objectOf(fs), null, indent) when names are unique and non-numeric
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: field order equals call order
// COMPLEXITY: O(n) where n = total emitted characters

export interface TextSink {
  readonly write: (chunk: string) => void
}

export interface StringSink extends TextSink {
  readonly text: () => string
}

/**
 * Why a writer refused a field: its name (`"name"`) or its value (`"value"`).
 */
export interface FieldRejection {
  readonly on: "name" | "value"
  readonly message: string
}

/**
 * Field-by-field writer for one JSON object.
 *
 * `field` returns Left when the field cannot be written; nothing is emitted for it.
 */
export interface ObjectWriter<A, R> {
  readonly field: (name: string, value: A) => Either.Either<void, FieldRejection>
  readonly finish: () => R
}

const rejectValue = (message: string): FieldRejection => ({ on: "value", message })

const rejectName = (message: string): FieldRejection => ({ on: "name", message })

export const stringSink = (): StringSink => {
  const chunks: Array<string> = []
  return {
    write: (chunk) => {
      chunks.push(chunk)
    },
    text: () => chunks.join("")
  }
}

export const chunkSink = (onChunk: (chunk: string) => void): TextSink => ({ write: onChunk })

const stringifyValue = (value: unknown, indent: string): Either.Either<string, FieldRejection> =>
  Either.flatMap(
    Either.try({
      try: (): string | undefined => JSON.stringify(value, null, indent),
      catch: (error) => rejectValue(error instanceof Error ? error.message : String(error))
    }),
    (text) =>
      text === undefined ? Either.left(rejectValue(`${typeof value} has no JSON representation`)) : Either.right(text)
  )

const reindent = (text: string, prefix: string): string =>
  prefix.length === 0 ? text : text.replaceAll("\n", `\n${prefix}`)

/**
 * Create a writer emitting JSON object text into the sink.
 *
 * The opening brace is written lazily so an empty object comes out as "{}" in every format.
 *
 * @param sink - Destination of text chunks.
 * @param format - Resolved indentation.
 *
 * @pure false
 * @effect writes to sink
 * @complexity O(n)
 */
export const makeTextWriter = (
  sink: TextSink,
  format: ResolvedFormat = defaultFormat
): ObjectWriter<unknown, void> => {
  const pretty = format.indent.length > 0
  const open = pretty ? `{\n${format.indent}` : "{"
  const separator = pretty ? `,\n${format.indent}` : ","
  const colon = pretty ? ": " : ":"
  let count = 0
  return {
    field: (name, value) =>
      Either.map(stringifyValue(value, format.indent), (text) => {
        sink.write(count === 0 ? open : separator)
        sink.write(`${JSON.stringify(name)}${colon}${reindent(text, format.indent)}`)
        count += 1
      }),
    finish: () => {
      if (count === 0) {
        sink.write("{}")
        return
      }
      sink.write(pretty ? "\n}" : "}")
    }
  }
}

/**
 * Create a writer collecting encoded values into a string-keyed record.
 *
 * The record has no prototype, so a "__proto__" field name is stored as an own property.
 * A repeated name is rejected.
 *
 * @pure true
 * @invariant every accepted field is an own property of the result
 */
export const makeRecordWriter = <A>(): ObjectWriter<A, { readonly [key: string]: A }> => {
  const record: Record<string, A> = Object.create(null)
  return {
    field: (name, value) => {
      if (Object.hasOwn(record, name)) {
        return Either.left(rejectName(`duplicate field name ${JSON.stringify(name)}`))
      }
      record[name] = value
      return Either.right(undefined)
    },
    finish: () => record
  }
}
