import * as Either from "effect/Either"

import type { JsonSyntaxError, MapCodecError } from "./errors.js"
import { jsonSyntaxError, notJsonObject } from "./errors.js"
import type { Json } from "./json.js"
import { describeJson } from "./json.js"

// CHANGE: scan the fields of a JSON object one at a time, in document order
// WHY: decoding never materializes a parsed outer object, so field order survives integer-like names
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀t: fields(t) = entries of JSON.parse(t) in source order when t is an object without duplicate names
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every name and value token is validated by JSON.parse before it is returned
// COMPLEXITY: O(n) where n = text length

export type FieldStep =
  | {
    readonly _tag: "Field"
    readonly name: string
    readonly value: Json
    readonly state: ReaderState
  }
  | { readonly _tag: "End" }

export interface ReaderState {
  readonly index: number
  readonly first: boolean
}

const isWhitespace = (char: string): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r"

const skipWhitespace = (text: string, index: number): number => {
  let cursor = index
  while (cursor < text.length && isWhitespace(text.charAt(cursor))) {
    cursor += 1
  }
  return cursor
}

const describeChar = (text: string, index: number): string =>
  index < text.length ? JSON.stringify(text.charAt(index)) : "end of input"

const unexpected = (text: string, index: number, expected: string): JsonSyntaxError =>
  jsonSyntaxError(index, `expected ${expected}, found ${describeChar(text, index)}`)

// returns the index just past the closing quote
const scanString = (text: string, start: number): Either.Either<number, JsonSyntaxError> => {
  let cursor = start + 1
  while (cursor < text.length) {
    const char = text.charAt(cursor)
    if (char === "\\") {
      cursor += 2
    } else if (char === "\"") {
      return Either.right(cursor + 1)
    } else {
      cursor += 1
    }
  }
  return Either.left(jsonSyntaxError(start, "unterminated string"))
}

// bracket balance only; JSON.parse validates the slice afterwards
const scanComposite = (text: string, start: number): Either.Either<number, JsonSyntaxError> => {
  let depth = 0
  let cursor = start
  while (cursor < text.length) {
    const char = text.charAt(cursor)
    if (char === "\"") {
      const end = scanString(text, cursor)
      if (Either.isLeft(end)) {
        return end
      }
      cursor = end.right
      continue
    }
    if (char === "{" || char === "[") {
      depth += 1
    } else if (char === "}" || char === "]") {
      depth -= 1
      if (depth === 0) {
        return Either.right(cursor + 1)
      }
    }
    cursor += 1
  }
  return Either.left(jsonSyntaxError(start, "unterminated object or array"))
}

const isScalarEnd = (char: string): boolean =>
  isWhitespace(char) || char === "," || char === "}" || char === "]"

const scanScalar = (text: string, start: number): Either.Either<number, JsonSyntaxError> => {
  let cursor = start
  while (cursor < text.length && !isScalarEnd(text.charAt(cursor))) {
    cursor += 1
  }
  return cursor === start ? Either.left(unexpected(text, start, "a value")) : Either.right(cursor)
}

const scanValue = (text: string, start: number): Either.Either<number, JsonSyntaxError> => {
  const char = text.charAt(start)
  if (char === "\"") {
    return scanString(text, start)
  }
  if (char === "{" || char === "[") {
    return scanComposite(text, start)
  }
  return scanScalar(text, start)
}

const parseSlice = (text: string, start: number, end: number): Either.Either<Json, JsonSyntaxError> =>
  Either.try({
    try: (): Json => JSON.parse(text.slice(start, end)),
    catch: (error) => jsonSyntaxError(start, error instanceof Error ? error.message : String(error))
  })

const parseName = (text: string, start: number): Either.Either<{ readonly name: string; readonly end: number }, JsonSyntaxError> => {
  if (text.charAt(start) !== "\"") {
    return Either.left(unexpected(text, start, "a field name"))
  }
  return Either.flatMap(scanString(text, start), (end) =>
    Either.flatMap(parseSlice(text, start, end), (parsed) =>
      typeof parsed === "string"
        ? Either.right({ name: parsed, end })
        : Either.left(unexpected(text, start, "a field name"))))
}

const endOfObject = (text: string, index: number): Either.Either<FieldStep, JsonSyntaxError> => {
  const rest = skipWhitespace(text, index + 1)
  return rest === text.length
    ? Either.right<FieldStep>({ _tag: "End" })
    : Either.left(unexpected(text, rest, "end of input"))
}

const classifyNonObject = (text: string, index: number): MapCodecError => {
  const whole = Either.try({
    try: (): Json => JSON.parse(text),
    catch: () => unexpected(text, index, "\"{\"")
  })
  return Either.isLeft(whole) ? whole.left : notJsonObject(describeJson(whole.right))
}

/**
 * Position the reader just inside the opening brace.
 *
 * @param text - JSON text expected to hold an object.
 * @returns Initial reader state, JsonSyntaxError, or NotJsonObject for other valid JSON.
 *
 * @pure true
 * @complexity O(1) for objects, O(n) otherwise
 */
export const openObject = (text: string): Either.Either<ReaderState, MapCodecError> => {
  const index = skipWhitespace(text, 0)
  if (text.charAt(index) !== "{") {
    return Either.left(classifyNonObject(text, index))
  }
  return Either.right({ index: index + 1, first: true })
}

/**
 * Read the next field after the given state.
 *
 * @param text - The same text passed to openObject.
 * @param state - State returned by openObject or by the previous Field step.
 * @returns The next field with its follow-up state, End once the closing brace and
 *          trailing whitespace are consumed, or a JsonSyntaxError.
 *
 * @pure true
 * @invariant End is only returned when nothing but whitespace follows the object
 * @complexity O(k) where k = length of the field
 */
export const nextField = (text: string, state: ReaderState): Either.Either<FieldStep, JsonSyntaxError> => {
  let cursor = skipWhitespace(text, state.index)
  const char = text.charAt(cursor)
  if (char === "}") {
    return endOfObject(text, cursor)
  }
  if (!state.first) {
    if (char !== ",") {
      return Either.left(unexpected(text, cursor, "\",\" or \"}\""))
    }
    cursor = skipWhitespace(text, cursor + 1)
  }
  const name = parseName(text, cursor)
  if (Either.isLeft(name)) {
    return Either.left(name.left)
  }
  const colon = skipWhitespace(text, name.right.end)
  if (text.charAt(colon) !== ":") {
    return Either.left(unexpected(text, colon, "\":\""))
  }
  const valueStart = skipWhitespace(text, colon + 1)
  return Either.flatMap(scanValue(text, valueStart), (valueEnd) =>
    Either.map(parseSlice(text, valueStart, valueEnd), (value): FieldStep => ({
      _tag: "Field",
      name: name.right.name,
      value,
      state: { index: valueEnd, first: false }
    })))
}
