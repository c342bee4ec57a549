import { Match } from "effect"

// CHANGE: unify error algebra for map transcoding
// WHY: every failure names the stage that produced it and stays exhaustively matchable
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ MapCodecError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type KeyEncodeError = {
  readonly _tag: "KeyEncodeError"
  readonly index: number
  readonly message: string
}
export type ValueEncodeError = {
  readonly _tag: "ValueEncodeError"
  readonly index: number
  readonly message: string
}
export type JsonSyntaxError = {
  readonly _tag: "JsonSyntaxError"
  readonly position: number
  readonly message: string
}
export type NotJsonObject = {
  readonly _tag: "NotJsonObject"
  readonly found: string
  readonly message: string
}
export type KeyDecodeError = {
  readonly _tag: "KeyDecodeError"
  readonly field: string
  readonly message: string
}
export type ValueDecodeError = {
  readonly _tag: "ValueDecodeError"
  readonly field: string
  readonly message: string
}

export type EncodeError = KeyEncodeError | ValueEncodeError

export type DecodeError = JsonSyntaxError | NotJsonObject | KeyDecodeError | ValueDecodeError

export type MapCodecError = EncodeError | DecodeError

export type FileError = {
  readonly _tag: "FileError"
  readonly path: string
  readonly message: string
}

export type AppError = MapCodecError | FileError

export const keyEncodeError = (index: number, message: string): KeyEncodeError => ({
  _tag: "KeyEncodeError",
  index,
  message
})

export const valueEncodeError = (index: number, message: string): ValueEncodeError => ({
  _tag: "ValueEncodeError",
  index,
  message
})

export const jsonSyntaxError = (position: number, message: string): JsonSyntaxError => ({
  _tag: "JsonSyntaxError",
  position,
  message
})

export const notJsonObject = (found: string): NotJsonObject => ({
  _tag: "NotJsonObject",
  found,
  message: `expected a JSON object, found ${found}`
})

export const keyDecodeError = (field: string, message: string): KeyDecodeError => ({
  _tag: "KeyDecodeError",
  field,
  message
})

export const valueDecodeError = (field: string, message: string): ValueDecodeError => ({
  _tag: "ValueDecodeError",
  field,
  message
})

export const fileError = (path: string, message: string): FileError => ({
  _tag: "FileError",
  path,
  message
})

/**
 * Render a codec error as a single line.
 *
 * @pure true
 * @invariant output starts with the stage in brackets
 */
export const renderMapCodecError = (error: MapCodecError): string =>
  Match.value(error).pipe(
    Match.tag("KeyEncodeError", (value) => `[key-encode] entry #${value.index}: ${value.message}`),
    Match.tag("ValueEncodeError", (value) => `[value-encode] entry #${value.index}: ${value.message}`),
    Match.tag("JsonSyntaxError", (value) => `[json-syntax] at ${value.position}: ${value.message}`),
    Match.tag("NotJsonObject", (value) => `[not-object] ${value.message}`),
    Match.tag("KeyDecodeError", (value) => `[key-decode] field ${JSON.stringify(value.field)}: ${value.message}`),
    Match.tag("ValueDecodeError", (value) => `[value-decode] field ${JSON.stringify(value.field)}: ${value.message}`),
    Match.exhaustive
  )
