import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import {
  jsonSyntaxError,
  keyDecodeError,
  keyEncodeError,
  notJsonObject,
  renderMapCodecError,
  valueDecodeError,
  valueEncodeError
} from "../../src/core/errors.js"

describe("renderMapCodecError", () => {
  it.effect("prefixes each error with its stage", () =>
    Effect.sync(() => {
      expect(renderMapCodecError(keyEncodeError(2, "bad key"))).toBe("[key-encode] entry #2: bad key")
      expect(renderMapCodecError(valueEncodeError(0, "bad value"))).toBe("[value-encode] entry #0: bad value")
      expect(renderMapCodecError(jsonSyntaxError(7, "unterminated string"))).toBe("[json-syntax] at 7: unterminated string")
      expect(renderMapCodecError(notJsonObject("array"))).toBe("[not-object] expected a JSON object, found array")
      expect(renderMapCodecError(keyDecodeError("a\"b", "nope"))).toBe("[key-decode] field \"a\\\"b\": nope")
      expect(renderMapCodecError(valueDecodeError("k", "nope"))).toBe("[value-decode] field \"k\": nope")
    }))
})
