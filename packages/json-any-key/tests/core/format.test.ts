import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { resolveFormat } from "../../src/core/format.js"

describe("resolveFormat", () => {
  it.effect("defaults to compact output", () =>
    Effect.sync(() => {
      expect(resolveFormat(undefined)).toEqual({ indent: "" })
      expect(resolveFormat({})).toEqual({ indent: "" })
    }))

  it.effect("turns numbers into spaces clamped to ten", () =>
    Effect.sync(() => {
      expect(resolveFormat({ indent: 2 })).toEqual({ indent: "  " })
      expect(resolveFormat({ indent: 2.9 })).toEqual({ indent: "  " })
      expect(resolveFormat({ indent: 40 }).indent).toHaveLength(10)
      expect(resolveFormat({ indent: 0 })).toEqual({ indent: "" })
      expect(resolveFormat({ indent: -3 })).toEqual({ indent: "" })
    }))

  it.effect("cuts string indents to ten characters", () =>
    Effect.sync(() => {
      expect(resolveFormat({ indent: "\t" })).toEqual({ indent: "\t" })
      expect(resolveFormat({ indent: "abcdefghijkl" })).toEqual({ indent: "abcdefghij" })
    }))
})
