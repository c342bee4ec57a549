// CHANGE: define codec options and their defaults
// WHY: indentation follows the same clamping rules as JSON.stringify so pretty output stays comparable
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀o: resolve(o).indent = clamp(o.indent) ?? ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent is at most 10 characters
// COMPLEXITY: O(1)/O(1)

export interface CodecOptions {
  readonly indent?: number | string
}

export interface ResolvedFormat {
  readonly indent: string
}

const maxIndent = 10

export const defaultFormat: ResolvedFormat = { indent: "" }

const resolveIndent = (indent: number | string | undefined): string => {
  if (indent === undefined) {
    return defaultFormat.indent
  }
  if (typeof indent === "string") {
    return indent.slice(0, maxIndent)
  }
  const width = Math.min(maxIndent, Math.floor(indent))
  return width >= 1 ? " ".repeat(width) : ""
}

/**
 * Resolve user options into the format the text writer uses.
 *
 * @param options - Options passed to makeMapCodec.
 * @returns Resolved format.
 *
 * @pure true
 * @invariant indent.length ≤ 10
 * @complexity O(1)
 */
export const resolveFormat = (options: CodecOptions | undefined): ResolvedFormat => ({
  indent: resolveIndent(options?.indent)
})
