import * as AST from "@effect/schema/AST"
import * as S from "@effect/schema/Schema"

// CHANGE: derive the field-name schema for a key schema
// WHY: string keys become field names verbatim, every other key becomes a JSON text fragment
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀k: decode(keyField)(encode(keyField)(k)) = k when the key schema round-trips
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: passthrough ⇔ the key's encoded side only admits strings
// COMPLEXITY: O(|ast|)

export type KeyMode = "passthrough" | "json"

const isStringAst = (ast: AST.AST): boolean => {
  if (AST.isStringKeyword(ast) || AST.isTemplateLiteral(ast)) {
    return true
  }
  if (AST.isLiteral(ast)) {
    return typeof ast.literal === "string"
  }
  if (AST.isRefinement(ast)) {
    return isStringAst(ast.from)
  }
  if (AST.isUnion(ast)) {
    return ast.types.every(isStringAst)
  }
  return false
}

/**
 * Decide how keys of the given schema are written as field names.
 *
 * @param schema - Key schema.
 * @returns "passthrough" when the encoded key is always a string, otherwise "json".
 *
 * @pure true
 * @complexity O(|ast|)
 */
export const keyModeOf = <K, KI>(schema: S.Schema<K, KI>): KeyMode =>
  isStringAst(AST.encodedAST(schema.ast)) ? "passthrough" : "json"

/**
 * Build the schema mapping a key to its field name and back.
 *
 * @pure true
 * @invariant the result's encoded side is a string
 */
export const keyFieldSchema = <K, KI>(schema: S.Schema<K, KI>, mode: KeyMode): S.Schema<K, string> =>
  mode === "passthrough" ? S.compose(S.String, schema, { strict: false }) : S.parseJson(schema)
