import * as Either from "effect/Either"

import type { StrictParseError } from "./errors.js"
import { strictParseError } from "./errors.js"
import type { Json } from "./json.js"
import { isJson } from "./json.js"

// CHANGE: wrap strict JSON parsing into a typed Either
// WHY: every decoding attempt needs success/value or the parser message without exceptions
// QUOTE(TZ): "Failure carries the underlying parser's message verbatim"
// REF: req-parse-strict-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parseStrict(t) = Right(v) ↔ JSON.parse(t) succeeds ∧ v = JSON.parse(t)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Left carries the JSON.parse message unchanged
// COMPLEXITY: O(n) where n = text length

const errorMessage = (error: unknown): string => error instanceof Error ? error.message : String(error)

/**
 * Parse text with the standard JSON grammar.
 *
 * @param text - Candidate JSON text.
 * @returns Either with the parsed value or a StrictParseError.
 *
 * @pure true
 * @invariant accepts exactly what JSON.parse accepts
 * @complexity O(n)
 */
export const parseStrict = (text: string): Either.Either<Json, StrictParseError> => {
  const parsed = Either.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => strictParseError(errorMessage(error))
  })
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const value = parsed.right
  return isJson(value) ? Either.right(value) : Either.left(strictParseError("Parsed value is not JSON"))
}

export const looksLikeJson = (text: string): boolean => {
  const trimmed = text.trim()
  return (trimmed.startsWith("{") && trimmed.endsWith("}")) ||
    (trimmed.startsWith("[") && trimmed.endsWith("]"))
}
