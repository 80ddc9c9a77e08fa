import * as Either from "effect/Either"

import { parseStrict } from "./parse.js"

// CHANGE: split raw multi-record input into candidate segments
// WHY: logs carry one record per line or objects concatenated without an enclosing array
// QUOTE(TZ): "One JSON object per line"
// REF: req-segment-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parseStrict(trim(t)) = Right(_) → segment(t) = [trim(t)]
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: whole-input validity is checked before any split
// COMPLEXITY: O(n)

const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/u
const OBJECT_BOUNDARY = /\}\s*,\s*\{/u

export const splitLines = (text: string): ReadonlyArray<string> =>
  text.split(LINE_BREAK).filter((line) => line.trim().length > 0)

/**
 * Split `{...},{...}` into its objects, restoring the braces the boundary consumed.
 * Nested values that contain the boundary themselves are split too.
 *
 * @pure true
 * @invariant result.length ≥ 1
 * @complexity O(n)
 */
export const splitConcatenatedObjects = (text: string): ReadonlyArray<string> => {
  const parts = text.split(OBJECT_BOUNDARY)
  const lastIndex = parts.length - 1
  return parts.map((part, index) => {
    const head = index === 0 ? "" : "{"
    const tail = index === lastIndex ? "" : "}"
    return `${head}${part}${tail}`
  })
}

/**
 * Split raw input into candidate JSON segments.
 *
 * @param text - Raw input text.
 * @returns Ordered segments; the whole (trimmed) input when it cannot be split.
 *
 * @pure true
 * @invariant result.length ≥ 1
 * @complexity O(n)
 */
export const segment = (text: string): ReadonlyArray<string> => {
  const trimmed = text.trim()
  if (Either.isRight(parseStrict(trimmed))) {
    return [trimmed]
  }
  const lines = splitLines(trimmed)
  if (lines.length > 1) {
    return lines
  }
  const objects = splitConcatenatedObjects(trimmed)
  if (objects.length > 1) {
    return objects
  }
  return [trimmed]
}
