import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { SegmentFailure, StrictParseError } from "./errors.js"
import { segmentFailure } from "./errors.js"
import type { Json } from "./json.js"
import { isJsonContainer } from "./json.js"
import { parseStrict } from "./parse.js"

// CHANGE: recover JSON from quoted, escaped or index-prefixed segments
// WHY: log pipelines emit JSON double-encoded inside strings, sometimes behind a record index
// QUOTE(TZ): "0: \"\"{\\\"key\\\":\\\"AIRCRAFT\\\"}\"\""
// REF: req-decode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: decode(s) = Right(v) → ∃k ≤ |steps|: parseLayered(applyAll(steps[0..k], s)) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: steps run from least to most aggressive, the first successful parse wins
// COMPLEXITY: O(k·n) where k = number of steps, n = segment length

/**
 * One fallback of the decoder: a pure transformation of the previous candidate text.
 * Steps are cumulative, each receives what the step before it produced.
 */
export interface DecodeStep {
  readonly name: string
  readonly apply: (text: string) => string
}

const INDEX_PREFIX = /^\s*\d+\s*:\s*/u
const DOUBLED_QUOTES = /^\s*""([\s\S]*)""\s*$/u
const BACKSLASH_ESCAPE = /\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|["'\\/bfnrt])/gu

export const stripIndexPrefix = (text: string): string => text.replace(INDEX_PREFIX, "")

/**
 * Remove exactly one layer of matching outer quotes, if present.
 *
 * @pure true
 * @invariant the result is never longer than the input
 */
export const stripOuterQuotes = (text: string): string => {
  if (text.length < 2) {
    return text
  }
  const first = text.charAt(0)
  const last = text.charAt(text.length - 1)
  if ((first === "\"" || first === "'") && first === last) {
    return text.slice(1, -1)
  }
  return text
}

export const collapseDoubledQuotes = (text: string): string => text.replace(DOUBLED_QUOTES, "\"$1\"")

const simpleEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "'": "'",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const resolveEscape = (sequence: string): string => {
  if (sequence.startsWith("u") || sequence.startsWith("x")) {
    return String.fromCharCode(Number.parseInt(sequence.slice(1), 16))
  }
  return simpleEscapes[sequence] ?? `\\${sequence}`
}

/**
 * Interpret backslash escapes that appear literally in the text.
 * Unknown escapes are kept as they are.
 *
 * @pure true
 * @invariant text without backslashes is returned unchanged
 * @complexity O(n)
 */
export const unescapeBackslashes = (text: string): string =>
  text.replace(BACKSLASH_ESCAPE, (_match, sequence: string) => resolveEscape(sequence))

export const decodeSteps: ReadonlyArray<DecodeStep> = [
  {
    name: "unwrap",
    apply: (text) => stripOuterQuotes(stripIndexPrefix(text).trim())
  },
  {
    name: "residual-quotes",
    apply: (text) => collapseDoubledQuotes(stripOuterQuotes(text.trim()))
  },
  {
    name: "unescape",
    apply: unescapeBackslashes
  }
]

/**
 * Parse text, then parse once more when the result is a string holding JSON text.
 *
 * @param text - Candidate text.
 * @returns Either with the innermost value or the outer parse error.
 *
 * @pure true
 * @invariant a string whose content is not JSON is returned as the string itself
 * @complexity O(n)
 */
export const parseLayered = (text: string): Either.Either<Json, StrictParseError> => {
  const outer = parseStrict(text)
  if (Either.isLeft(outer) || typeof outer.right !== "string") {
    return outer
  }
  const inner = parseStrict(outer.right)
  return Either.isRight(inner) ? inner : outer
}

/**
 * A segment that is already a valid JSON string literal keeps its string value,
 * unless the string holds a JSON object or array, which is decoded instead.
 * Strings such as `"12"` or `"true"` stay strings.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeStringLiteral = (segment: string): Option.Option<Json> => {
  const text = segment.trim()
  if (text.length < 2 || !text.startsWith("\"") || !text.endsWith("\"")) {
    return Option.none()
  }
  const outer = parseStrict(text)
  if (Either.isLeft(outer) || typeof outer.right !== "string") {
    return Option.none()
  }
  const inner = parseStrict(outer.right)
  return Either.isRight(inner) && isJsonContainer(inner.right) ? Option.some(inner.right) : Option.some(outer.right)
}

/**
 * Decode one segment by running the fallback steps in order.
 *
 * @param segment - Raw segment text.
 * @param steps - Ordered fallbacks, defaults to decodeSteps.
 * @returns Either with the recovered value or a SegmentFailure listing every attempt.
 *
 * @pure true
 * @invariant attempts.length = steps.length on failure
 * @complexity O(k·n)
 */
export const decodeSegment = (
  segment: string,
  steps: ReadonlyArray<DecodeStep> = decodeSteps
): Either.Either<Json, SegmentFailure> => {
  const literal = decodeStringLiteral(segment)
  if (Option.isSome(literal)) {
    return Either.right(literal.value)
  }
  const attempts: Array<string> = []
  let candidate = segment
  for (const step of steps) {
    candidate = step.apply(candidate)
    const parsed = parseLayered(candidate)
    if (Either.isRight(parsed)) {
      return Either.right(parsed.right)
    }
    attempts.push(parsed.left.message)
  }
  return Either.left(segmentFailure(attempts))
}
