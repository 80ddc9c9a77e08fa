import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { decodeSegment } from "./decode.js"
import type { Json } from "./json.js"
import { looksLikeJson, parseStrict } from "./parse.js"
import { segment } from "./segment.js"

// CHANGE: orchestrate segmentation and per-segment decoding into one result
// WHY: partial success is expected, failing segments must not hide recovered ones
// QUOTE(TZ): "Multiple records (one per line) are collected into an array automatically"
// REF: req-normalize-1
// SOURCE: n/a
// FORMAT THEOREM: |entries| > 1 → primary = Some(entries); |entries| = 1 → primary = Some(entries[0])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: normalize never throws; failures are appended to errors in input order
// INVARIANT: primary = None → errors ≠ ∅
// COMPLEXITY: O(s·n) where s = segments, n = segment length

export interface NormalizationResult {
  readonly primary: Option.Option<Json>
  readonly entries: ReadonlyArray<Json>
  readonly errors: ReadonlyArray<string>
}

export const SEGMENT_PREVIEW_LENGTH = 200

const BYTE_ORDER_MARK = "\uFEFF"

export const stripByteOrderMark = (text: string): string =>
  text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text

const preview = (text: string): string => Array.from(text).slice(0, SEGMENT_PREVIEW_LENGTH).join("")

const SEGMENT_FAILURE_PREFIX = "Segment failed: "

export const NO_CONTENT_MESSAGE = "No JSON content found in input"

export const formatSegmentFailure = (reason: string, text: string): string =>
  `${SEGMENT_FAILURE_PREFIX}${reason}\nSegment: ${preview(text)}`

/**
 * Number of diagnostics that come from segments the decoder gave up on.
 * The whole-document `Parse error` recorded before segmentation is not counted.
 */
export const countSegmentFailures = (result: NormalizationResult): number =>
  result.errors.filter((error) => error.startsWith(SEGMENT_FAILURE_PREFIX)).length

const decodeOne = (text: string): Either.Either<Json, string> => {
  if (looksLikeJson(text)) {
    const strict = parseStrict(text)
    if (Either.isRight(strict)) {
      return Either.right(strict.right)
    }
  }
  return Either.mapLeft(decodeSegment(text), (failure) => failure.message)
}

const derivePrimary = (entries: ReadonlyArray<Json>): Option.Option<Json> => {
  if (entries.length > 1) {
    return Option.some(entries)
  }
  const [single] = entries
  return single === undefined ? Option.none() : Option.some(single)
}

/**
 * Normalize raw JSON-like text into a JSON value, recovered entries and diagnostics.
 *
 * @param text - Raw input (pasted or read from a file).
 * @returns NormalizationResult; never fails.
 *
 * @pure true
 * @invariant a clean bracketed JSON document yields Some(value), no entries and no errors
 * @complexity O(s·n)
 */
export const normalize = (text: string): NormalizationResult => {
  const input = stripByteOrderMark(text)
  const errors: Array<string> = []
  if (looksLikeJson(input)) {
    const whole = parseStrict(input)
    if (Either.isRight(whole)) {
      return { primary: Option.some(whole.right), entries: [], errors }
    }
    errors.push(`Parse error: ${whole.left.message}`)
  }

  const entries: Array<Json> = []
  for (const raw of segment(input)) {
    const candidate = raw.trim()
    if (candidate.length === 0) {
      continue
    }
    const decoded = decodeOne(candidate)
    if (Either.isRight(decoded)) {
      entries.push(decoded.right)
    } else {
      errors.push(formatSegmentFailure(decoded.left, candidate))
    }
  }

  if (entries.length === 0 && errors.length === 0) {
    errors.push(NO_CONTENT_MESSAGE)
  }

  return { primary: derivePrimary(entries), entries, errors }
}
