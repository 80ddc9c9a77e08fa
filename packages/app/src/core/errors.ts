import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra for normalization, querying and the CLI shell
// WHY: failures stay typed values so per-segment errors never abort a whole run
// QUOTE(TZ): "normalization never aborts on a single segment's failure"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type StrictParseError = { readonly _tag: "StrictParseError"; readonly message: string }
export type SegmentFailure = {
  readonly _tag: "SegmentFailure"
  readonly attempts: ReadonlyArray<string>
  readonly message: string
}
export type PathErrorReason = "key-not-found" | "index-out-of-range"
export type PathError = {
  readonly _tag: "PathError"
  readonly reason: PathErrorReason
  readonly token: string
  readonly message: string
}
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type SerializeError = { readonly _tag: "SerializeError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | PathError
  | SerializeError

export const strictParseError = (message: string): StrictParseError => ({
  _tag: "StrictParseError",
  message
})

export const segmentFailure = (attempts: ReadonlyArray<string>): SegmentFailure => ({
  _tag: "SegmentFailure",
  attempts,
  message: `Failed to decode escaped JSON. Attempts: ${attempts.join(" | ")}`
})

export const keyNotFound = (key: string): PathError => ({
  _tag: "PathError",
  reason: "key-not-found",
  token: key,
  message: `Key not found: ${key}`
})

export const indexOutOfRange = (index: number): PathError => ({
  _tag: "PathError",
  reason: "index-out-of-range",
  token: `[${index}]`,
  message: `Index out of range at [${index}]`
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const serializeError = (message: string): SerializeError => ({
  _tag: "SerializeError",
  message
})

/**
 * Render an application error as a single stderr line.
 *
 * @pure true
 * @invariant output is prefixed with a stable per-tag label
 * @complexity O(1)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `Invalid arguments: ${value.message}`),
    Match.tag("ConfigError", (value) => `Invalid config: ${value.message}`),
    Match.tag("FileError", (value) => `File error: ${value.message}`),
    Match.tag("PathError", (value) => value.message),
    Match.tag("SerializeError", (value) => `Serialization failed: ${value.message}`),
    Match.exhaustive
  )
