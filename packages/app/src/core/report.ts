import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliCommand } from "./cli.js"
import type { ResolvedConfig } from "./config.js"
import type { PathError, SerializeError } from "./errors.js"
import type { Json, JsonObject } from "./json.js"
import type { NormalizationResult } from "./normalize.js"
import { extractByPath } from "./path.js"
import { search } from "./query.js"
import type { SerializeOptions } from "./serialize.js"
import { serializeJson } from "./serialize.js"
import type { NodeStats } from "./stats.js"
import { countNodes } from "./stats.js"
import { renderTree } from "./tree.js"
import type { CommandOutcome, Report, SearchHit } from "./types.js"

// CHANGE: build command reports and render output formats
// WHY: keep inspection and rendering pure and deterministic across commands
// QUOTE(TZ): "Matches: N"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: renderJsonReport(r) parses back to an object with primary, entries and errors
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: search output shows at most searchLimit hits
// COMPLEXITY: O(n)

export interface InspectRequest {
  readonly command: CliCommand
  readonly query: string | undefined
  readonly path: string | undefined
}

const compactOptions: SerializeOptions = { pretty: false, indent: 0 }

const buildSearch = (value: Json, query: string, limit: number): CommandOutcome => {
  const paths = search(value, query)
  const hits: ReadonlyArray<SearchHit> = paths.slice(0, limit).map((path) => ({
    path,
    value: Option.getRight(extractByPath(value, path))
  }))
  return { _tag: "Search", query, total: paths.length, hits }
}

const buildOutcome = (
  request: InspectRequest,
  value: Json,
  config: ResolvedConfig
): Either.Either<CommandOutcome, PathError> => {
  switch (request.command) {
    case "normalize":
      return Either.right<CommandOutcome>({ _tag: "Normalized", value })
    case "tree":
      return Either.right<CommandOutcome>({ _tag: "Tree", lines: renderTree(value, config) })
    case "search":
      return Either.right(buildSearch(value, request.query ?? "", config.searchLimit))
    case "extract": {
      const path = (request.path ?? "").trim()
      return Either.map(extractByPath(value, path), (extracted): CommandOutcome => ({
        _tag: "Extract",
        path,
        value: extracted
      }))
    }
    case "stats":
      return Either.right<CommandOutcome>({ _tag: "Stats", stats: countNodes(value) })
  }
}

/**
 * Run the requested inspection over a normalization result.
 *
 * @param request - Command and its query/path.
 * @param normalization - Output of normalize.
 * @param config - Resolved configuration.
 * @returns Either with a Report or the PathError of a failed extraction.
 *
 * @pure true
 * @invariant no primary value → Empty outcome
 * @complexity O(n)
 */
export const buildReport = (
  request: InspectRequest,
  normalization: NormalizationResult,
  config: ResolvedConfig
): Either.Either<Report, PathError> => {
  if (Option.isNone(normalization.primary)) {
    return Either.right<Report>({ normalization, outcome: { _tag: "Empty" } })
  }
  return Either.map(
    buildOutcome(request, normalization.primary.value, config),
    (outcome): Report => ({ normalization, outcome })
  )
}

const formatHit = (hit: SearchHit): Either.Either<string, SerializeError> =>
  Option.match(hit.value, {
    onNone: () => Either.right(`  - ${hit.path}`),
    onSome: (value) => Either.map(serializeJson(value, compactOptions), (text) => `  - ${hit.path}: ${text}`)
  })

const renderSearch = (total: number, hits: ReadonlyArray<SearchHit>): Either.Either<string, SerializeError> => {
  if (total === 0) {
    return Either.right("Matches: 0\nNo matches found.")
  }
  const omitted = total - hits.length
  return Either.map(Either.all(hits.map(formatHit)), (lines) =>
    [
      `Matches: ${total}`,
      ...lines,
      ...(omitted > 0 ? [`  … ${omitted} more`] : [])
    ].join("\n"))
}

const renderStats = (stats: NodeStats): string =>
  [
    `Objects: ${stats.objects}`,
    `Arrays: ${stats.arrays}`,
    `Strings: ${stats.strings}`,
    `Numbers: ${stats.numbers}`,
    `Booleans: ${stats.booleans}`,
    `Nulls: ${stats.nulls}`,
    `Total nodes traversed: ${stats.totalNodes}`
  ].join("\n")

export const EMPTY_MESSAGE = "No JSON value could be recovered."

/**
 * Render a human-readable report for stdout.
 *
 * @pure true
 * @invariant Normalized and Extract outcomes render as JSON text only
 * @complexity O(n)
 */
export const renderHumanReport = (
  report: Report,
  options: SerializeOptions
): Either.Either<string, SerializeError> =>
  Match.value(report.outcome).pipe(
    Match.tag("Normalized", (outcome) => serializeJson(outcome.value, options)),
    Match.tag("Tree", (outcome): Either.Either<string, SerializeError> => Either.right(outcome.lines.join("\n"))),
    Match.tag("Search", (outcome) => renderSearch(outcome.total, outcome.hits)),
    Match.tag("Extract", (outcome) => serializeJson(outcome.value, options)),
    Match.tag("Stats", (outcome) => Either.right(renderStats(outcome.stats))),
    Match.tag("Empty", () => Either.right(EMPTY_MESSAGE)),
    Match.exhaustive
  )

const statsJson = (stats: NodeStats): JsonObject => ({
  objects: stats.objects,
  arrays: stats.arrays,
  strings: stats.strings,
  numbers: stats.numbers,
  booleans: stats.booleans,
  nulls: stats.nulls,
  totalNodes: stats.totalNodes
})

const outcomeJson = (outcome: CommandOutcome): JsonObject =>
  Match.value(outcome).pipe(
    Match.tag("Normalized", (): JsonObject => ({ command: "normalize" })),
    Match.tag("Tree", (value): JsonObject => ({ command: "tree", lines: value.lines })),
    Match.tag("Search", (value): JsonObject => ({
      command: "search",
      query: value.query,
      total: value.total,
      hits: value.hits.map((hit) =>
        Option.match(hit.value, {
          onNone: (): JsonObject => ({ path: hit.path }),
          onSome: (extracted): JsonObject => ({ path: hit.path, value: extracted })
        })
      )
    })),
    Match.tag("Extract", (value): JsonObject => ({ command: "extract", path: value.path, value: value.value })),
    Match.tag("Stats", (value): JsonObject => ({ command: "stats", stats: statsJson(value.stats) })),
    Match.tag("Empty", (): JsonObject => ({ command: "none" })),
    Match.exhaustive
  )

/**
 * Render the report as one JSON document.
 *
 * @pure true
 * @invariant `primary` is present iff a value was recovered
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report, options: SerializeOptions): Either.Either<string, SerializeError> => {
  const { normalization } = report
  const base: JsonObject = {
    recovered: Option.isSome(normalization.primary),
    entries: normalization.entries,
    errors: normalization.errors,
    result: outcomeJson(report.outcome)
  }
  const document: JsonObject = Option.match(normalization.primary, {
    onNone: () => base,
    onSome: (primary) => ({ primary, ...base })
  })
  return serializeJson(document, options)
}
