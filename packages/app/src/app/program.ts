import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger } from "effect"
import type * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import type { NormalizationResult } from "../core/normalize.js"
import { countSegmentFailures, normalize } from "../core/normalize.js"
import { buildReport, renderHumanReport, renderJsonReport } from "../core/report.js"
import type { SerializeOptions } from "../core/serialize.js"
import { serializeJson } from "../core/serialize.js"
import type { Report } from "../core/types.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readInput } from "../shell/input.js"
import { logLevelFor } from "../shell/logger.js"
import { writeOutputFile, writeStdout } from "../shell/output.js"

// CHANGE: orchestrate one CLI run: read, normalize, inspect, emit
// WHY: enforce a single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "Paste tricky JSON (escaped strings, indexed lines): it will decode & parse automatically."
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly report: Report
  readonly output: string
  readonly exitCode: number
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const serializeOptions = (config: ResolvedConfig): SerializeOptions => ({
  pretty: config.pretty,
  indent: config.indent
})

const exitCodeFor = (cli: CliArgs, normalization: NormalizationResult): number => {
  if (Option.isNone(normalization.primary)) {
    return 2
  }
  return cli.strict && countSegmentFailures(normalization) > 0 ? 2 : 0
}

const logDiagnostics = (cli: CliArgs, normalization: NormalizationResult): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    yield* _(
      Effect.logDebug(
        `normalized input: entries=${normalization.entries.length}, errors=${normalization.errors.length}`
      )
    )
    if (cli.json) {
      return
    }
    for (const error of normalization.errors) {
      yield* _(Effect.logWarning(error))
    }
  })

const writeDownload = (
  cli: CliArgs,
  normalization: NormalizationResult,
  options: SerializeOptions
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const outPath = cli.outPath
    if (outPath === undefined || Option.isNone(normalization.primary)) {
      return
    }
    const payload = yield* _(fromEither(serializeJson(normalization.primary.value, options)))
    yield* _(writeOutputFile(outPath, payload))
    yield* _(Effect.logDebug(`wrote ${outPath}`))
  })

const execute = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const options = serializeOptions(config)
    const text = yield* _(readInput({ text: cli.text, path: cli.inputPath }))
    const normalization = normalize(text)
    yield* _(logDiagnostics(cli, normalization))
    yield* _(writeDownload(cli, normalization, options))
    const report = yield* _(
      fromEither(buildReport({ command: cli.command, query: cli.query, path: cli.path }, normalization, config))
    )
    const output = yield* _(fromEither(cli.json ? renderJsonReport(report, options) : renderHumanReport(report, options)))
    if (!cli.silent) {
      yield* _(writeStdout(output))
    }
    return { report, output, exitCode: exitCodeFor(cli, normalization) }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report, rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, stdin, stdout, logger
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(execute(cli).pipe(Logger.withMinimumLogLevel(logLevelFor(cli))))
  })
