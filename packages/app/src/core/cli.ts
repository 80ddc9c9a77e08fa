import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for json-mend
// WHY: keep argv decoding pure and testable at the boundary
// QUOTE(TZ): "Tree, Raw, Search, Path Extract, Stats, Download"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "normalize" | "tree" | "search" | "extract" | "stats"

export interface CliArgs {
  readonly command: CliCommand
  readonly text: string | undefined
  readonly inputPath: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly outPath: string | undefined
  readonly query: string | undefined
  readonly path: string | undefined
  readonly pretty: boolean | undefined
  readonly maxDepth: number | undefined
  readonly searchLimit: number | undefined
  readonly json: boolean
  readonly silent: boolean
  readonly strict: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const STDIN_PATH = "-"

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("--")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parsePositiveInteger = (flagName: string, value: string): Either.Either<number, CliError> => {
  const parsed = /^\d+$/u.test(value) ? Number.parseInt(value, 10) : Number.NaN
  return Number.isSafeInteger(parsed) && parsed > 0
    ? Either.right(parsed)
    : Either.left(cliError(`--${flagName} expects a positive integer, got: ${value}`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("normalize", () => Either.right<CliCommand>("normalize")),
    Match.when("tree", () => Either.right<CliCommand>("tree")),
    Match.when("search", () => Either.right<CliCommand>("search")),
    Match.when("extract", () => Either.right<CliCommand>("extract")),
    Match.when("stats", () => Either.right<CliCommand>("stats")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  text: undefined,
  inputPath: STDIN_PATH,
  configPath: "./.json-mend.json",
  configPathExplicit: false,
  outPath: undefined,
  query: undefined,
  path: undefined,
  pretty: undefined,
  maxDepth: undefined,
  searchLimit: undefined,
  json: false,
  silent: false,
  strict: false,
  verbose: false
})

type ParsedFlag = { readonly next: CliArgs; readonly consumed: number }

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue) &&
    (nextValue === "true" || nextValue === "false" || nextValue === "1" || nextValue === "0")
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  strict: (current) => setParsedFlag({ ...current, strict: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  compact: (current) => setParsedFlag({ ...current, pretty: false }, 1),
  pretty: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      pretty: value
    })),
  text: (current, inlineValue, nextValue) =>
    parseValueFlag("text", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, text: value })),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        inputPath: value
      })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  out: (current, inlineValue, nextValue) =>
    parseValueFlag("out", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, outPath: value })),
  query: (current, inlineValue, nextValue) =>
    parseValueFlag("query", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, query: value })),
  path: (current, inlineValue, nextValue) =>
    parseValueFlag("path", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, path: value })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parsePositiveInteger("max-depth", value), (maxDepth) => ({ ...args, maxDepth }))),
  limit: (current, inlineValue, nextValue) =>
    parseValueFlag("limit", current, inlineValue, nextValue, (args, value) =>
      Either.map(parsePositiveInteger("limit", value), (searchLimit) => ({ ...args, searchLimit })))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "normalize", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const requireCommandInputs = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.command === "search" && (args.query === undefined || args.query.length === 0)) {
    return Either.left(cliError("search requires --query"))
  }
  if (args.command === "extract" && (args.path === undefined || args.path.trim().length === 0)) {
    return Either.left(cliError("extract requires --path"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to normalize when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return Either.flatMap(
    parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
    requireCommandInputs
  )
}
