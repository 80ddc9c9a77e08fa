import { Logger, LogLevel } from "effect"

// CHANGE: route Effect logs to stderr
// WHY: stdout carries only JSON payloads so output stays pipeable
// QUOTE(TZ): n/a
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m: log(m) writes "<level>: <m>" to stderr
// PURITY: SHELL
// EFFECT: stderr
// INVARIANT: one line per log call
// COMPLEXITY: O(n)

const renderMessage = (message: unknown): string => {
  const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message]
  return parts.map((part) => typeof part === "string" ? part : String(part)).join(" ")
}

export const stderrLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`${logLevel.label.toLowerCase()}: ${renderMessage(message)}\n`)
})

export const StderrLoggerLive = Logger.replace(Logger.defaultLogger, stderrLogger)

export const logLevelFor = (options: { readonly silent: boolean; readonly verbose: boolean }): LogLevel.LogLevel => {
  if (options.silent) {
    return LogLevel.None
  }
  return options.verbose ? LogLevel.Debug : LogLevel.Info
}
