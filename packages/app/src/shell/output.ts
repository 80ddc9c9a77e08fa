import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: write serialized JSON to a file and payloads to stdout
// WHY: the download action and terminal output are the only writes the tool performs
// QUOTE(TZ): "Download JSON"
// REF: req-output-1
// SOURCE: n/a
// FORMAT THEOREM: write(p, s); read(p) = s + "\n"
// PURITY: SHELL
// EFFECT: Effect<void, AppError, FileSystem>
// INVARIANT: written files end with a single newline
// COMPLEXITY: O(n)

const withTrailingNewline = (payload: string): string => payload.endsWith("\n") ? payload : `${payload}\n`

export const writeOutputFile = (
  path: string,
  payload: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, withTrailingNewline(payload)).pipe(
        Effect.mapError((error) => fileError(String(error)))
      )
    )
  })

export const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(withTrailingNewline(payload))
  })

export const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(withTrailingNewline(payload))
  })
