import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import { STDIN_PATH } from "../core/cli.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { decodeInput } from "../core/input.js"
import { stripByteOrderMark } from "../core/normalize.js"

// CHANGE: read raw input text from an inline value, a file, or stdin
// WHY: pasted text and uploaded files reach the normalizer through one entrypoint
// QUOTE(TZ): "Input source: Upload file | Paste"
// REF: req-input-2
// SOURCE: n/a
// FORMAT THEOREM: ∀src: read(src) = Right(t) → t has no leading byte-order mark
// PURITY: SHELL
// EFFECT: Effect<string, AppError, FileSystem>
// INVARIANT: file bytes are decoded as UTF-8 with replacement characters
// COMPLEXITY: O(n)

export interface InputSource {
  readonly text: string | undefined
  readonly path: string
}

const readStdin: Effect.Effect<Uint8Array, AppError> = Effect.tryPromise({
  try: async () => {
    const { buffer } = await import("node:stream/consumers")
    return buffer(process.stdin)
  },
  catch: (error) => fileError(`Failed to read stdin: ${String(error)}`)
})

const readFileBytes = (path: string): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error)))))
    if (!exists) {
      return yield* _(Effect.fail(fileError(`Input file not found: ${path}`)))
    }
    return yield* _(fs.readFile(path).pipe(Effect.mapError((error) => fileError(String(error)))))
  })

export const readInput = (
  source: InputSource
): Effect.Effect<string, AppError, FileSystemService> => {
  if (source.text !== undefined) {
    return Effect.succeed(stripByteOrderMark(source.text))
  }
  const bytes = source.path === STDIN_PATH ? readStdin : readFileBytes(source.path)
  return Effect.map(bytes, decodeInput)
}
