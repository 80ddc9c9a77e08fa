import * as Either from "effect/Either"

import type { SerializeError } from "./errors.js"
import { serializeError } from "./errors.js"
import type { Json } from "./json.js"

// CHANGE: re-serialize recovered values for display and file output
// WHY: the raw view and the download share one pretty/compact switch
// QUOTE(TZ): "Pretty print"
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parseStrict(serialize(v)) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: non-ASCII characters are written as-is
// COMPLEXITY: O(n)

export interface SerializeOptions {
  readonly pretty: boolean
  readonly indent: number
}

export const defaultSerializeOptions: SerializeOptions = { pretty: true, indent: 2 }

export const serializeJson = (
  value: Json,
  options: SerializeOptions = defaultSerializeOptions
): Either.Either<string, SerializeError> =>
  Either.try({
    try: () => options.pretty ? JSON.stringify(value, null, options.indent) : JSON.stringify(value),
    catch: (error) => serializeError(error instanceof Error ? error.message : String(error))
  })
