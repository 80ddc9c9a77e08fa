import * as Either from "effect/Either"

import type { PathError } from "./errors.js"
import { indexOutOfRange, keyNotFound } from "./errors.js"
import type { Json } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"

// CHANGE: parse dotted/bracketed paths and navigate JSON values with them
// WHY: path extraction targets one explicit location and must fail loudly
// QUOTE(TZ): "Path (e.g., metadata.score or items[0].id)"
// REF: req-path-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,p: extract(v, p) = Right(x) → x is reachable from v by tokens(p)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: an empty path addresses the root value
// COMPLEXITY: O(|p|)

export type PathToken =
  | { readonly _tag: "Key"; readonly key: string }
  | { readonly _tag: "Index"; readonly index: number }

const TOKEN = /[^[\]]+|\[\d+\]/gu
const INDEX_TOKEN = /^\[(\d+)\]$/u

const toToken = (raw: string): PathToken => {
  const match = INDEX_TOKEN.exec(raw)
  const digits = match?.[1]
  return digits === undefined
    ? { _tag: "Key", key: raw }
    : { _tag: "Index", index: Number.parseInt(digits, 10) }
}

/**
 * Split a path such as `items[0].id` into key and index tokens.
 *
 * @pure true
 * @invariant bracketed digits become Index tokens, everything else between separators is a Key
 * @complexity O(n)
 */
export const parsePath = (path: string): ReadonlyArray<PathToken> => {
  if (path.length === 0) {
    return []
  }
  const tokens: Array<PathToken> = []
  for (const part of path.split(".")) {
    for (const raw of part.match(TOKEN) ?? []) {
      tokens.push(toToken(raw))
    }
  }
  return tokens
}

const hasOwn = (value: object, key: string): boolean => Object.prototype.hasOwnProperty.call(value, key)

const step = (current: Json, token: PathToken): Either.Either<Json, PathError> => {
  if (token._tag === "Index") {
    const item = isJsonArray(current) ? current[token.index] : undefined
    return item === undefined ? Either.left(indexOutOfRange(token.index)) : Either.right(item)
  }
  if (!isJsonObject(current) || !hasOwn(current, token.key)) {
    return Either.left(keyNotFound(token.key))
  }
  const child = current[token.key]
  return child === undefined ? Either.left(keyNotFound(token.key)) : Either.right(child)
}

/**
 * Extract the value addressed by a path.
 *
 * @param value - Root JSON value.
 * @param path - Dotted/bracketed path, e.g. `items[0].id`.
 * @returns Either with the terminal value or a PathError naming the failing token.
 *
 * @pure true
 * @invariant extractByPath(v, "") = Right(v)
 * @complexity O(|tokens|)
 */
export const extractByPath = (value: Json, path: string): Either.Either<Json, PathError> => {
  let current = value
  for (const token of parsePath(path)) {
    const next = step(current, token)
    if (Either.isLeft(next)) {
      return next
    }
    current = next.right
  }
  return Either.right(current)
}
