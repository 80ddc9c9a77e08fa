import type { Json } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"

// CHANGE: count nodes per JSON category
// WHY: structural statistics for the stats view
// QUOTE(TZ): "Total nodes traversed"
// REF: req-stats-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: stats(v).totalNodes = Σ per-category counts
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every visited node lands in exactly one category
// COMPLEXITY: O(n)

export interface NodeStats {
  readonly objects: number
  readonly arrays: number
  readonly strings: number
  readonly numbers: number
  readonly booleans: number
  readonly nulls: number
  readonly totalNodes: number
}

type Category = Exclude<keyof NodeStats, "totalNodes">

const categoryOf = (value: Json): Category => {
  if (isJsonObject(value)) {
    return "objects"
  }
  if (isJsonArray(value)) {
    return "arrays"
  }
  if (typeof value === "string") {
    return "strings"
  }
  if (typeof value === "boolean") {
    return "booleans"
  }
  if (typeof value === "number") {
    return "numbers"
  }
  return "nulls"
}

/**
 * Count every node of a JSON value, containers included.
 *
 * @pure true
 * @invariant traversal uses an explicit stack
 * @complexity O(n)
 */
export const countNodes = (value: Json): NodeStats => {
  const counts: Record<keyof NodeStats, number> = {
    objects: 0,
    arrays: 0,
    strings: 0,
    numbers: 0,
    booleans: 0,
    nulls: 0,
    totalNodes: 0
  }
  const pending: Array<Json> = [value]
  let current = pending.pop()
  while (current !== undefined) {
    counts.totalNodes += 1
    counts[categoryOf(current)] += 1
    const children = isJsonObject(current) ? Object.values(current) : isJsonArray(current) ? current : []
    for (const child of children) {
      pending.push(child)
    }
    current = pending.pop()
  }
  return counts
}
