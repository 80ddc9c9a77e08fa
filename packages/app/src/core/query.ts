import type { Json } from "./json.js"
import { isJsonArray, isJsonContainer, isJsonObject } from "./json.js"

// CHANGE: classify values and search keys/values recursively without recursion
// WHY: inspection must survive adversarially deep input without exhausting the call stack
// QUOTE(TZ): "Search keys/values (case-insensitive)"
// REF: req-query-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v,q: search(v,q) lists each matching path once, in pre-order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: booleans are classified before any numeric check
// COMPLEXITY: O(n) where n = number of nodes

/**
 * Human-readable classification of a value, e.g. `object • 2 key(s)`.
 *
 * @pure true
 */
export const typeLabel = (value: Json): string => {
  if (isJsonObject(value)) {
    return `object • ${Object.keys(value).length} key(s)`
  }
  if (isJsonArray(value)) {
    return `array • ${value.length} item(s)`
  }
  if (typeof value === "string") {
    return "string"
  }
  if (typeof value === "boolean") {
    return "boolean"
  }
  if (typeof value === "number") {
    return "number"
  }
  return "null"
}

export const scalarText = (value: Json): string => typeof value === "string" ? value : String(value)

export const keyPath = (parent: string, key: string): string => parent.length === 0 ? key : `${parent}.${key}`

export const indexPath = (parent: string, index: number): string => `${parent}[${index}]`

type SearchTask =
  | { readonly _tag: "Node"; readonly value: Json; readonly path: string }
  | { readonly _tag: "Member"; readonly key: string; readonly value: Json; readonly path: string }
  | { readonly _tag: "Item"; readonly value: Json; readonly path: string }

const childTasks = (value: Json, path: string): ReadonlyArray<SearchTask> => {
  if (isJsonObject(value)) {
    return Object.entries(value).map(([key, child]) => ({
      _tag: "Member",
      key,
      value: child,
      path: keyPath(path, key)
    }))
  }
  if (isJsonArray(value)) {
    return value.map((child, index) => ({ _tag: "Item", value: child, path: indexPath(path, index) }))
  }
  return []
}

/**
 * Find every path whose key or scalar value contains the query, ignoring case.
 *
 * @param value - Root JSON value.
 * @param query - Substring to look for.
 * @returns De-duplicated paths in first-occurrence (pre-order) order.
 *
 * @pure true
 * @invariant a scalar root yields no hits; array indices are not matched as keys
 * @complexity O(n)
 */
export const search = (value: Json, query: string): ReadonlyArray<string> => {
  const needle = query.toLowerCase()
  const matches = (text: string): boolean => text.toLowerCase().includes(needle)
  const hits = new Set<string>()
  const stack: Array<SearchTask> = [{ _tag: "Node", value, path: "" }]
  const visit = (child: Json, path: string): void => {
    if (isJsonContainer(child)) {
      stack.push({ _tag: "Node", value: child, path })
    } else if (matches(scalarText(child))) {
      hits.add(path)
    }
  }
  while (stack.length > 0) {
    const task = stack.pop()
    if (task === undefined) {
      break
    }
    if (task._tag === "Node") {
      const children = childTasks(task.value, task.path)
      for (let index = children.length - 1; index >= 0; index--) {
        const child = children[index]
        if (child !== undefined) {
          stack.push(child)
        }
      }
      continue
    }
    if (task._tag === "Member" && matches(task.key)) {
      hits.add(task.path)
    }
    visit(task.value, task.path)
  }
  return [...hits]
}
