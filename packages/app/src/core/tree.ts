import type { Json } from "./json.js"
import { isJsonArray, isJsonContainer, isJsonObject } from "./json.js"
import { typeLabel } from "./query.js"

// CHANGE: render a JSON value as an indented text tree keyed by type labels
// WHY: the terminal counterpart of the expandable tree view
// QUOTE(TZ): "Tree View"
// REF: req-tree-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: lines(v) lists members in document order, one line per node up to maxDepth
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: containers deeper than maxDepth collapse into a single ellipsis line
// COMPLEXITY: O(n)

export interface TreeOptions {
  readonly maxDepth: number
}

interface TreeFrame {
  readonly label: string
  readonly value: Json
  readonly depth: number
}

const INDENT = "  "
export const ELLIPSIS = "…"

const renderScalar = (value: Json): string => JSON.stringify(value)

const renderLine = (frame: TreeFrame): string => {
  const prefix = INDENT.repeat(frame.depth)
  const heading = `${prefix}${frame.label}  (${typeLabel(frame.value)})`
  return isJsonContainer(frame.value) ? heading : `${heading}: ${renderScalar(frame.value)}`
}

const childFrames = (value: Json, depth: number): ReadonlyArray<TreeFrame> => {
  if (isJsonObject(value)) {
    return Object.entries(value).map(([key, child]) => ({ label: JSON.stringify(key), value: child, depth }))
  }
  if (isJsonArray(value)) {
    return value.map((child, index) => ({ label: `[${index}]`, value: child, depth }))
  }
  return []
}

const pushReversed = (stack: Array<TreeFrame>, frames: ReadonlyArray<TreeFrame>): void => {
  for (let index = frames.length - 1; index >= 0; index--) {
    const frame = frames[index]
    if (frame !== undefined) {
      stack.push(frame)
    }
  }
}

/**
 * Render a value as text lines.
 *
 * @param value - Root JSON value; a scalar root renders as one line.
 * @param options - Depth limit for nested containers.
 * @returns Lines in document order.
 *
 * @pure true
 * @invariant traversal uses an explicit stack
 * @complexity O(n)
 */
export const renderTree = (value: Json, options: TreeOptions): ReadonlyArray<string> => {
  if (!isJsonContainer(value)) {
    return [`${renderScalar(value)}  (${typeLabel(value)})`]
  }
  const lines: Array<string> = []
  const stack: Array<TreeFrame> = []
  pushReversed(stack, childFrames(value, 0))
  let frame = stack.pop()
  while (frame !== undefined) {
    lines.push(renderLine(frame))
    const children = childFrames(frame.value, frame.depth + 1)
    if (children.length > 0 && frame.depth + 1 >= options.maxDepth) {
      lines.push(`${INDENT.repeat(frame.depth + 1)}${ELLIPSIS}`)
    } else {
      pushReversed(stack, children)
    }
    frame = stack.pop()
  }
  return lines
}
