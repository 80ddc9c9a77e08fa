import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Json } from "../../src/core/json.js"
import { ELLIPSIS, renderTree } from "../../src/core/tree.js"

describe("renderTree", () => {
  it.effect("renders members in document order with type labels", () =>
    Effect.sync(() => {
      const value: Json = { name: "mend", tags: ["a", 1], meta: { ok: true, none: null } }
      expect(renderTree(value, { maxDepth: 8 })).toEqual([
        `"name"  (string): "mend"`,
        `"tags"  (array • 2 item(s))`,
        `  [0]  (string): "a"`,
        `  [1]  (number): 1`,
        `"meta"  (object • 2 key(s))`,
        `  "ok"  (boolean): true`,
        `  "none"  (null): null`
      ])
    }))

  it.effect("collapses containers below the depth limit", () =>
    Effect.sync(() => {
      const value: Json = { a: { b: { c: 1 } }, d: [] }
      expect(renderTree(value, { maxDepth: 2 })).toEqual([
        `"a"  (object • 1 key(s))`,
        `  "b"  (object • 1 key(s))`,
        `    ${ELLIPSIS}`,
        `"d"  (array • 0 item(s))`
      ])
    }))

  it.effect("renders a scalar root on one line", () =>
    Effect.sync(() => {
      expect(renderTree(2.5, { maxDepth: 4 })).toEqual(["2.5  (number)"])
    }))
})
