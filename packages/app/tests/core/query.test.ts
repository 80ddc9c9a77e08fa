import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Json } from "../../src/core/json.js"
import { search, typeLabel } from "../../src/core/query.js"

describe("typeLabel", () => {
  it.effect("labels every JSON category", () =>
    Effect.sync(() => {
      expect(typeLabel({ a: 1, b: 2 })).toBe("object • 2 key(s)")
      expect(typeLabel([1])).toBe("array • 1 item(s)")
      expect(typeLabel("x")).toBe("string")
      expect(typeLabel(true)).toBe("boolean")
      expect(typeLabel(0)).toBe("number")
      expect(typeLabel(null)).toBe("null")
    }))
})

describe("search", () => {
  it.effect("finds scalar values by substring", () =>
    Effect.sync(() => {
      expect(search({ a: { b: "foo" } }, "foo")).toEqual(["a.b"])
    }))

  it.effect("uses bracket notation for array items", () =>
    Effect.sync(() => {
      expect(search([{ x: 1 }, { x: 2 }], "2")).toEqual(["[1].x"])
    }))

  it.effect("matches keys case-insensitively and de-duplicates", () =>
    Effect.sync(() => {
      const value: Json = { Name: "name", items: [{ name: "Other" }], nested: { NAMES: [] } }
      expect(search(value, "NAME")).toEqual(["Name", "items[0].name", "nested.NAMES"])
    }))

  it.effect("keeps pre-order across siblings", () =>
    Effect.sync(() => {
      const value: Json = { a: { hit: 1, deeper: { hit: 2 } }, b: "hit", c: ["hit", ["hit"]] }
      expect(search(value, "hit")).toEqual(["a.hit", "a.deeper.hit", "b", "c[0]", "c[1][0]"])
    }))

  it.effect("matches booleans and nulls by their text", () =>
    Effect.sync(() => {
      expect(search({ flag: true, empty: null, n: 12.5 }, "TRUE")).toEqual(["flag"])
      expect(search({ flag: true, empty: null, n: 12.5 }, "null")).toEqual(["empty"])
      expect(search({ flag: true, empty: null, n: 12.5 }, "2.5")).toEqual(["n"])
    }))

  it.effect("returns nothing for a scalar root", () =>
    Effect.sync(() => {
      expect(search("foo", "foo")).toEqual([])
    }))

  it.effect("walks very deep values without overflowing", () =>
    Effect.sync(() => {
      let value: Json = "needle"
      for (let depth = 0; depth < 20000; depth++) {
        value = [value]
      }
      const hits = search(value, "needle")
      expect(hits).toEqual(["[0]".repeat(20000)])
    }))
})
