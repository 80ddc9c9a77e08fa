import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { decodeInput } from "../../src/core/input.js"

const encode = (text: string): Uint8Array => new TextEncoder().encode(text)

describe("decodeInput", () => {
  it.effect("drops a UTF-8 byte-order mark", () =>
    Effect.sync(() => {
      const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...encode(`{"a":"ü"}`)])
      expect(decodeInput(bytes)).toBe(`{"a":"ü"}`)
    }))

  it.effect("replaces invalid sequences instead of failing", () =>
    Effect.sync(() => {
      const bytes = new Uint8Array([...encode(`"a`), 0xff, ...encode(`b"`)])
      expect(decodeInput(bytes)).toBe(`"a\uFFFDb"`)
    }))
})
