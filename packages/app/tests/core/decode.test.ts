import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import {
  collapseDoubledQuotes,
  decodeSegment,
  decodeStringLiteral,
  parseLayered,
  stripIndexPrefix,
  stripOuterQuotes,
  unescapeBackslashes
} from "../../src/core/decode.js"

describe("decode steps", () => {
  it.effect("strips log-style index prefixes", () =>
    Effect.sync(() => {
      expect(stripIndexPrefix(`0: {"a":1}`)).toBe(`{"a":1}`)
      expect(stripIndexPrefix(`  12 :"x"`)).toBe(`"x"`)
      expect(stripIndexPrefix(`{"0: ":1}`)).toBe(`{"0: ":1}`)
    }))

  it.effect("removes exactly one layer of matching quotes", () =>
    Effect.sync(() => {
      expect(stripOuterQuotes(`""abc""`)).toBe(`"abc"`)
      expect(stripOuterQuotes(`'abc'`)).toBe("abc")
      expect(stripOuterQuotes(`"abc'`)).toBe(`"abc'`)
      expect(stripOuterQuotes(`"`)).toBe(`"`)
    }))

  it.effect("collapses a doubled-quote wrapper", () =>
    Effect.sync(() => {
      expect(collapseDoubledQuotes(`""{"a":1}""`)).toBe(`"{"a":1}"`)
      expect(collapseDoubledQuotes(`"{"a":1}"`)).toBe(`"{"a":1}"`)
    }))

  it.effect("interprets literal backslash escapes", () =>
    Effect.sync(() => {
      expect(unescapeBackslashes(String.raw`{\"a\":\"b\"}`)).toBe(`{"a":"b"}`)
      expect(unescapeBackslashes(String.raw`line\nnext\tend`)).toBe("line\nnext\tend")
      expect(unescapeBackslashes(String.raw`é\x41`)).toBe("éA")
      expect(unescapeBackslashes(String.raw`keep \q`)).toBe(String.raw`keep \q`)
    }))
})

describe("parseLayered", () => {
  it.effect("decodes a JSON string holding JSON text", () =>
    Effect.sync(() => {
      expect(parseLayered(String.raw`"{\"k\":1}"`)).toEqual(Either.right({ k: 1 }))
    }))

  it.effect("keeps a string whose content is not JSON", () =>
    Effect.sync(() => {
      expect(parseLayered(`"plain words"`)).toEqual(Either.right("plain words"))
    }))
})

describe("decodeStringLiteral", () => {
  it.effect("keeps scalar-looking strings as strings", () =>
    Effect.sync(() => {
      expect(decodeStringLiteral(`"12"`)).toEqual(Option.some("12"))
      expect(decodeStringLiteral(` "true" `)).toEqual(Option.some("true"))
      expect(decodeStringLiteral(`"hello"`)).toEqual(Option.some("hello"))
    }))

  it.effect("decodes a string holding an object or array", () =>
    Effect.sync(() => {
      expect(decodeStringLiteral(String.raw`"[1,{"a":2}]"`)).toEqual(Option.some([1, { a: 2 }]))
    }))

  it.effect("ignores text that is not a single string literal", () =>
    Effect.sync(() => {
      expect(decodeStringLiteral(`""{"a":1}""`)).toEqual(Option.none())
      expect(decodeStringLiteral(`12`)).toEqual(Option.none())
      expect(decodeStringLiteral(`"`)).toEqual(Option.none())
    }))
})

describe("decodeSegment", () => {
  it.effect("recovers an escaped object by unescaping", () =>
    Effect.sync(() => {
      const decoded = decodeSegment(String.raw`"{\"key\":\"AIRCRAFT\",\"value\":false}"`)
      expect(decoded).toEqual(Either.right({ key: "AIRCRAFT", value: false }))
    }))

  it.effect("recovers an index-prefixed doubled-quote blob", () =>
    Effect.sync(() => {
      const decoded = decodeSegment(String.raw`0: ""{\"key\":\"AIRCRAFT\"}""`)
      expect(decoded).toEqual(Either.right({ key: "AIRCRAFT" }))
    }))

  it.effect("recovers single-quoted JSON", () =>
    Effect.sync(() => {
      expect(decodeSegment(`'{"a":[1,2]}'`)).toEqual(Either.right({ a: [1, 2] }))
    }))

  it.effect("decodes scalars after removing the index", () =>
    Effect.sync(() => {
      expect(decodeSegment("3: true")).toEqual(Either.right(true))
      expect(decodeSegment("null")).toEqual(Either.right(null))
    }))

  it.effect("reports every attempt when nothing parses", () =>
    Effect.sync(() => {
      const decoded = decodeSegment("not json at all")
      expect(Either.isLeft(decoded)).toBe(true)
      if (Either.isLeft(decoded)) {
        expect(decoded.left.attempts).toHaveLength(3)
        expect(decoded.left.message.startsWith("Failed to decode escaped JSON. Attempts: ")).toBe(true)
        expect(decoded.left.message.split(" | ")).toHaveLength(3)
      }
    }))

  it.effect("runs custom steps in order", () =>
    Effect.sync(() => {
      const seen: Array<string> = []
      const record = (name: string, transform: (text: string) => string) => (text: string): string => {
        seen.push(`${name}:${text}`)
        return transform(text)
      }
      const steps = [
        { name: "first", apply: record("first", (text) => text) },
        { name: "second", apply: record("second", (text) => text.replace("~", "")) }
      ]
      expect(decodeSegment("~1", steps)).toEqual(Either.right(1))
      expect(seen).toEqual(["first:~1", "second:~1"])
    }))
})
