import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { isJson } from "../../src/core/json.js"
import { looksLikeJson, parseStrict } from "../../src/core/parse.js"

describe("parseStrict", () => {
  it.effect("parses objects with exponent numbers", () =>
    Effect.sync(() => {
      const parsed = parseStrict(`{"score":2.779960632324219E-4,"ok":true,"none":null}`)
      expect(parsed).toEqual(Either.right({ score: 2.779960632324219e-4, ok: true, none: null }))
    }))

  it.effect("accepts top-level scalars", () =>
    Effect.sync(() => {
      expect(parseStrict("42")).toEqual(Either.right(42))
      expect(parseStrict(`"text"`)).toEqual(Either.right("text"))
      expect(parseStrict("null")).toEqual(Either.right(null))
    }))

  it.effect("returns the parser message on failure", () =>
    Effect.sync(() => {
      const parsed = parseStrict("{'a':1}")
      expect(Either.isLeft(parsed)).toBe(true)
      if (Either.isLeft(parsed)) {
        expect(parsed.left._tag).toBe("StrictParseError")
        expect(parsed.left.message.length).toBeGreaterThan(0)
      }
    }))

  it.effect("rejects trailing commas and unquoted keys", () =>
    Effect.sync(() => {
      expect(Either.isLeft(parseStrict(`{"a":1,}`))).toBe(true)
      expect(Either.isLeft(parseStrict(`{a:1}`))).toBe(true)
    }))

  it.effect("handles deeply nested arrays", () =>
    Effect.sync(() => {
      const depth = 5000
      const parsed = parseStrict("[".repeat(depth) + "]".repeat(depth))
      expect(Either.isRight(parsed)).toBe(true)
    }))
})

describe("looksLikeJson", () => {
  it.effect("requires matching outer brackets", () =>
    Effect.sync(() => {
      expect(looksLikeJson(`  {"a":1}  `)).toBe(true)
      expect(looksLikeJson("[1,2]")).toBe(true)
      expect(looksLikeJson(`{"a":1]`)).toBe(false)
      expect(looksLikeJson(`"{}"`)).toBe(false)
    }))
})

describe("isJson", () => {
  it.effect("accepts plain data and rejects other objects", () =>
    Effect.sync(() => {
      expect(isJson({ a: [1, "b", null, { c: false }] })).toBe(true)
      expect(isJson(undefined)).toBe(false)
      expect(isJson({ when: new Date(0) })).toBe(false)
      expect(isJson([() => 1])).toBe(false)
    }))
})
