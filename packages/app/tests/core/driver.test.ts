import * as Schema from "@effect/schema/Schema"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { make } from "../../src/core/decoding.js"
import { decodeTopLevel, parseDocument } from "../../src/core/driver.js"
import { keyed, unkeyed } from "../../src/core/primitives.js"
import { userDecoding, userId } from "../fixtures/user.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("decodeTopLevel", () => {
  it.effect("decodes a user with an absent optional field and a defaulted one", () =>
    Effect.sync(() => {
      const input = JSON.stringify({ id: userId, name: "Tim Cook", age: 60 })
      const user = expectRight(decodeTopLevel(input, userDecoding))
      expect(user).toEqual({
        id: userId,
        name: "Tim Cook",
        ageInYears: 60,
        city: Option.none(),
        isAdmin: true
      })
    }))

  it.effect("decodes every field when present", () =>
    Effect.sync(() => {
      const input = JSON.stringify({ id: userId, name: "Grace", age: 85, city: "Arlington", is_admin: false })
      const user = expectRight(decodeTopLevel(input, userDecoding))
      expect(user.city).toEqual(Option.some("Arlington"))
      expect(user.isAdmin).toBe(false)
    }))

  it.effect("fails with KeyNotFound referencing the missing required id", () =>
    Effect.sync(() => {
      const error = expectLeft(decodeTopLevel(`{"name": "X", "age": 30}`, userDecoding))
      expect(error).toEqual({
        _tag: "KeyNotFound",
        path: [],
        key: "id",
        message: "No value associated with key \"id\""
      })
    }))

  it.effect("rejects an id that is not a UUID", () =>
    Effect.sync(() => {
      const error = expectLeft(decodeTopLevel(`{"id": "not-a-uuid", "name": "X", "age": 30}`, userDecoding))
      expect(error._tag).toBe("TypeMismatch")
    }))

  it.effect("fails with ParseError before any decoding runs", () =>
    Effect.sync(() => {
      let runs = 0
      const counting = make(() => {
        runs += 1
        return Either.right(runs)
      })
      const error = expectLeft(decodeTopLevel("{\"name\": ", counting))
      expect(error._tag).toBe("ParseError")
      expect(runs).toBe(0)
    }))

  it.effect("accepts UTF-8 bytes as input", () =>
    Effect.sync(() => {
      const bytes = new TextEncoder().encode(`{"name": "Zoë"}`)
      expect(expectRight(decodeTopLevel(bytes, keyed("name", Schema.String)))).toBe("Zoë")
      const invalid = expectLeft(decodeTopLevel(new Uint8Array([0xff, 0xfe]), keyed("name", Schema.String)))
      expect(invalid._tag).toBe("ParseError")
    }))

  it.effect("applies the key decoding strategy from the config", () =>
    Effect.sync(() => {
      const isAdmin = keyed("isAdmin", Schema.Boolean)
      const input = `{"is_admin": true}`
      expect(expectRight(decodeTopLevel(input, isAdmin, { keyDecodingStrategy: "convertFromSnakeCase" }))).toBe(true)
      expect(expectLeft(decodeTopLevel(input, isAdmin))._tag).toBe("KeyNotFound")
    }))
})

describe("parseDocument", () => {
  it.effect("parses nested structured values", () =>
    Effect.sync(() => {
      expect(expectRight(parseDocument(`{"a": [1, true, null, "x"], "b": {}}`))).toEqual({
        a: [1, true, null, "x"],
        b: {}
      })
      expect(expectRight(parseDocument("42"))).toBe(42)
    }))
  it.effect("accepts deeply nested arrays", () =>
    Effect.sync(() => {
      const depth = 2000
      const input = "[".repeat(depth) + "]".repeat(depth)
      expect(Either.isRight(parseDocument(input))).toBe(true)
      const inner = expectRight(decodeTopLevel(input, unkeyed(Schema.Unknown)))
      expect(Array.isArray(inner)).toBe(true)
    }))

  it.effect("keeps own __proto__ keys", () =>
    Effect.sync(() => {
      const document = expectRight(parseDocument(`{"__proto__": {"a": 1}, "b": 2}`))
      expect(typeof document === "object" && document !== null ? Object.keys(document) : []).toEqual([
        "__proto__",
        "b"
      ])
      expect(expectRight(decodeTopLevel(`{"__proto__": "x"}`, keyed("__proto__", Schema.String)))).toBe("x")
    }))
})
