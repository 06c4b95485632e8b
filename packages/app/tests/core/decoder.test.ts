import * as Schema from "@effect/schema/Schema"
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { indexSegment, keySegment } from "../../src/core/coding-path.js"
import { resolveDecoderConfig } from "../../src/core/config.js"
import { makeDecoder } from "../../src/core/decoder.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("makeDecoder keyed access", () => {
  it.effect("reads present keys and reports missing ones with the container path", () =>
    Effect.sync(() => {
      const view = expectRight(makeDecoder({ name: "Ada", age: 36 }).keyed())
      expect(view.keys).toEqual(["name", "age"])
      expect(expectRight(view.get("name", Schema.String))).toBe("Ada")
      const missing = expectLeft(view.get("email", Schema.String))
      expect(missing).toEqual({
        _tag: "KeyNotFound",
        path: [],
        key: "email",
        message: "No value associated with key \"email\""
      })
    }))

  it.effect("reports type mismatches at the value path", () =>
    Effect.sync(() => {
      const view = expectRight(makeDecoder({ age: "thirty" }).keyed())
      const error = expectLeft(view.get("age", Schema.Int))
      expect(error._tag).toBe("TypeMismatch")
      if (error._tag === "TypeMismatch") {
        expect(error.path).toEqual([keySegment("age")])
      }
    }))

  it.effect("treats absent and null keys as None for optional reads", () =>
    Effect.sync(() => {
      const view = expectRight(makeDecoder({ city: null }).keyed())
      expect(expectRight(view.getOptional("city", Schema.String))).toEqual(Option.none())
      expect(expectRight(view.getOptional("country", Schema.String))).toEqual(Option.none())
      expect(view.contains("city")).toBe(true)
      expect(view.contains("country")).toBe(false)
    }))

  it.effect("keeps null as a value when treatNullAsAbsent is off", () =>
    Effect.sync(() => {
      const config = resolveDecoderConfig({ treatNullAsAbsent: false })
      const view = expectRight(makeDecoder({ city: null }, config).keyed())
      const error = expectLeft(view.getOptional("city", Schema.String))
      expect(error._tag).toBe("TypeMismatch")
    }))

  it.effect("fails when the position is not an object", () =>
    Effect.sync(() => {
      const error = expectLeft(makeDecoder([1, 2]).keyed())
      expect(error).toEqual({
        _tag: "TypeMismatch",
        path: [],
        expected: "object",
        message: "Expected object but found array instead"
      })
    }))

  it.effect("matches snake_case document keys when converting keys", () =>
    Effect.sync(() => {
      const config = resolveDecoderConfig({ keyDecodingStrategy: "convertFromSnakeCase" })
      const view = expectRight(makeDecoder({ is_admin: false, first_name: "A", firstName: "B" }, config).keyed())
      expect(view.keys).toEqual(["isAdmin", "firstName"])
      expect(expectRight(view.get("isAdmin", Schema.Boolean))).toBe(false)
      expect(expectRight(view.get("firstName", Schema.String))).toBe("A")
      expect(Either.isLeft(view.get("is_admin", Schema.Boolean))).toBe(true)
    }))

  it.effect("creates child decoders positioned under the key", () =>
    Effect.sync(() => {
      const view = expectRight(makeDecoder({ address: { city: "Oslo" } }).keyed())
      const child = expectRight(view.nested("address"))
      expect(child.path).toEqual([keySegment("address")])
      const childView = expectRight(child.keyed())
      expect(expectRight(childView.get("city", Schema.String))).toBe("Oslo")
      expect(expectRight(view.nestedOptional("missing"))).toEqual(Option.none())
    }))
})

describe("makeDecoder sequential access", () => {
  it.effect("advances once per successful read and never on failure", () =>
    Effect.sync(() => {
      const view = expectRight(makeDecoder(["a", 2]).sequential())
      expect(view.count).toBe(2)
      const mismatch = expectLeft(view.next(Schema.Int))
      expect(mismatch._tag).toBe("TypeMismatch")
      if (mismatch._tag === "TypeMismatch") {
        expect(mismatch.path).toEqual([indexSegment(0)])
      }
      expect(view.currentIndex()).toBe(0)
      expect(expectRight(view.next(Schema.String))).toBe("a")
      expect(expectRight(view.next(Schema.Int))).toBe(2)
      expect(view.isAtEnd()).toBe(true)
      expect(expectLeft(view.next(Schema.Int))).toEqual({
        _tag: "EndOfSequence",
        path: [],
        index: 2,
        message: "Unkeyed container is at end (index 2)"
      })
    }))

  it.effect("shares one cursor between views of the same decoder", () =>
    Effect.sync(() => {
      const decoder = makeDecoder([10, 20, 30])
      const first = expectRight(decoder.sequential())
      const second = expectRight(decoder.sequential())
      expect(expectRight(first.next(Schema.Int))).toBe(10)
      expect(expectRight(second.next(Schema.Int))).toBe(20)
      expect(first.currentIndex()).toBe(2)
    }))

  it.effect("fails when the position is not an array", () =>
    Effect.sync(() => {
      const error = expectLeft(makeDecoder("text").sequential())
      expect(error._tag).toBe("TypeMismatch")
      if (error._tag === "TypeMismatch") {
        expect(error.expected).toBe("array")
        expect(error.message).toBe("Expected array but found string instead")
      }
    }))
})

describe("makeDecoder scalar access", () => {
  it.effect("reads scalars and rejects containers", () =>
    Effect.sync(() => {
      expect(expectRight(expectRight(makeDecoder(true).scalar()).value(Schema.Boolean))).toBe(true)
      expect(expectRight(makeDecoder(null).scalar()).isNull).toBe(true)
      const error = expectLeft(makeDecoder({ a: 1 }).scalar())
      expect(error).toEqual({
        _tag: "TypeMismatch",
        path: [],
        expected: "scalar",
        message: "Expected scalar but found object instead"
      })
    }))
})
