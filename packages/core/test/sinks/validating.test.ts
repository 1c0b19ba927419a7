/**
 * Tests for the validating sink.
 *
 * @module
 */
import { activateVersionMessage, type BatchMessage, recordMessage } from "@batch-target/core/messages"
import { ValidatingSink } from "@batch-target/core/sinks"
import { describe, expect, it } from "@effect/vitest"
import type * as Arr from "effect/Array"
import * as Effect from "effect/Effect"

const schema = {
  type: "object",
  properties: {
    id: { type: "integer" },
    price: { type: ["null", "number"], multipleOf: 0.01 },
    created_at: { type: "string", format: "date-time" }
  }
}

const validate = (
  messages: Arr.NonEmptyReadonlyArray<BatchMessage>,
  keyNames: ReadonlyArray<string> = ["id"],
  batchSchema: Record<string, unknown> = schema
) =>
  Effect.flatMap(ValidatingSink.make, (sink) =>
    sink.handleBatch({
      stream: "products",
      messages,
      schema: batchSchema,
      keyNames
    }))

describe("ValidatingSink", () => {
  it.effect("accepts records matching the schema", () =>
    Effect.gen(function*() {
      yield* validate([
        recordMessage("products", { id: 1, price: 1.1, created_at: "2024-01-02T03:04:05Z" }),
        recordMessage("products", { id: 2, price: 19.99 }),
        recordMessage("products", { id: 3, price: null })
      ])
    }))

  it.effect("compares multipleOf on exact decimals", () =>
    Effect.gen(function*() {
      yield* validate([recordMessage("products", { id: 1, price: 0.3 })], ["id"], {
        type: "object",
        properties: { price: { type: "number", multipleOf: 0.1 } }
      })

      const error = yield* Effect.flip(validate([recordMessage("products", { id: 1, price: 1.005 })]))
      expect(error._tag).toBe("SchemaValidationError")
      expect(error.message).toBe(
        "Record 0 does not match schema: data/price must pass \"multipleOf\" keyword validation"
      )
    }))

  it.effect("rejects a record of the wrong type", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(validate([
        recordMessage("products", { id: 1 }),
        recordMessage("products", { id: "two" })
      ]))

      expect(error).toMatchObject({
        _tag: "SchemaValidationError",
        stream: "products",
        index: 1,
        message: "Record 1 does not match schema: data/id must be integer"
      })
    }))

  it.effect("checks string formats", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(validate([
        recordMessage("products", { id: 1, created_at: "yesterday" })
      ]))

      expect(error.message).toBe(
        "Record 0 does not match schema: data/created_at must match format \"date-time\""
      )
    }))

  it.effect("uses draft-04 exclusive bounds", () =>
    Effect.gen(function*() {
      const bounded = {
        type: "object",
        properties: { quantity: { type: "integer", maximum: 10, exclusiveMaximum: true } }
      }

      yield* validate([recordMessage("products", { id: 1, quantity: 9 })], ["id"], bounded)
      const error = yield* Effect.flip(
        validate([recordMessage("products", { id: 1, quantity: 10 })], ["id"], bounded)
      )
      expect(error._tag).toBe("SchemaValidationError")
    }))

  it.effect("tolerates unknown keywords", () =>
    Effect.gen(function*() {
      yield* validate([recordMessage("products", { id: 1 })], ["id"], {
        type: "object",
        inclusion: "available",
        properties: { id: { type: "integer", inclusion: "automatic" } }
      })
    }))

  it.effect("rejects a record missing a key property", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(validate([
        activateVersionMessage("products", 1),
        recordMessage("products", { price: 1 })
      ]))

      expect(error).toMatchObject({
        _tag: "MissingKeyPropertyError",
        index: 1,
        property: "id",
        message: "Message 1 is missing key property id"
      })
    }))

  it.effect("skips version switches", () =>
    Effect.gen(function*() {
      yield* validate([activateVersionMessage("products", 2)])
    }))
})
