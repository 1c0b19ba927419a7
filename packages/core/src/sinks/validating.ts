/**
 * Validating sink - checks a batch against its stream schema without
 * delivering anything.
 *
 * Records are validated with a JSON Schema draft-04 validator with format
 * checks enabled. `multipleOf` is evaluated on exact decimals so values such
 * as `1.1` are accepted for `multipleOf: 0.01`. Every declared key property
 * must be present in each record.
 *
 * @module
 */
import Ajv from "ajv-draft-04"
import addFormats from "ajv-formats"
import * as Effect from "effect/Effect"
import { isMultipleOf } from "../decimal.ts"
import { MissingKeyPropertyError, SchemaValidationError } from "../errors.ts"
import type { BatchSink } from "./sink.ts"

/**
 * Creates a draft-04 validator. Unknown keywords are tolerated.
 */
export const makeValidator = (): Ajv => {
  const ajv = new Ajv({
    strict: false,
    validateSchema: false,
    addUsedSchema: false
  })
  addFormats(ajv)
  ajv.removeKeyword("multipleOf")
  ajv.addKeyword({
    keyword: "multipleOf",
    type: "number",
    schemaType: "number",
    validate: (divisor: number, value: number) => isMultipleOf(value, divisor)
  })
  return ajv
}

export const make: Effect.Effect<BatchSink> = Effect.sync(() => {
  const ajv = makeValidator()

  const handleBatch: BatchSink["handleBatch"] = Effect.fn("ValidatingSink.handleBatch")(
    function*(batch) {
      const validate = yield* Effect.try({
        try: () => ajv.compile(batch.schema),
        catch: (cause) =>
          new SchemaValidationError({
            message: `Invalid schema for stream ${batch.stream}: ${String(cause)}`,
            stream: batch.stream
          })
      })

      for (const [index, message] of batch.messages.entries()) {
        if (message._tag !== "RECORD") continue

        if (!validate(message.record)) {
          return yield* new SchemaValidationError({
            message: `Record ${index} does not match schema: ${ajv.errorsText(validate.errors)}`,
            stream: batch.stream,
            index
          })
        }

        for (const property of batch.keyNames) {
          if (!Object.hasOwn(message.record, property)) {
            return yield* new MissingKeyPropertyError({
              message: `Message ${index} is missing key property ${property}`,
              stream: batch.stream,
              index,
              property
            })
          }
        }
      }

      yield* Effect.logInfo("Batch is valid")
    }
  )

  return { name: "validating", handleBatch } satisfies BatchSink
})
