/**
 * Shared fixtures for the core tests.
 *
 * @module
 */
import { DeliveryRejectedError } from "@batch-target/core/errors"
import type { Batch, BatchSink } from "@batch-target/core/sinks"
import * as Effect from "effect/Effect"
import * as Ref from "effect/Ref"

export const usersSchema = {
  type: "object",
  properties: {
    id: { type: "integer" },
    name: { type: "string" }
  }
}

/**
 * A sink that keeps every batch it receives.
 */
export const makeRecordingSink = (name = "recording") =>
  Effect.gen(function*() {
    const ref = yield* Ref.make<ReadonlyArray<Batch>>([])
    const sink: BatchSink = {
      name,
      handleBatch: (batch) => Ref.update(ref, (batches) => [...batches, batch])
    }
    return { sink, batches: Ref.get(ref) } as const
  })

/**
 * A sink that rejects every batch.
 */
export const rejectingSink: BatchSink = {
  name: "rejecting",
  handleBatch: () =>
    Effect.fail(
      new DeliveryRejectedError({
        message: "Error sending data: rejected",
        status: 400
      })
    )
}

/**
 * Data of the record messages in a batch, in order.
 */
export const recordData = (batch: Batch): ReadonlyArray<unknown> =>
  batch.messages.flatMap((message) => message._tag === "RECORD" ? [message.record] : [])
