/**
 * Local file sink - records the request bodies that would have been sent.
 *
 * Bodies are produced by the same serializer and size limit as the remote
 * sink and written one per line, so the file matches the delivered requests
 * byte for byte.
 *
 * @module
 */
import * as Effect from "effect/Effect"
import type { LineWriter } from "../line-writer.ts"
import { serialize } from "../serializer.ts"
import { Timings } from "../timings.ts"
import type { BatchSink } from "./sink.ts"

export interface LocalFileSinkOptions {
  readonly writer: LineWriter
  readonly maxBatchBytes: number
}

export const make = Effect.fnUntraced(function*(
  options: LocalFileSinkOptions
): Effect.fn.Return<BatchSink, never, Timings> {
  const timings = yield* Timings
  const { maxBatchBytes, writer } = options

  const handleBatch: BatchSink["handleBatch"] = Effect.fn("LocalFileSink.handleBatch")(
    function*(batch) {
      yield* Effect.logInfo(
        `Saving batch with ${batch.messages.length} messages for table ${batch.stream} to ${writer.target}`
      )

      const bodies = yield* serialize(batch.messages, batch.schema, batch.keyNames, maxBatchBytes).pipe(
        timings.mode("serializing")
      )

      for (const [index, body] of bodies.entries()) {
        yield* Effect.logDebug(`Request body ${index} is ${Buffer.byteLength(body, "utf8")} bytes`)
        yield* writer.write(body)
      }
    }
  )

  return { name: "local-file", handleBatch } satisfies BatchSink
})
