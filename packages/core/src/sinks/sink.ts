/**
 * The contract shared by every delivery sink.
 *
 * A sink receives a finished batch, all messages of one stream and version,
 * together with the schema and key properties of that stream. The engine
 * calls its sinks in order and treats any failure as fatal for the run.
 *
 * @module
 */
import type * as Arr from "effect/Array"
import type * as Effect from "effect/Effect"
import type {
  BatchTooLargeError,
  DeliveryConnectionError,
  DeliveryRejectedError,
  MissingKeyPropertyError,
  OutputWriteError,
  SchemaValidationError
} from "../errors.ts"
import type { BatchMessage, JsonObject } from "../messages.ts"

export interface Batch {
  readonly stream: string
  readonly messages: Arr.NonEmptyReadonlyArray<BatchMessage>
  readonly schema: JsonObject
  readonly keyNames: ReadonlyArray<string>
}

export type SinkError =
  | BatchTooLargeError
  | DeliveryConnectionError
  | DeliveryRejectedError
  | MissingKeyPropertyError
  | OutputWriteError
  | SchemaValidationError

export interface BatchSink {
  readonly name: string
  readonly handleBatch: (batch: Batch) => Effect.Effect<void, SinkError>
}
