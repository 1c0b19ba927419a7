/**
 * Serializes a batch of messages into request bodies for the batch import API.
 *
 * A body holds the table name, schema, key names and one entry per message.
 * When a body would reach the size limit the batch is split in half and each
 * half is serialized on its own, so every body stays under the limit while the
 * concatenated bodies keep every message exactly once and in order.
 *
 * @module
 */
import * as Arr from "effect/Array"
import * as Clock from "effect/Clock"
import * as DateTime from "effect/DateTime"
import * as Effect from "effect/Effect"
import { BatchTooLargeError } from "./errors.ts"
import type { BatchMessage, JsonObject } from "./messages.ts"

// =============================================================================
// Types
// =============================================================================

export interface UpsertEntry {
  readonly action: "upsert"
  readonly data: JsonObject
  readonly vintage: string
  readonly sequence: number
}

export interface ActivateVersionEntry {
  readonly action: "activate_version"
  readonly sequence: number
}

export type BatchEntry = UpsertEntry | ActivateVersionEntry

export interface RequestBody {
  readonly table_name: string
  readonly schema: JsonObject
  readonly key_names: ReadonlyArray<string>
  readonly messages: ReadonlyArray<BatchEntry>
  readonly table_version?: number
}

// =============================================================================
// Entries
// =============================================================================

const toEntry = Effect.fnUntraced(function*(message: BatchMessage): Effect.fn.Return<BatchEntry> {
  const sequence = yield* Clock.currentTimeMillis
  switch (message._tag) {
    case "RECORD": {
      const now = yield* DateTime.now
      return {
        action: "upsert",
        data: message.record,
        vintage: DateTime.formatIso(now),
        sequence
      }
    }
    case "ACTIVATE_VERSION": {
      return { action: "activate_version", sequence }
    }
  }
})

const makeBody = Effect.fnUntraced(function*(
  messages: Arr.NonEmptyReadonlyArray<BatchMessage>,
  schema: JsonObject,
  keyNames: ReadonlyArray<string>
): Effect.fn.Return<RequestBody> {
  const first = Arr.headNonEmpty(messages)
  const entries = yield* Effect.forEach(messages, toEntry)
  const body: RequestBody = {
    table_name: first.stream,
    schema,
    key_names: keyNames,
    messages: entries
  }
  return first.version === undefined ? body : { ...body, table_version: first.version }
})

// =============================================================================
// Serializer
// =============================================================================

/**
 * Produces one or more JSON request bodies, each strictly smaller than
 * `maxBytes`, for a batch of messages belonging to one stream and version.
 *
 * Fails with {@link BatchTooLargeError} when a single message cannot fit.
 */
export const serialize = (
  messages: Arr.NonEmptyReadonlyArray<BatchMessage>,
  schema: JsonObject,
  keyNames: ReadonlyArray<string>,
  maxBytes: number
): Effect.Effect<ReadonlyArray<string>, BatchTooLargeError> =>
  Effect.gen(function*() {
    const body = JSON.stringify(yield* makeBody(messages, schema, keyNames))
    const size = Buffer.byteLength(body, "utf8")
    yield* Effect.logDebug(`Serialized ${messages.length} messages into ${size} bytes`)

    if (size < maxBytes) {
      return [body]
    }

    if (!Arr.isNonEmptyReadonlyArray(Arr.tailNonEmpty(messages))) {
      const stream = Arr.headNonEmpty(messages).stream
      return yield* new BatchTooLargeError({
        message: `A single record is larger than batch size limit of ${maxBytes} bytes`,
        stream,
        maxBytes,
        size
      })
    }

    const pivot = Math.floor(messages.length / 2)
    const [left, right] = Arr.splitAt(messages, pivot)
    if (!Arr.isNonEmptyReadonlyArray(left) || !Arr.isNonEmptyReadonlyArray(right)) {
      return yield* Effect.dieMessage("Split produced an empty half")
    }

    const leftBodies = yield* serialize(left, schema, keyNames, maxBytes)
    const rightBodies = yield* serialize(right, schema, keyNames, maxBytes)
    return [...leftBodies, ...rightBodies]
  })
