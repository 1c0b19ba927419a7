/**
 * BatchEngine - buffers incoming messages, decides when to flush and emits
 * checkpoints once the data preceding them has been handed to every sink.
 *
 * The buffer only ever holds messages of a single stream and version. A
 * message for a different stream or version flushes the buffer before it is
 * appended, and a schema message always flushes. Besides those boundaries a
 * flush happens when the buffer reaches the byte or record limit, or when the
 * configured delay has passed since the last batch was delivered.
 *
 * A flush delivers the buffer to each sink in order and only then writes the
 * latest pending checkpoint. If a sink fails the checkpoint is not written,
 * so a restart resumes from the last checkpoint whose data was delivered.
 *
 * @module
 */
import * as Arr from "effect/Array"
import * as Chunk from "effect/Chunk"
import * as Clock from "effect/Clock"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Ref from "effect/Ref"
import * as Stream from "effect/Stream"
import { MissingSchemaError, type MessageParseError, type OutputWriteError } from "./errors.ts"
import { CheckpointWriter } from "./line-writer.ts"
import {
  type BatchMessage,
  formatMessage,
  type JsonObject,
  lineByteLength,
  type Message,
  parseMessage
} from "./messages.ts"
import type { BatchSink, SinkError } from "./sinks/sink.ts"
import { Timings } from "./timings.ts"

// =============================================================================
// Options
// =============================================================================

export const DEFAULT_MAX_BATCH_BYTES = 4_000_000
export const DEFAULT_MAX_BATCH_RECORDS = 20_000
export const DEFAULT_BATCH_DELAY_SECONDS = 300

export interface BatchEngineOptions {
  /**
   * Sinks that receive every batch, called in order.
   */
  readonly sinks: ReadonlyArray<BatchSink>
  readonly maxBatchBytes?: number | undefined
  readonly maxBatchRecords?: number | undefined
  /**
   * Seconds after the last delivered batch at which the next buffered message
   * triggers a flush.
   */
  readonly batchDelaySeconds?: number | undefined
}

// =============================================================================
// Types
// =============================================================================

export interface StreamMeta {
  readonly schema: JsonObject
  readonly keyProperties: ReadonlyArray<string>
}

export type EngineError = SinkError | MissingSchemaError | OutputWriteError

interface EngineState {
  readonly buffer: Chunk.Chunk<BatchMessage>
  readonly bufferBytes: number
  readonly streams: ReadonlyMap<string, StreamMeta>
  readonly checkpoint: Option.Option<unknown>
  readonly lastFlushAt: number
}

// =============================================================================
// Service Interface
// =============================================================================

export interface BatchEngineService {
  /**
   * Handles one message. `lineBytes` is the size of the raw input line the
   * message was read from and defaults to the size of its JSON encoding.
   */
  readonly handleMessage: (message: Message, lineBytes?: number) => Effect.Effect<void, EngineError>

  /**
   * Parses and handles one raw input line. Blank lines are skipped.
   */
  readonly handleLine: (line: string) => Effect.Effect<void, EngineError | MessageParseError>

  /**
   * Delivers anything buffered, then writes the pending checkpoint if any.
   */
  readonly flush: Effect.Effect<void, EngineError>

  /**
   * Handles every message of the stream, then flushes.
   */
  readonly run: <E, R>(messages: Stream.Stream<Message, E, R>) => Effect.Effect<void, EngineError | E, R>

  /**
   * Handles every raw line of the stream, then flushes.
   */
  readonly runLines: <E, R>(
    lines: Stream.Stream<string, E, R>
  ) => Effect.Effect<void, EngineError | MessageParseError | E, R>
}

export class BatchEngine extends Context.Tag("BatchTarget/BatchEngine")<
  BatchEngine,
  BatchEngineService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const make = Effect.fnUntraced(function*(
  options: BatchEngineOptions
): Effect.fn.Return<BatchEngineService, never, CheckpointWriter | Timings> {
  const writer = yield* CheckpointWriter
  const timings = yield* Timings

  const maxBatchBytes = options.maxBatchBytes ?? DEFAULT_MAX_BATCH_BYTES
  const maxBatchRecords = options.maxBatchRecords ?? DEFAULT_MAX_BATCH_RECORDS
  const batchDelaySeconds = options.batchDelaySeconds ?? DEFAULT_BATCH_DELAY_SECONDS

  const ref = yield* Ref.make<EngineState>({
    buffer: Chunk.empty(),
    bufferBytes: 0,
    streams: new Map(),
    checkpoint: Option.none(),
    lastFlushAt: yield* Clock.currentTimeMillis
  })

  // Flushes and message handling never interleave
  const lock = yield* Effect.makeSemaphore(1)

  const deliver = Effect.fnUntraced(function*(messages: Arr.NonEmptyReadonlyArray<BatchMessage>) {
    const stream = Arr.headNonEmpty(messages).stream
    const { streams } = yield* Ref.get(ref)
    const meta = streams.get(stream)
    if (meta === undefined) {
      return yield* new MissingSchemaError({
        message: `No schema was received for stream ${stream}`,
        stream
      })
    }

    const batch = { stream, messages, schema: meta.schema, keyNames: meta.keyProperties }
    for (const sink of options.sinks) {
      yield* sink.handleBatch(batch).pipe(
        Effect.annotateLogs({ sink: sink.name })
      )
    }

    const now = yield* Clock.currentTimeMillis
    yield* Ref.update(ref, (state) => ({ ...state, buffer: Chunk.empty(), bufferBytes: 0, lastFlushAt: now }))
  })

  const emitCheckpoint = Effect.fnUntraced(function*(value: unknown) {
    const line = JSON.stringify(value ?? null)
    yield* Effect.logDebug(`Emitting state ${line}`)
    yield* writer.write(line)
    yield* Ref.update(ref, (state) => ({ ...state, checkpoint: Option.none() }))
    yield* timings.log
  })

  const flushUnlocked: Effect.Effect<void, EngineError> = Effect.gen(function*() {
    const buffer = Chunk.toReadonlyArray((yield* Ref.get(ref)).buffer)
    if (Arr.isNonEmptyReadonlyArray(buffer)) {
      yield* deliver(buffer)
    }

    const { checkpoint } = yield* Ref.get(ref)
    if (Option.isSome(checkpoint)) {
      yield* emitCheckpoint(checkpoint.value)
    }
  })

  const append = Effect.fnUntraced(function*(message: BatchMessage, lineBytes: number) {
    const current = yield* Ref.get(ref)
    const head = Chunk.head(current.buffer)
    if (
      Option.isSome(head) &&
      (head.value.stream !== message.stream || head.value.version !== message.version)
    ) {
      yield* flushUnlocked
    }

    const state = yield* Ref.updateAndGet(ref, (state) => ({
      ...state,
      buffer: Chunk.append(state.buffer, message),
      bufferBytes: state.bufferBytes + lineBytes
    }))

    const now = yield* Clock.currentTimeMillis
    const bytes = state.bufferBytes
    const count = Chunk.size(state.buffer)
    const seconds = (now - state.lastFlushAt) / 1000

    if (bytes >= maxBatchBytes || count >= maxBatchRecords || seconds >= batchDelaySeconds) {
      yield* Effect.logInfo(`Flushing ${bytes} bytes, ${count} messages, after ${seconds.toFixed(2)} seconds`)
      yield* flushUnlocked
    }
  })

  const handleUnlocked = (message: Message, lineBytes: number): Effect.Effect<void, EngineError> => {
    switch (message._tag) {
      case "SCHEMA": {
        return flushUnlocked.pipe(
          Effect.zipRight(Ref.update(ref, (state) => ({
            ...state,
            streams: new Map<string, StreamMeta>([
              ...state.streams,
              [message.stream, { schema: message.schema, keyProperties: message.keyProperties }]
            ])
          })))
        )
      }
      case "RECORD":
      case "ACTIVATE_VERSION": {
        return append(message, lineBytes)
      }
      case "STATE": {
        return Ref.update(ref, (state) => ({ ...state, checkpoint: Option.some(message.value) }))
      }
    }
  }

  const handleMessage: BatchEngineService["handleMessage"] = (message, lineBytes) =>
    lock.withPermits(1)(
      handleUnlocked(message, lineBytes ?? lineByteLength(formatMessage(message)))
    )

  const handleLine: BatchEngineService["handleLine"] = (line) =>
    line.trim().length === 0
      ? Effect.void
      : parseMessage(line).pipe(
        Effect.flatMap((message) => handleMessage(message, lineByteLength(line)))
      )

  const flush = lock.withPermits(1)(flushUnlocked)

  const run: BatchEngineService["run"] = (messages) =>
    Stream.runForEach(messages, (message) => handleMessage(message)).pipe(
      Effect.zipRight(flush)
    )

  const runLines: BatchEngineService["runLines"] = (lines) =>
    Stream.runForEach(lines, handleLine).pipe(
      Effect.zipRight(flush)
    )

  return { handleMessage, handleLine, flush, run, runLines } satisfies BatchEngineService
})

// =============================================================================
// Layers
// =============================================================================

export const layer = (options: BatchEngineOptions): Layer.Layer<BatchEngine, never, CheckpointWriter | Timings> =>
  Layer.effect(BatchEngine, make(options))
