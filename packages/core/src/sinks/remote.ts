/**
 * Remote sink - delivers request bodies to the batch import API.
 *
 * Each body is posted with a bearer token. Client errors (4xx) fail at once;
 * server errors and connection failures are retried with jittered exponential
 * backoff until the attempt budget is spent.
 *
 * @module
 */
import * as HttpClient from "@effect/platform/HttpClient"
import * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import * as Cause from "effect/Cause"
import type * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Redacted from "effect/Redacted"
import * as Ref from "effect/Ref"
import * as Schedule from "effect/Schedule"
import * as Schema from "effect/Schema"
import { DeliveryConnectionError, DeliveryRejectedError, DeliveryTransportError } from "../errors.ts"
import { serialize } from "../serializer.ts"
import { Timings } from "../timings.ts"
import type { BatchSink } from "./sink.ts"

// =============================================================================
// Options
// =============================================================================

export interface RemoteSinkOptions {
  readonly url: string
  readonly token: Redacted.Redacted<string>
  readonly maxBatchBytes: number
  /**
   * Total number of attempts per request body. Defaults to 8.
   */
  readonly maxAttempts?: number | undefined
  /**
   * Delay before the first retry, doubled on every further retry. Defaults to
   * one second.
   */
  readonly baseDelay?: Duration.DurationInput | undefined
}

export const DEFAULT_MAX_ATTEMPTS = 8

// =============================================================================
// Response Messages
// =============================================================================

const ErrorBody = Schema.parseJson(Schema.Struct({ message: Schema.String }))
const decodeErrorBody = Schema.decodeUnknownOption(ErrorBody)

/**
 * Reads the human-readable message of an error response, falling back to the
 * status and raw body when the body carries no `message` field.
 */
const readErrorMessage = (response: HttpClientResponse.HttpClientResponse) =>
  response.text.pipe(
    Effect.orElseSucceed(() => ""),
    Effect.map((text) =>
      decodeErrorBody(text).pipe(
        Option.map((body) => body.message),
        Option.getOrElse(() => `${response.status}: ${text}`)
      )
    )
  )

// =============================================================================
// Implementation
// =============================================================================

export const make = Effect.fnUntraced(function*(
  options: RemoteSinkOptions
): Effect.fn.Return<BatchSink, never, HttpClient.HttpClient | Timings> {
  const httpClient = yield* HttpClient.HttpClient
  const timings = yield* Timings

  const { url } = options
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS

  const retrySchedule = Schedule.exponential(options.baseDelay ?? "1 second", 2).pipe(
    Schedule.jittered,
    Schedule.intersect(Schedule.recurs(maxAttempts - 1))
  )

  const attempt = (body: string) =>
    httpClient.execute(
      HttpClientRequest.post(url).pipe(
        HttpClientRequest.bearerToken(Redacted.value(options.token)),
        HttpClientRequest.bodyText(body, "application/json")
      )
    ).pipe(
      Effect.catchTag("RequestError", (cause) =>
        Effect.fail(
          new DeliveryTransportError({
            message: `Connection failed to ${url}: ${cause.message}`,
            status: Option.none(),
            cause: Option.some(cause)
          })
        )),
      Effect.flatMap(
        HttpClientResponse.matchStatus({
          "2xx": () => Effect.void,
          "4xx": Effect.fnUntraced(function*(response) {
            const message = yield* readErrorMessage(response)
            return yield* new DeliveryRejectedError({
              message: `Error sending data: ${message}`,
              status: response.status
            })
          }),
          orElse: Effect.fnUntraced(function*(response) {
            const message = yield* readErrorMessage(response)
            return yield* new DeliveryTransportError({
              message,
              status: Option.some(response.status),
              cause: Option.none()
            })
          })
        })
      )
    )

  const send = Effect.fnUntraced(function*(body: string) {
    const failures = yield* Ref.make(0)

    // Only transport failures are retried, so the nth one is followed by a
    // retry while n is below the attempt budget
    const warnBeforeRetry = (error: DeliveryTransportError) =>
      Ref.updateAndGet(failures, (n) => n + 1).pipe(
        Effect.flatMap((n) =>
          n < maxAttempts
            ? Effect.logWarning(`Error sending data, retrying with backoff: ${error.message}`)
            : Effect.void
        )
      )

    return yield* attempt(body).pipe(
      Effect.tapErrorTag("DeliveryTransportError", warnBeforeRetry),
      Effect.retry({
        schedule: retrySchedule,
        while: (error) => error._tag === "DeliveryTransportError"
      }),
      Effect.catchTag("DeliveryTransportError", Effect.fnUntraced(function*(error) {
        if (Option.isSome(error.status)) {
          return yield* new DeliveryRejectedError({
            message: `Error sending data: ${error.message}`,
            status: error.status.value
          })
        }
        yield* Effect.logError(`Error connecting to ${url}`, Cause.fail(error))
        return yield* new DeliveryConnectionError({
          message: `Error connecting to ${url}`,
          url
        })
      }))
    )
  })

  const handleBatch: BatchSink["handleBatch"] = Effect.fn("RemoteSink.handleBatch")(
    function*(batch) {
      yield* Effect.logInfo(
        `Sending batch with ${batch.messages.length} messages for table ${batch.stream} to ${url}`
      )

      const bodies = yield* serialize(batch.messages, batch.schema, batch.keyNames, options.maxBatchBytes).pipe(
        timings.mode("serializing")
      )

      yield* Effect.logInfo(`Split batch into ${bodies.length} requests`)

      yield* Effect.forEach(bodies, (body, index) =>
        Effect.logDebug(
          `Request ${index + 1} of ${bodies.length} is ${Buffer.byteLength(body, "utf8")} bytes`
        ).pipe(
          Effect.zipRight(send(body)),
          timings.mode("posting")
        ), { discard: true })
    }
  )

  return { name: "remote", handleBatch } satisfies BatchSink
})
