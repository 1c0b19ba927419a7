/**
 * Tests for the remote sink, against an in-process HTTP client.
 *
 * @module
 */
import { recordMessage } from "@batch-target/core/messages"
import { type Batch, RemoteSink } from "@batch-target/core/sinks"
import * as Timings from "@batch-target/core/timings"
import * as HttpClient from "@effect/platform/HttpClient"
import * as HttpClientError from "@effect/platform/HttpClientError"
import type * as HttpClientRequest from "@effect/platform/HttpClientRequest"
import * as HttpClientResponse from "@effect/platform/HttpClientResponse"
import { describe, expect, it } from "@effect/vitest"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Logger from "effect/Logger"
import * as Redacted from "effect/Redacted"
import * as Ref from "effect/Ref"

const URL = "https://import.example.test/v2/import/batch"

const batch: Batch = {
  stream: "users",
  messages: [recordMessage("users", { id: 1 }), recordMessage("users", { id: 2 })],
  schema: { type: "object" },
  keyNames: ["id"]
}

type Reply = Response | "connection-error"

/**
 * Runs the sink against a client answering the nth request with `reply(n)`.
 */
const deliver = (
  reply: (attempt: number) => Reply,
  options: Partial<RemoteSink.RemoteSinkOptions> = {}
) =>
  Effect.gen(function*() {
    const requests = yield* Ref.make<ReadonlyArray<HttpClientRequest.HttpClientRequest>>([])

    const client = HttpClient.make((request) =>
      Ref.updateAndGet(requests, (sent) => [...sent, request]).pipe(
        Effect.flatMap((sent) => {
          const response = reply(sent.length)
          return response === "connection-error"
            ? Effect.fail(
              new HttpClientError.RequestError({
                request,
                reason: "Transport",
                cause: new Error("connect ECONNREFUSED")
              })
            )
            : Effect.succeed(HttpClientResponse.fromWeb(request, response))
        })
      )
    )

    const sink = yield* RemoteSink.make({
      url: URL,
      token: Redacted.make("test-secret"),
      maxBatchBytes: 1_000_000,
      baseDelay: "1 millis",
      ...options
    }).pipe(
      Effect.provideService(HttpClient.HttpClient, client),
      Effect.provide(Timings.layer)
    )

    const result = yield* Effect.either(sink.handleBatch(batch))
    return { result, requests: yield* Ref.get(requests) } as const
  })

const bodyText = (request: HttpClientRequest.HttpClientRequest) =>
  request.body._tag === "Uint8Array" ? new TextDecoder().decode(request.body.body) : ""

const ids = (request: HttpClientRequest.HttpClientRequest): ReadonlyArray<number> => {
  const body: { messages: ReadonlyArray<{ data: { id: number } }> } = JSON.parse(bodyText(request))
  return body.messages.map((message) => message.data.id)
}

const ok = () => new Response(null, { status: 200 })

/**
 * Collects the log levels written while the effect runs.
 */
const withLogLevels = <A, E>(self: Effect.Effect<A, E>) =>
  Effect.gen(function*() {
    const levels: Array<string> = []
    const logger = Logger.make(({ logLevel }) => {
      levels.push(logLevel.label)
    })
    const result = yield* self.pipe(
      Effect.provide(Logger.replace(Logger.defaultLogger, logger))
    )
    return { result, levels } as const
  })

describe("RemoteSink", () => {
  it.live("posts each body with the bearer token", () =>
    Effect.gen(function*() {
      const { requests, result } = yield* deliver(ok)

      expect(Either.isRight(result)).toBe(true)
      expect(requests).toHaveLength(1)
      const [request] = requests
      expect(request?.method).toBe("POST")
      expect(request?.url).toBe(URL)
      expect(request?.headers["authorization"]).toBe("Bearer test-secret")
      expect(request?.body._tag === "Uint8Array" ? request.body.contentType : undefined).toBe("application/json")
      expect(requests.map(ids)).toEqual([[1, 2]])
    }))

  it.live("sends split bodies in order", () =>
    Effect.gen(function*() {
      const whole = yield* deliver(ok)
      const size = Buffer.byteLength(whole.requests.map(bodyText).join(""))

      const { requests, result } = yield* deliver(ok, { maxBatchBytes: size })

      expect(Either.isRight(result)).toBe(true)
      expect(requests.map(ids)).toEqual([[1], [2]])
    }))

  it.live("fails without retrying on a client error", () =>
    Effect.gen(function*() {
      const { requests, result } = yield* deliver(() =>
        new Response(JSON.stringify({ message: "Invalid key_names" }), { status: 400 })
      )

      expect(requests).toHaveLength(1)
      expect(Either.getLeft(result)).toMatchObject({
        value: {
          _tag: "DeliveryRejectedError",
          message: "Error sending data: Invalid key_names",
          status: 400
        }
      })
    }))

  it.live("falls back to the status and body text for unstructured errors", () =>
    Effect.gen(function*() {
      const { result } = yield* deliver(() => new Response("bad request", { status: 400 }))

      expect(Either.getLeft(result)).toMatchObject({
        value: { message: "Error sending data: 400: bad request" }
      })
    }))

  it.live("retries server errors until the attempts run out", () =>
    Effect.gen(function*() {
      const { requests, result } = yield* deliver(() => new Response("unavailable", { status: 503 }))

      expect(requests).toHaveLength(RemoteSink.DEFAULT_MAX_ATTEMPTS)
      expect(Either.getLeft(result)).toMatchObject({
        value: {
          _tag: "DeliveryRejectedError",
          message: "Error sending data: 503: unavailable",
          status: 503
        }
      })
    }))

  it.live("reports a connection error when the server cannot be reached", () =>
    Effect.gen(function*() {
      const { requests, result } = yield* deliver(() => "connection-error")

      expect(requests).toHaveLength(RemoteSink.DEFAULT_MAX_ATTEMPTS)
      expect(Either.getLeft(result)).toMatchObject({
        value: {
          _tag: "DeliveryConnectionError",
          message: `Error connecting to ${URL}`,
          url: URL
        }
      })
    }))

  it.live("succeeds once a retried request is accepted", () =>
    Effect.gen(function*() {
      const { requests, result } = yield* deliver((attempt) =>
        attempt < 3 ? new Response(null, { status: 500 }) : ok()
      )

      expect(Either.isRight(result)).toBe(true)
      expect(requests).toHaveLength(3)
    }))

  it.live("honours a custom attempt budget", () =>
    Effect.gen(function*() {
      const { requests, result } = yield* deliver(() => "connection-error", { maxAttempts: 3 })

      expect(requests).toHaveLength(3)
      expect(Either.isLeft(result)).toBe(true)
    }))

  it.live("warns only before an actual retry", () =>
    Effect.gen(function*() {
      const { levels, result } = yield* withLogLevels(
        deliver(() => new Response("unavailable", { status: 503 }), { maxAttempts: 3 })
      )

      expect(result.requests).toHaveLength(3)
      expect(levels.filter((level) => level === "WARN")).toHaveLength(2)
    }))

  it.live("warns once when the first retry succeeds", () =>
    Effect.gen(function*() {
      const { levels, result } = yield* withLogLevels(
        deliver((attempt) => attempt === 1 ? new Response(null, { status: 502 }) : ok())
      )

      expect(result.requests).toHaveLength(2)
      expect(levels.filter((level) => level === "WARN")).toHaveLength(1)
    }))
})
