import * as HttpClient from "@effect/platform/HttpClient"
import * as Effect from "effect/Effect"

export interface CollectOptions {
  readonly url: string
  readonly version: string
}

/**
 * Sends a single anonymous usage notification carrying the target's version.
 * Failures are logged at debug level and never propagate.
 */
export const collect = Effect.fn("UsageCollector.collect")(function*(options: CollectOptions) {
  const httpClient = yield* HttpClient.HttpClient

  yield* httpClient.get(options.url, {
    urlParams: {
      e: "se",
      aid: "singer",
      se_ca: "batch-target",
      se_ac: "open",
      se_la: options.version
    }
  }).pipe(
    Effect.timeout("10 seconds")
  )
}, Effect.catchAllCause((cause) => Effect.logDebug("Collection request failed", cause)))
