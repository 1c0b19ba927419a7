/**
 * The JSON configuration file read by the command line target.
 *
 * @module
 */
import * as FileSystem from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Redacted from "effect/Redacted"
import * as Schema from "effect/Schema"
import { ConfigError } from "./errors.ts"

export const DEFAULT_URL = "https://api.stitchdata.com/v2/import/batch"

// =============================================================================
// Models
// =============================================================================

export class TargetConfig extends Schema.Class<TargetConfig>("BatchTarget/TargetConfig")({
  token: Schema.optional(Schema.Redacted(Schema.String)).annotations({
    description: "Bearer token used to authenticate with the import API"
  }),
  url: Schema.String.pipe(
    Schema.optionalWith({ default: () => DEFAULT_URL }),
    Schema.fromKey("stitch_url")
  ).annotations({
    description: "Endpoint that request bodies are posted to"
  }),
  disableCollection: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false }),
    Schema.fromKey("disable_collection")
  ).annotations({
    description: "Disables the anonymous usage notification even when \"collection_url\" is set"
  }),
  collectionUrl: Schema.String.pipe(
    Schema.optional,
    Schema.fromKey("collection_url")
  ).annotations({
    description: "Endpoint that receives the anonymous usage notification. No notification is sent without it"
  })
}, { identifier: "TargetConfig" }) {}

const decodeConfig = Schema.decode(Schema.parseJson(TargetConfig))

// =============================================================================
// Loading
// =============================================================================

/**
 * Reads and decodes the configuration file at `path`.
 */
export const loadConfig = Effect.fn("loadConfig")(function*(path: string) {
  const fs = yield* FileSystem.FileSystem

  const content = yield* fs.readFileString(path).pipe(
    Effect.mapError((cause) =>
      new ConfigError({
        message: `Unable to read config file ${path}: ${cause.message}`,
        cause
      })
    )
  )

  return yield* decodeConfig(content).pipe(
    Effect.mapError((cause) =>
      new ConfigError({
        message: `Invalid config file ${path}: ${cause.message}`,
        cause
      })
    )
  )
})

/**
 * Returns the configured token, failing when it is absent or empty.
 */
export const requireToken = (config: TargetConfig): Effect.Effect<Redacted.Redacted<string>, ConfigError> =>
  Option.fromNullable(config.token).pipe(
    Option.filter((token) => Redacted.value(token).length > 0),
    Option.match({
      onNone: () => Effect.fail(new ConfigError({ message: "Configuration is missing required \"token\" field" })),
      onSome: Effect.succeed
    })
  )

/**
 * Rewrites a URL pointing at the legacy push endpoint to the batch endpoint.
 */
export const useBatchUrl = (url: string): Effect.Effect<string> => {
  if (!url.endsWith("/import/push")) {
    return Effect.succeed(url)
  }
  const result = `${url.slice(0, -"/import/push".length)}/import/batch`
  return Effect.logInfo(`Cannot use the /push endpoint, using the /batch endpoint instead. Changed ${url} to ${result}`)
    .pipe(Effect.as(result))
}
