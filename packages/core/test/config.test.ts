import { DEFAULT_URL, loadConfig, requireToken, TargetConfig, useBatchUrl } from "@batch-target/core/config"
import * as NodeContext from "@effect/platform-node/NodeContext"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { describe, expect, it } from "@effect/vitest"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Redacted from "effect/Redacted"

const writeConfig = (content: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const directory = yield* fs.makeTempDirectoryScoped()
    const file = path.join(directory, "config.json")
    yield* fs.writeFileString(file, content)
    return file
  })

describe("loadConfig", () => {
  it.scoped("applies defaults for optional fields", () =>
    Effect.gen(function*() {
      const config = yield* loadConfig(yield* writeConfig("{\"token\":\"test-secret\"}"))

      expect(config.url).toBe(DEFAULT_URL)
      expect(config.disableCollection).toBe(false)
      expect(config.collectionUrl).toBeUndefined()
      expect(Option.map(Option.fromNullable(config.token), Redacted.value)).toEqual(Option.some("test-secret"))
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("reads the wire field names", () =>
    Effect.gen(function*() {
      const config = yield* loadConfig(
        yield* writeConfig(JSON.stringify({
          token: "test-secret",
          stitch_url: "https://import.example.test/v2/import/batch",
          disable_collection: true,
          collection_url: "https://collect.example.test/i"
        }))
      )

      expect(config.url).toBe("https://import.example.test/v2/import/batch")
      expect(config.disableCollection).toBe(true)
      expect(config.collectionUrl).toBe("https://collect.example.test/i")
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("fails on invalid JSON", () =>
    Effect.gen(function*() {
      const file = yield* writeConfig("{ not json")
      const error = yield* Effect.flip(loadConfig(file))

      expect(error._tag).toBe("ConfigError")
      expect(error.message.startsWith(`Invalid config file ${file}: `)).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))

  it.scoped("fails when the file cannot be read", () =>
    Effect.gen(function*() {
      const file = yield* writeConfig("{}")
      const error = yield* Effect.flip(loadConfig(`${file}.missing`))

      expect(error._tag).toBe("ConfigError")
      expect(error.message.startsWith(`Unable to read config file ${file}.missing: `)).toBe(true)
    }).pipe(Effect.provide(NodeContext.layer)))
})

describe("requireToken", () => {
  it.effect("returns the configured token", () =>
    Effect.gen(function*() {
      const token = yield* requireToken(TargetConfig.make({ token: Redacted.make("test-secret") }))

      expect(Redacted.value(token)).toBe("test-secret")
    }))

  it.effect("fails when the token is missing or empty", () =>
    Effect.gen(function*() {
      const missing = yield* Effect.flip(requireToken(TargetConfig.make({})))
      const empty = yield* Effect.flip(requireToken(TargetConfig.make({ token: Redacted.make("") })))

      expect(missing.message).toBe("Configuration is missing required \"token\" field")
      expect(empty.message).toBe("Configuration is missing required \"token\" field")
    }))
})

describe("useBatchUrl", () => {
  it.effect("rewrites the push endpoint", () =>
    Effect.gen(function*() {
      expect(yield* useBatchUrl("https://api.example.test/v2/import/push")).toBe(
        "https://api.example.test/v2/import/batch"
      )
    }))

  it.effect("keeps other endpoints", () =>
    Effect.gen(function*() {
      expect(yield* useBatchUrl(DEFAULT_URL)).toBe(DEFAULT_URL)
    }))
})
