import * as BatchEngine from "@batch-target/core/engine"
import * as Config from "@batch-target/core/config"
import { ConfigError } from "@batch-target/core/errors"
import * as LineWriter from "@batch-target/core/line-writer"
import * as Sinks from "@batch-target/core/sinks"
import * as Command from "@effect/cli/Command"
import * as Options from "@effect/cli/Options"
import * as NodeStream from "@effect/platform-node/NodeStream"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Stream from "effect/Stream"
import PackageJson from "../../package.json" with { type: "json" }
import { InputReadError } from "../errors.ts"
import * as MemoryReporter from "../services/memory-reporter.ts"
import * as UsageCollector from "../services/usage-collector.ts"

// =============================================================================
// Options
// =============================================================================

const config = Options.file("config", { exists: "yes" }).pipe(
  Options.withAlias("c"),
  Options.withDescription(
    "Config file. Required unless running with --dry-run. Usage data is only sent when it sets \"collection_url\"."
  ),
  Options.optional
)

const dryRun = Options.boolean("dry-run").pipe(
  Options.withAlias("n"),
  Options.withDescription("Validate batches against their schema instead of sending them.")
)

const outputFile = Options.file("output-file").pipe(
  Options.withAlias("o"),
  Options.withDescription("Save request bodies to this file."),
  Options.optional
)

const maxBatchRecords = Options.integer("max-batch-records").pipe(
  Options.withDescription("Flush once this many messages are buffered."),
  Options.withDefault(BatchEngine.DEFAULT_MAX_BATCH_RECORDS)
)

const maxBatchBytes = Options.integer("max-batch-bytes").pipe(
  Options.withDescription("Flush once the buffered input lines reach this size. Also the request body limit."),
  Options.withDefault(BatchEngine.DEFAULT_MAX_BATCH_BYTES)
)

const batchDelaySeconds = Options.float("batch-delay-seconds").pipe(
  Options.withDescription("Flush when this many seconds have passed since the last batch was sent."),
  Options.withDefault(BatchEngine.DEFAULT_BATCH_DELAY_SECONDS)
)

export interface TargetParams {
  readonly config: Option.Option<string>
  readonly dryRun: boolean
  readonly outputFile: Option.Option<string>
  readonly maxBatchRecords: number
  readonly maxBatchBytes: number
  readonly batchDelaySeconds: number
}

// =============================================================================
// Handler
// =============================================================================

const makeDeliverySink = Effect.fnUntraced(function*(params: TargetParams) {
  if (params.dryRun) {
    return yield* Sinks.ValidatingSink.make
  }

  const path = yield* Option.match(params.config, {
    onNone: () => Effect.fail(new ConfigError({ message: "Config file required if not in dry run mode" })),
    onSome: Effect.succeed
  })
  const config = yield* Config.loadConfig(path)
  const token = yield* Config.requireToken(config)
  const url = yield* Config.useBatchUrl(config.url)

  if (!config.disableCollection && config.collectionUrl !== undefined) {
    yield* Effect.logInfo(
      `Sending version information to ${config.collectionUrl}. To disable sending anonymous usage data, ` +
        "set the config parameter \"disable_collection\" to true or remove \"collection_url\""
    )
    yield* Effect.forkDaemon(UsageCollector.collect({
      url: config.collectionUrl,
      version: PackageJson["version"]
    }))
  }

  return yield* Sinks.RemoteSink.make({ url, token, maxBatchBytes: params.maxBatchBytes })
})

/**
 * Builds the sinks for a run and feeds every input line through the engine.
 */
export const runTarget = Effect.fnUntraced(function*(
  params: TargetParams,
  lines: Stream.Stream<string, InputReadError>
) {
  yield* Effect.forkScoped(MemoryReporter.run)

  const sinks: Array<Sinks.BatchSink> = []
  if (Option.isSome(params.outputFile)) {
    const writer = yield* LineWriter.openFile(params.outputFile.value)
    sinks.push(yield* Sinks.LocalFileSink.make({ writer, maxBatchBytes: params.maxBatchBytes }))
  }
  sinks.push(yield* makeDeliverySink(params))

  const engine = yield* BatchEngine.make({
    sinks,
    maxBatchBytes: params.maxBatchBytes,
    maxBatchRecords: params.maxBatchRecords,
    batchDelaySeconds: params.batchDelaySeconds
  })

  yield* engine.runLines(lines)
  yield* Effect.logInfo("Exiting normally")
})

const stdinLines: Stream.Stream<string, InputReadError> = NodeStream.fromReadable<InputReadError, Uint8Array>(
  () => process.stdin,
  (cause) => new InputReadError({ message: "Failed to read from standard input", cause })
).pipe(
  Stream.decodeText("utf-8"),
  Stream.splitLines
)

export const TargetCommand = Command.make("batch-target", {
  config,
  dryRun,
  outputFile,
  maxBatchRecords,
  maxBatchBytes,
  batchDelaySeconds
}).pipe(
  Command.withDescription("Read messages from standard input and deliver them in batches"),
  Command.withHandler((params) => Effect.scoped(runTarget(params, stdinLines)))
)
