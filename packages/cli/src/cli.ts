import { isKnownError } from "@batch-target/core/errors"
import * as LineWriter from "@batch-target/core/line-writer"
import * as Timings from "@batch-target/core/timings"
import * as CliConfig from "@effect/cli/CliConfig"
import * as Command from "@effect/cli/Command"
import * as ValidationError from "@effect/cli/ValidationError"
import * as NodeContext from "@effect/platform-node/NodeContext"
import * as FetchHttpClient from "@effect/platform/FetchHttpClient"
import * as Cause from "effect/Cause"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as Option from "effect/Option"
import PackageJson from "../package.json" with { type: "json" }
import { TargetCommand } from "./commands/target.ts"

const run = Command.run(TargetCommand, {
  name: "Batch Target",
  version: PackageJson["version"]
})

const CliConfigLayer = CliConfig.layer({
  showBuiltIns: false
})

// Standard output carries the checkpoint stream
const LoggerLayer = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger)
)

const MainLayer = Layer.mergeAll(
  CliConfigLayer,
  FetchHttpClient.layer,
  LineWriter.layerStdout,
  LoggerLayer,
  Timings.layer
).pipe(
  Layer.provideMerge(NodeContext.layer)
)

/**
 * Known errors end the run with their message only, anything else is logged
 * with its full cause. Invalid arguments are already reported by the parser.
 */
export const reportFailure = (cause: Cause.Cause<unknown>): Effect.Effect<void> => {
  if (Cause.isInterruptedOnly(cause)) {
    return Effect.void
  }
  const failure = Cause.failureOption(cause)
  if (Option.isSome(failure) && ValidationError.isValidationError(failure.value)) {
    return Effect.void
  }
  if (Option.isSome(failure) && isKnownError(failure.value)) {
    return Effect.logFatal(failure.value.message)
  }
  return Effect.logFatal("Unexpected error", cause)
}

export const Cli = run(process.argv).pipe(
  Effect.tapErrorCause(reportFailure),
  Effect.provide(MainLayer)
)
