import * as Effect from "effect/Effect"
import * as Schedule from "effect/Schedule"
import * as NodeOS from "node:os"

const megabytes = (bytes: number) => `${(bytes / 1024 / 1024).toFixed(1)} MB`

/**
 * Formats a memory usage sample relative to the total system memory.
 */
export const formatUsage = (usage: NodeJS.MemoryUsage, totalMemory: number): string =>
  `Memory usage: ${(usage.rss / totalMemory * 100).toFixed(2)}% of total: ` +
  `rss=${megabytes(usage.rss)}, heapTotal=${megabytes(usage.heapTotal)}, ` +
  `heapUsed=${megabytes(usage.heapUsed)}, external=${megabytes(usage.external)}`

const report = Effect.suspend(() => Effect.logInfo(formatUsage(process.memoryUsage(), NodeOS.totalmem())))

/**
 * Logs process memory usage every 30 seconds until interrupted.
 */
export const run: Effect.Effect<void> = report.pipe(
  Effect.repeat(Schedule.spaced("30 seconds")),
  Effect.asVoid
)
