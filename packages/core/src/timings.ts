/**
 * Timings - accumulates the time spent in each phase of a run.
 *
 * Time inside {@link TimingsService.mode} is attributed to the named mode.
 * The gap between the end of one mode and the start of the next is counted
 * as `unspecified`, which covers reading and parsing input.
 *
 * @module
 */
import * as Clock from "effect/Clock"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Ref from "effect/Ref"

// =============================================================================
// Types
// =============================================================================

export type TimingMode = "serializing" | "posting"

export interface TimingsSnapshot {
  readonly unspecified: number
  readonly serializing: number
  readonly posting: number
}

interface TimingsState {
  readonly lastTime: number
  readonly totals: TimingsSnapshot
}

// =============================================================================
// Service Interface
// =============================================================================

export interface TimingsService {
  /**
   * Runs an effect, attributing its duration to the given mode.
   */
  readonly mode: (mode: TimingMode) => <A, E, R>(self: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>

  /**
   * Accumulated totals, in milliseconds.
   */
  readonly snapshot: Effect.Effect<TimingsSnapshot>

  /**
   * Logs the accumulated totals in seconds.
   */
  readonly log: Effect.Effect<void>
}

export class Timings extends Context.Tag("BatchTarget/Timings")<
  Timings,
  TimingsService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const seconds = (millis: number) => (millis / 1000).toFixed(3)

export const format = (totals: TimingsSnapshot): string =>
  `Timings: unspecified: ${seconds(totals.unspecified)}; ` +
  `serializing: ${seconds(totals.serializing)}; ` +
  `posting: ${seconds(totals.posting)};`

export const make = Effect.gen(function*() {
  const startedAt = yield* Clock.currentTimeMillis
  const ref = yield* Ref.make<TimingsState>({
    lastTime: startedAt,
    totals: { unspecified: 0, serializing: 0, posting: 0 }
  })

  const record = (mode: TimingMode, start: number, end: number) =>
    Ref.update(ref, ({ lastTime, totals }) => ({
      lastTime: end,
      totals: {
        ...totals,
        unspecified: totals.unspecified + (start - lastTime),
        [mode]: totals[mode] + (end - start)
      }
    }))

  const mode: TimingsService["mode"] = (mode) => (self) =>
    Effect.gen(function*() {
      const start = yield* Clock.currentTimeMillis
      const result = yield* self
      const end = yield* Clock.currentTimeMillis
      yield* record(mode, start, end)
      return result
    })

  const snapshot = Effect.map(Ref.get(ref), (state) => state.totals)

  const log = Effect.flatMap(snapshot, (totals) => Effect.logInfo(format(totals)))

  return { mode, snapshot, log } satisfies TimingsService
})

// =============================================================================
// Layers
// =============================================================================

export const layer: Layer.Layer<Timings> = Layer.effect(Timings, make)
