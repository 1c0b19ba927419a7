/**
 * Line-oriented output targets.
 *
 * A {@link LineWriter} appends newline-terminated lines and only completes once
 * the underlying transport has accepted the line. The engine writes checkpoints
 * through the {@link CheckpointWriter} service; the local file sink writes
 * request bodies through a writer opened for the lifetime of a run.
 *
 * @module
 */
import * as FileSystem from "@effect/platform/FileSystem"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Ref from "effect/Ref"
import type * as Scope from "effect/Scope"
import { OutputWriteError } from "./errors.ts"

// =============================================================================
// Service Interface
// =============================================================================

export interface LineWriter {
  /**
   * A name for the target, used in log lines and errors.
   */
  readonly target: string

  /**
   * Writes the line followed by a newline.
   */
  readonly write: (line: string) => Effect.Effect<void, OutputWriteError>
}

/**
 * The output that emitted checkpoints are written to.
 */
export class CheckpointWriter extends Context.Tag("BatchTarget/CheckpointWriter")<
  CheckpointWriter,
  LineWriter
>() {}

// =============================================================================
// Implementations
// =============================================================================

/**
 * Writes to a Node.js writable stream, waiting for the write callback.
 */
export const fromWritable = (
  target: string,
  evaluate: () => NodeJS.WritableStream
): LineWriter => ({
  target,
  write: (line) =>
    Effect.async<void, OutputWriteError>((resume) => {
      evaluate().write(`${line}\n`, (error) => {
        resume(
          error === null || error === undefined
            ? Effect.void
            : Effect.fail(
              new OutputWriteError({
                message: `Failed to write to ${target}: ${error.message}`,
                target,
                cause: error
              })
            )
        )
      })
    })
})

export const stdout: LineWriter = fromWritable("stdout", () => process.stdout)

const encoder = new TextEncoder()

/**
 * Opens a file for writing, truncating it, for the lifetime of the scope.
 */
export const openFile = Effect.fnUntraced(function*(
  path: string
): Effect.fn.Return<LineWriter, OutputWriteError, FileSystem.FileSystem | Scope.Scope> {
  const fs = yield* FileSystem.FileSystem
  const file = yield* fs.open(path, { flag: "w" }).pipe(
    Effect.mapError((cause) =>
      new OutputWriteError({
        message: `Failed to open ${path}: ${cause.message}`,
        target: path,
        cause
      })
    )
  )

  return {
    target: path,
    write: (line) =>
      file.writeAll(encoder.encode(`${line}\n`)).pipe(
        Effect.mapError((cause) =>
          new OutputWriteError({
            message: `Failed to write to ${path}: ${cause.message}`,
            target: path,
            cause
          })
        )
      )
  }
})

// =============================================================================
// Layers
// =============================================================================

/**
 * Layer writing checkpoints to the process standard output.
 */
export const layerStdout: Layer.Layer<CheckpointWriter> = Layer.succeed(CheckpointWriter, stdout)

// =============================================================================
// Testing Utilities
// =============================================================================

/**
 * Creates a writer that collects lines in memory, returning the writer and an
 * effect reading the lines written so far.
 */
export const makeMemory = (target = "memory") =>
  Effect.gen(function*() {
    const ref = yield* Ref.make<ReadonlyArray<string>>([])
    const writer: LineWriter = {
      target,
      write: (line) => Ref.update(ref, (lines) => [...lines, line])
    }
    return { writer, lines: Ref.get(ref) } as const
  })

/**
 * Service tag exposing the lines written to a test checkpoint writer.
 *
 * Provided alongside `CheckpointWriter` by {@link layerTest}.
 *
 * @example
 * ```typescript
 * const written = yield* LineWriter.TestLines
 * expect(yield* written.lines).toEqual(["{\"bookmark\":1}"])
 * ```
 */
export class TestLines extends Context.Tag("BatchTarget/LineWriter/TestLines")<
  TestLines,
  { readonly lines: Effect.Effect<ReadonlyArray<string>> }
>() {}

/**
 * Test layer providing an in-memory `CheckpointWriter` and `TestLines`.
 */
export const layerTest: Layer.Layer<CheckpointWriter | TestLines> = Layer.effectContext(
  Effect.map(makeMemory("checkpoints"), ({ lines, writer }) =>
    Context.make(CheckpointWriter, writer).pipe(
      Context.add(TestLines, TestLines.of({ lines }))
    ))
)
