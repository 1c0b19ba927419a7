/**
 * The input message model and its line parser.
 */
export * as Messages from "./messages.ts"

/**
 * Buffers messages into batches and emits checkpoints after delivery.
 */
export * as BatchEngine from "./engine.ts"

/**
 * Splits batches into size-bounded request bodies.
 */
export * as Serializer from "./serializer.ts"

/**
 * Delivery sinks: remote import API, local file and schema validation.
 */
export * as Sinks from "./sinks.ts"

/**
 * Newline-delimited output targets, including the checkpoint writer.
 */
export * as LineWriter from "./line-writer.ts"

/**
 * Per-phase timing instrumentation.
 */
export * as Timings from "./timings.ts"

/**
 * The configuration file model.
 */
export * as Config from "./config.ts"

/**
 * Exact decimal helpers for numeric validation.
 */
export * as Decimal from "./decimal.ts"

/**
 * Tagged errors raised by the pipeline.
 */
export * as Errors from "./errors.ts"
