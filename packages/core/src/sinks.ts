export { type Batch, type BatchSink, type SinkError } from "./sinks/sink.ts"

// =============================================================================
// Remote Sink
// =============================================================================

export * as RemoteSink from "./sinks/remote.ts"

// =============================================================================
// Local File Sink
// =============================================================================

export * as LocalFileSink from "./sinks/local-file.ts"

// =============================================================================
// Validating Sink
// =============================================================================

export * as ValidatingSink from "./sinks/validating.ts"
