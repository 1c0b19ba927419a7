/**
 * Error types for the batch pipeline.
 *
 * Errors fall in two groups. Known errors describe an expected way for a run
 * to end (a rejected delivery, an invalid record, a batch that can never fit)
 * and are reported with their message only. Everything else is unexpected and
 * is reported with its full cause.
 *
 * @module
 */
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"

// =============================================================================
// Input Errors
// =============================================================================

/**
 * A line of input could not be decoded into a message.
 */
export class MessageParseError extends Schema.TaggedError<MessageParseError>(
  "BatchTarget/MessageParseError"
)("MessageParseError", {
  message: Schema.String,
  line: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {}

/**
 * A record or version switch was buffered for a stream that never received a
 * schema message.
 */
export class MissingSchemaError extends Schema.TaggedError<MissingSchemaError>(
  "BatchTarget/MissingSchemaError"
)("MissingSchemaError", {
  message: Schema.String,
  stream: Schema.String
}) {}

// =============================================================================
// Serialization Errors
// =============================================================================

/**
 * A single message serializes to a request body at or above the size limit,
 * so no split of the batch can make it fit.
 */
export class BatchTooLargeError extends Schema.TaggedError<BatchTooLargeError>(
  "BatchTarget/BatchTooLargeError"
)("BatchTooLargeError", {
  message: Schema.String,
  stream: Schema.String,
  maxBytes: Schema.Int,
  size: Schema.Int
}) {}

// =============================================================================
// Delivery Errors
// =============================================================================

/**
 * A delivery attempt that may succeed when repeated: the connection failed or
 * the server answered with a non-client error status.
 *
 * Never leaves the remote sink. Once the retry budget is spent it is turned
 * into a {@link DeliveryRejectedError} or a {@link DeliveryConnectionError}.
 */
export class DeliveryTransportError extends Schema.TaggedError<DeliveryTransportError>(
  "BatchTarget/DeliveryTransportError"
)("DeliveryTransportError", {
  message: Schema.String,
  status: Schema.optionalWith(Schema.Int, { as: "Option" }),
  cause: Schema.optionalWith(Schema.Defect, { as: "Option" })
}) {}

/**
 * The remote endpoint refused a request body. Client errors (4xx) end up here
 * without a retry; server errors end up here after the last attempt.
 */
export class DeliveryRejectedError extends Schema.TaggedError<DeliveryRejectedError>(
  "BatchTarget/DeliveryRejectedError"
)("DeliveryRejectedError", {
  message: Schema.String,
  status: Schema.Int
}) {}

/**
 * The remote endpoint could not be reached within the retry budget.
 */
export class DeliveryConnectionError extends Schema.TaggedError<DeliveryConnectionError>(
  "BatchTarget/DeliveryConnectionError"
)("DeliveryConnectionError", {
  message: Schema.String,
  url: Schema.String
}) {}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * A record does not match the schema declared for its stream.
 */
export class SchemaValidationError extends Schema.TaggedError<SchemaValidationError>(
  "BatchTarget/SchemaValidationError"
)("SchemaValidationError", {
  message: Schema.String,
  stream: Schema.String,
  index: Schema.optional(Schema.Int)
}) {}

/**
 * A record lacks one of the key properties declared for its stream.
 */
export class MissingKeyPropertyError extends Schema.TaggedError<MissingKeyPropertyError>(
  "BatchTarget/MissingKeyPropertyError"
)("MissingKeyPropertyError", {
  message: Schema.String,
  stream: Schema.String,
  index: Schema.Int,
  property: Schema.String
}) {}

// =============================================================================
// Output Errors
// =============================================================================

/**
 * Writing a line to the checkpoint stream or to an output file failed.
 */
export class OutputWriteError extends Schema.TaggedError<OutputWriteError>(
  "BatchTarget/OutputWriteError"
)("OutputWriteError", {
  message: Schema.String,
  target: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * The configuration file is missing, unreadable or incomplete.
 */
export class ConfigError extends Schema.TaggedError<ConfigError>(
  "BatchTarget/ConfigError"
)("ConfigError", {
  message: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {}

// =============================================================================
// Known Errors
// =============================================================================

/**
 * Errors that end a run with a one-line summary instead of a full report.
 */
export type KnownError =
  | BatchTooLargeError
  | ConfigError
  | DeliveryConnectionError
  | DeliveryRejectedError
  | MissingKeyPropertyError
  | MissingSchemaError
  | SchemaValidationError

const knownTags: ReadonlyArray<KnownError["_tag"]> = [
  "BatchTooLargeError",
  "ConfigError",
  "DeliveryConnectionError",
  "DeliveryRejectedError",
  "MissingKeyPropertyError",
  "MissingSchemaError",
  "SchemaValidationError"
]

export const isKnownError = (u: unknown): u is KnownError =>
  knownTags.some((tag) => Predicate.isTagged(u, tag))
