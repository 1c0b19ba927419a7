import * as Schema from "effect/Schema"

/**
 * Reading the standard input stream failed.
 */
export class InputReadError extends Schema.TaggedError<InputReadError>(
  "BatchTarget/InputReadError"
)("InputReadError", {
  message: Schema.String,
  cause: Schema.optional(Schema.Defect)
}) {}
