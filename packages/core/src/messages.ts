/**
 * This module contains the message types read from the input stream.
 *
 * Each input line is a JSON document whose `type` field selects one of four
 * messages:
 * - SCHEMA: declares the schema and key properties of a stream
 * - RECORD: a row to upsert into a stream, optionally bound to a table version
 * - ACTIVATE_VERSION: switches a stream over to a table version
 * - STATE: an opaque checkpoint value to echo once preceding data is delivered
 *
 * The wire `type` field is decoded into `_tag`, so messages can be matched
 * exhaustively with a `switch`.
 *
 * @module
 */
import * as Effect from "effect/Effect"
import * as Schema from "effect/Schema"
import { MessageParseError } from "./errors.ts"

// =============================================================================
// Shared Schemas
// =============================================================================

/**
 * An arbitrary JSON object, used for record payloads and JSON schema documents.
 */
export const JsonObject = Schema.Record({
  key: Schema.String,
  value: Schema.Unknown
}).annotations({ identifier: "JsonObject" })
export type JsonObject = typeof JsonObject.Type

const MessageType = <Type extends string>(type: Type) =>
  Schema.Literal(type).pipe(
    Schema.propertySignature,
    Schema.fromKey("type")
  )

// =============================================================================
// Messages
// =============================================================================

export const SchemaMessage = Schema.Struct({
  _tag: MessageType("SCHEMA"),
  stream: Schema.String,
  schema: JsonObject,
  keyProperties: Schema.Array(Schema.String).pipe(
    Schema.propertySignature,
    Schema.fromKey("key_properties")
  )
}).annotations({
  identifier: "SchemaMessage",
  description: "Declares the schema and key properties of a stream"
})
export type SchemaMessage = typeof SchemaMessage.Type

export const RecordMessage = Schema.Struct({
  _tag: MessageType("RECORD"),
  stream: Schema.String,
  record: JsonObject,
  version: Schema.optionalWith(Schema.Int, { nullable: true })
}).annotations({
  identifier: "RecordMessage",
  description: "A row to upsert into a stream"
})
export type RecordMessage = typeof RecordMessage.Type

export const ActivateVersionMessage = Schema.Struct({
  _tag: MessageType("ACTIVATE_VERSION"),
  stream: Schema.String,
  version: Schema.Int
}).annotations({
  identifier: "ActivateVersionMessage",
  description: "Switches a stream over to a table version"
})
export type ActivateVersionMessage = typeof ActivateVersionMessage.Type

export const StateMessage = Schema.Struct({
  _tag: MessageType("STATE"),
  value: Schema.Unknown
}).annotations({
  identifier: "StateMessage",
  description: "A checkpoint value to emit after the data preceding it"
})
export type StateMessage = typeof StateMessage.Type

export const Message = Schema.Union(
  SchemaMessage,
  RecordMessage,
  ActivateVersionMessage,
  StateMessage
).annotations({ identifier: "Message" })
export type Message = typeof Message.Type

/**
 * The messages that are buffered and delivered as part of a batch.
 */
export type BatchMessage = RecordMessage | ActivateVersionMessage

// =============================================================================
// Constructors
// =============================================================================

export const schemaMessage = (
  stream: string,
  schema: JsonObject,
  keyProperties: ReadonlyArray<string>
): SchemaMessage => ({ _tag: "SCHEMA", stream, schema, keyProperties })

export const recordMessage = (
  stream: string,
  record: JsonObject,
  version?: number
): RecordMessage => version === undefined ? { _tag: "RECORD", stream, record } : { _tag: "RECORD", stream, record, version }

export const activateVersionMessage = (stream: string, version: number): ActivateVersionMessage => ({
  _tag: "ACTIVATE_VERSION",
  stream,
  version
})

export const stateMessage = (value: unknown): StateMessage => ({ _tag: "STATE", value })

// =============================================================================
// Encoding / Decoding
// =============================================================================

const MessageFromJson = Schema.parseJson(Message)

// A missing key is an error, even where the field's schema admits `undefined`
const decodeLine = Schema.decode(MessageFromJson, { exact: true })
const encodeLine = Schema.encodeSync(MessageFromJson)

/**
 * Decodes one input line into a message.
 */
export const parseMessage = (line: string): Effect.Effect<Message, MessageParseError> =>
  decodeLine(line).pipe(
    Effect.mapError((cause) =>
      new MessageParseError({
        message: `Unable to parse message: ${cause.message}`,
        line,
        cause
      })
    )
  )

/**
 * Encodes a message back into its wire form, as a single JSON line.
 */
export const formatMessage = (message: Message): string => encodeLine(message)

/**
 * Size in bytes of a line as counted against the batch byte limit.
 */
export const lineByteLength = (line: string): number => Buffer.byteLength(line, "utf8")
