// Binary codec for hasten payloads.
//
// Fixed-width little-endian primitives plus a schema-driven codec for
// composite values.

export { DecodeError, EncodeError, type DecodeErrorKind } from "./errors.ts";
export { concat, compareBytes, hexWindow, utf8Decode, utf8Encode } from "./binary/bytes.ts";
export * from "./binary/fixed.ts";
export * from "./schema.ts";
export { decodeValue, decodeWithSchema, encodeValue, encodeWithSchema } from "./schema_codec.ts";
