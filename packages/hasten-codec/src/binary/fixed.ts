// Fixed-width binary primitives.
//
// Every number is written at its natural width in little-endian order.
// Variable-length data (strings, bytes, sequence counts) carries a u32
// little-endian length prefix, the same convention frames use.

import { DecodeError } from "../errors.ts";
import { concat, utf8Decode, utf8Encode } from "./bytes.ts";

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

const U64_MAX = 0xffff_ffff_ffff_ffffn;
const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

function checkInteger(value: number, min: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${what}: ${value} is outside [${min}, ${max}]`);
  }
}

function checkBigInt(value: bigint, min: bigint, max: bigint, what: string): void {
  if (value < min || value > max) {
    throw new RangeError(`${what}: ${value} is outside [${min}, ${max}]`);
  }
}

function fixed(size: number, write: (view: DataView) => void): Uint8Array {
  const out = new Uint8Array(size);
  write(new DataView(out.buffer));
  return out;
}

function viewAt(buf: Uint8Array, offset: number, size: number, what: string): DataView {
  if (offset + size > buf.length) {
    throw DecodeError.eof(what, offset, size, Math.max(0, buf.length - offset));
  }
  return new DataView(buf.buffer, buf.byteOffset + offset, size);
}

// ============================================================================
// Booleans and integers
// ============================================================================

/** Encode a boolean (1 byte: 0x00 or 0x01). */
export function encodeBool(value: boolean): Uint8Array {
  return Uint8Array.of(value ? 1 : 0);
}

/** Decode a boolean; any byte other than 0 or 1 is invalid. */
export function decodeBool(buf: Uint8Array, offset: number): DecodeResult<boolean> {
  const byte = viewAt(buf, offset, 1, "bool").getUint8(0);
  if (byte > 1) throw DecodeError.invalid(`bool: invalid byte 0x${byte.toString(16)}`, offset);
  return { value: byte === 1, next: offset + 1 };
}

export function encodeU8(value: number): Uint8Array {
  checkInteger(value, 0, 0xff, "u8");
  return Uint8Array.of(value);
}

export function decodeU8(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 1, "u8").getUint8(0), next: offset + 1 };
}

export function encodeI8(value: number): Uint8Array {
  checkInteger(value, -0x80, 0x7f, "i8");
  return fixed(1, (v) => v.setInt8(0, value));
}

export function decodeI8(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 1, "i8").getInt8(0), next: offset + 1 };
}

export function encodeU16(value: number): Uint8Array {
  checkInteger(value, 0, 0xffff, "u16");
  return fixed(2, (v) => v.setUint16(0, value, true));
}

export function decodeU16(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 2, "u16").getUint16(0, true), next: offset + 2 };
}

export function encodeI16(value: number): Uint8Array {
  checkInteger(value, -0x8000, 0x7fff, "i16");
  return fixed(2, (v) => v.setInt16(0, value, true));
}

export function decodeI16(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 2, "i16").getInt16(0, true), next: offset + 2 };
}

export function encodeU32(value: number): Uint8Array {
  checkInteger(value, 0, 0xffff_ffff, "u32");
  return fixed(4, (v) => v.setUint32(0, value, true));
}

export function decodeU32(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 4, "u32").getUint32(0, true), next: offset + 4 };
}

export function encodeI32(value: number): Uint8Array {
  checkInteger(value, -0x8000_0000, 0x7fff_ffff, "i32");
  return fixed(4, (v) => v.setInt32(0, value, true));
}

export function decodeI32(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 4, "i32").getInt32(0, true), next: offset + 4 };
}

export function encodeU64(value: bigint): Uint8Array {
  checkBigInt(value, 0n, U64_MAX, "u64");
  return fixed(8, (v) => v.setBigUint64(0, value, true));
}

export function decodeU64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return { value: viewAt(buf, offset, 8, "u64").getBigUint64(0, true), next: offset + 8 };
}

export function encodeI64(value: bigint): Uint8Array {
  checkBigInt(value, I64_MIN, I64_MAX, "i64");
  return fixed(8, (v) => v.setBigInt64(0, value, true));
}

export function decodeI64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return { value: viewAt(buf, offset, 8, "i64").getBigInt64(0, true), next: offset + 8 };
}

// ============================================================================
// Floats (IEEE 754)
// ============================================================================

export function encodeF32(value: number): Uint8Array {
  return fixed(4, (v) => v.setFloat32(0, value, true));
}

export function decodeF32(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 4, "f32").getFloat32(0, true), next: offset + 4 };
}

export function encodeF64(value: number): Uint8Array {
  return fixed(8, (v) => v.setFloat64(0, value, true));
}

export function decodeF64(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 8, "f64").getFloat64(0, true), next: offset + 8 };
}

// ============================================================================
// Length-prefixed data
// ============================================================================

/** Encode a sequence length or element count (u32 LE). */
export function encodeLength(length: number): Uint8Array {
  return encodeU32(length);
}

/** Most items a sequence may hold when its items encode to zero bytes. */
export const MAX_ZERO_SIZE_ITEMS = 0x1_0000;

/**
 * Decode a length prefix and check that `length * minItemSize` bytes remain.
 *
 * Rejecting impossible lengths up front keeps a corrupt prefix from
 * driving a huge allocation or loop. Zero-size items take no bytes, so
 * their count is capped at MAX_ZERO_SIZE_ITEMS instead.
 */
export function decodeLength(
  buf: Uint8Array,
  offset: number,
  what: string,
  minItemSize = 1,
): DecodeResult<number> {
  const len = decodeU32(buf, offset);
  if (minItemSize === 0 && len.value > MAX_ZERO_SIZE_ITEMS) {
    throw DecodeError.range(
      `${what}: ${len.value} zero-size items exceeds the limit of ${MAX_ZERO_SIZE_ITEMS}`,
      offset,
    );
  }
  const remaining = buf.length - len.next;
  if (len.value * minItemSize > remaining) {
    throw DecodeError.range(
      `${what}: length ${len.value} exceeds the ${remaining} remaining bytes`,
      offset,
    );
  }
  return len;
}

/** Encode a string (u32 length + UTF-8 bytes). */
export function encodeString(value: string): Uint8Array {
  const bytes = utf8Encode(value);
  return concat(encodeLength(bytes.length), bytes);
}

/** Decode a string; malformed UTF-8 is invalid. */
export function decodeString(buf: Uint8Array, offset: number): DecodeResult<string> {
  const len = decodeLength(buf, offset, "string");
  const end = len.next + len.value;
  try {
    return { value: utf8Decode(buf.subarray(len.next, end)), next: end };
  } catch {
    throw DecodeError.invalid("string: malformed UTF-8", len.next);
  }
}

/** Encode bytes (u32 length + raw bytes). */
export function encodeBytes(value: Uint8Array): Uint8Array {
  return concat(encodeLength(value.length), value);
}

/** Decode bytes. The result is a copy, not a view into `buf`. */
export function decodeBytes(buf: Uint8Array, offset: number): DecodeResult<Uint8Array> {
  const len = decodeLength(buf, offset, "bytes");
  const end = len.next + len.value;
  return { value: buf.slice(len.next, end), next: end };
}
