// Schema-driven encoding/decoding.
//
// Values are plain JS data checked against a runtime schema: numbers for
// 8..32-bit integers and floats, bigint for 64-bit integers, string,
// Uint8Array, arrays, Map, objects for structs and `{ tag, ... }` for enums.

import { DecodeError, EncodeError } from "./errors.ts";
import { compareBytes, concat } from "./binary/bytes.ts";
import {
  type DecodeResult,
  decodeBool,
  decodeBytes,
  decodeF32,
  decodeF64,
  decodeI16,
  decodeI32,
  decodeI64,
  decodeI8,
  decodeLength,
  decodeString,
  decodeU16,
  decodeU32,
  decodeU64,
  decodeU8,
  encodeBool,
  encodeBytes,
  encodeF32,
  encodeF64,
  encodeI16,
  encodeI32,
  encodeI64,
  encodeI8,
  encodeLength,
  encodeString,
  encodeU16,
  encodeU32,
  encodeU64,
  encodeU8,
} from "./binary/fixed.ts";
import type {
  EnumSchema,
  EnumValue,
  MapSchema,
  OptionSchema,
  Schema,
  SchemaRegistry,
  StructSchema,
  TupleSchema,
  VecSchema,
} from "./schema.ts";
import {
  describeSchema,
  findVariantByDiscriminant,
  findVariantByName,
  getVariantDiscriminant,
  getVariantFieldNames,
  getVariantFieldSchemas,
  isNewtypeVariant,
  minEncodedSize,
  resolveSchema,
} from "./schema.ts";

// ============================================================================
// Path tracking
// ============================================================================

/** Position inside the schema, rendered as "items.[2].name". */
class SchemaPath {
  private segments: string[] = [];

  push(segment: string): void {
    this.segments.push(segment);
  }

  pop(): void {
    this.segments.pop();
  }

  toString(): string {
    return this.segments.length === 0 ? "<root>" : this.segments.join(".");
  }
}

// ============================================================================
// Value guards
// ============================================================================

function isBoolean(v: unknown): v is boolean {
  return typeof v === "boolean";
}

function isNumber(v: unknown): v is number {
  return typeof v === "number";
}

function isBigInt(v: unknown): v is bigint {
  return typeof v === "bigint";
}

function isString(v: unknown): v is string {
  return typeof v === "string";
}

function isBytes(v: unknown): v is Uint8Array {
  return v instanceof Uint8Array;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Map);
}

function isEnumValue(v: unknown): v is EnumValue {
  return isRecord(v) && typeof v.tag === "string";
}

function describeValue(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  if (v instanceof Uint8Array) return "Uint8Array";
  if (v instanceof Map) return "Map";
  return typeof v;
}

function mismatch(expected: string, value: unknown, path: SchemaPath): EncodeError {
  return new EncodeError(`expected ${expected}, got ${describeValue(value)}`, path.toString());
}

function primitive<T>(
  value: unknown,
  guard: (v: unknown) => v is T,
  expected: string,
  encode: (v: T) => Uint8Array,
  path: SchemaPath,
): Uint8Array {
  if (!guard(value)) {
    throw mismatch(expected, value, path);
  }
  try {
    return encode(value);
  } catch (e) {
    if (e instanceof RangeError) {
      throw new EncodeError(e.message, path.toString());
    }
    throw e;
  }
}

// ============================================================================
// Schema-driven Encoding
// ============================================================================

/**
 * Encode a value according to its schema.
 *
 * @throws EncodeError if the value does not have the schema's shape
 */
export function encodeWithSchema(
  value: unknown,
  schema: Schema,
  registry?: SchemaRegistry,
): Uint8Array {
  return encodeImpl(value, schema, registry, new SchemaPath());
}

/** Encode a complete top-level value. */
export function encodeValue(value: unknown, schema: Schema, registry?: SchemaRegistry): Uint8Array {
  return encodeWithSchema(value, schema, registry);
}

function encodeImpl(
  value: unknown,
  schema: Schema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  const resolved = resolveSchema(schema, registry);

  switch (resolved.kind) {
    // Primitives
    case "bool":
      return primitive(value, isBoolean, "boolean", encodeBool, path);
    case "u8":
      return primitive(value, isNumber, "number", encodeU8, path);
    case "i8":
      return primitive(value, isNumber, "number", encodeI8, path);
    case "u16":
      return primitive(value, isNumber, "number", encodeU16, path);
    case "i16":
      return primitive(value, isNumber, "number", encodeI16, path);
    case "u32":
      return primitive(value, isNumber, "number", encodeU32, path);
    case "i32":
      return primitive(value, isNumber, "number", encodeI32, path);
    case "u64":
      return primitive(value, isBigInt, "bigint", encodeU64, path);
    case "i64":
      return primitive(value, isBigInt, "bigint", encodeI64, path);
    case "f32":
      return primitive(value, isNumber, "number", encodeF32, path);
    case "f64":
      return primitive(value, isNumber, "number", encodeF64, path);
    case "string":
      return primitive(value, isString, "string", encodeString, path);
    case "bytes":
      return primitive(value, isBytes, "Uint8Array", encodeBytes, path);

    // Containers
    case "vec":
      return encodeVec(value, resolved, registry, path);
    case "option":
      return encodeOption(value, resolved, registry, path);
    case "map":
      return encodeMap(value, resolved, registry, path);

    // Composites
    case "struct":
      return encodeStruct(value, resolved, registry, path);
    case "tuple":
      return encodeTuple(value, resolved, registry, path);
    case "enum":
      return encodeEnum(value, resolved, registry, path);

    // resolveSchema never returns a ref
    case "ref":
      throw new Error(`Unresolved ref: ${resolved.name}`);
  }
}

function encodeVec(
  value: unknown,
  schema: VecSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  if (!Array.isArray(value)) {
    throw mismatch("array", value, path);
  }
  const parts: Uint8Array[] = [encodeLength(value.length)];
  value.forEach((item: unknown, i) => {
    path.push(`[${i}]`);
    parts.push(encodeImpl(item, schema.element, registry, path));
    path.pop();
  });
  return concat(...parts);
}

function encodeOption(
  value: unknown,
  schema: OptionSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  if (value === null || value === undefined) {
    return Uint8Array.of(0);
  }
  path.push("Some");
  const inner = encodeImpl(value, schema.inner, registry, path);
  path.pop();
  return concat(Uint8Array.of(1), inner);
}

function encodeMap(
  value: unknown,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  if (!(value instanceof Map)) {
    throw mismatch("Map", value, path);
  }
  const entries: Array<{ key: Uint8Array; value: Uint8Array }> = [];
  let i = 0;
  for (const [k, v] of value) {
    path.push(`{key ${i}}`);
    const key = encodeImpl(k, schema.key, registry, path);
    path.pop();
    path.push(`{value ${i}}`);
    entries.push({ key, value: encodeImpl(v, schema.value, registry, path) });
    path.pop();
    i++;
  }

  // Sorting by encoded key makes equal maps encode identically.
  entries.sort((a, b) => compareBytes(a.key, b.key));
  for (let j = 1; j < entries.length; j++) {
    if (compareBytes(entries[j - 1].key, entries[j].key) === 0) {
      throw new EncodeError("map has two keys with the same encoding", path.toString());
    }
  }

  const parts: Uint8Array[] = [encodeLength(entries.length)];
  for (const entry of entries) {
    parts.push(entry.key, entry.value);
  }
  return concat(...parts);
}

function encodeStruct(
  value: unknown,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  if (!isRecord(value)) {
    throw mismatch(describeSchema(schema), value, path);
  }
  const parts: Uint8Array[] = [];
  // Encode fields in schema order (Object.entries preserves insertion order)
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    path.push(fieldName);
    parts.push(encodeImpl(value[fieldName], fieldSchema, registry, path));
    path.pop();
  }
  return concat(...parts);
}

function encodeTuple(
  value: unknown,
  schema: TupleSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  if (!Array.isArray(value)) {
    throw mismatch("array", value, path);
  }
  if (value.length !== schema.elements.length) {
    throw new EncodeError(
      `tuple length mismatch: got ${value.length}, expected ${schema.elements.length}`,
      path.toString(),
    );
  }
  const parts: Uint8Array[] = [];
  schema.elements.forEach((elementSchema, i) => {
    path.push(`${i}`);
    parts.push(encodeImpl(value[i], elementSchema, registry, path));
    path.pop();
  });
  return concat(...parts);
}

function encodeEnum(
  value: unknown,
  schema: EnumSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): Uint8Array {
  if (!isEnumValue(value)) {
    throw mismatch("{ tag: string }", value, path);
  }
  const variant = findVariantByName(schema, value.tag);
  if (!variant) {
    throw new EncodeError(`unknown variant "${value.tag}"`, path.toString());
  }

  const parts: Uint8Array[] = [encodeU32(getVariantDiscriminant(schema, variant))];
  const fieldSchemas = getVariantFieldSchemas(variant);
  const fieldNames = getVariantFieldNames(variant);

  path.push(variant.name);
  if (fieldSchemas.length === 0) {
    // Unit variant
  } else if (isNewtypeVariant(variant)) {
    path.push("value");
    parts.push(encodeImpl(value.value, fieldSchemas[0], registry, path));
    path.pop();
  } else {
    // Tuple variants are keyed "0", "1", ...; struct variants by field name.
    const keys = fieldNames ?? fieldSchemas.map((_, i) => `${i}`);
    keys.forEach((key, i) => {
      path.push(key);
      parts.push(encodeImpl(value[key], fieldSchemas[i], registry, path));
      path.pop();
    });
  }
  path.pop();

  return concat(...parts);
}

// ============================================================================
// Schema-driven Decoding
// ============================================================================

/**
 * Decode a value starting at `offset`; trailing bytes are left for the caller.
 *
 * @throws DecodeError carrying the schema path and byte offset of the failure
 */
export function decodeWithSchema(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry?: SchemaRegistry,
): DecodeResult<unknown> {
  return decodeImpl(buf, offset, schema, registry, new SchemaPath());
}

/**
 * Decode a complete top-level value.
 *
 * @throws DecodeError if the bytes are malformed or not fully consumed
 */
export function decodeValue(buf: Uint8Array, schema: Schema, registry?: SchemaRegistry): unknown {
  const result = decodeWithSchema(buf, 0, schema, registry);
  if (result.next !== buf.length) {
    throw DecodeError.trailing(result.next, buf.length);
  }
  return result.value;
}

function decodeImpl(
  buf: Uint8Array,
  offset: number,
  schema: Schema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<unknown> {
  const resolved = resolveSchema(schema, registry);

  try {
    switch (resolved.kind) {
      // Primitives
      case "bool":
        return decodeBool(buf, offset);
      case "u8":
        return decodeU8(buf, offset);
      case "i8":
        return decodeI8(buf, offset);
      case "u16":
        return decodeU16(buf, offset);
      case "i16":
        return decodeI16(buf, offset);
      case "u32":
        return decodeU32(buf, offset);
      case "i32":
        return decodeI32(buf, offset);
      case "u64":
        return decodeU64(buf, offset);
      case "i64":
        return decodeI64(buf, offset);
      case "f32":
        return decodeF32(buf, offset);
      case "f64":
        return decodeF64(buf, offset);
      case "string":
        return decodeString(buf, offset);
      case "bytes":
        return decodeBytes(buf, offset);

      // Containers
      case "vec":
        return decodeVec(buf, offset, resolved, registry, path);
      case "option":
        return decodeOption(buf, offset, resolved, registry, path);
      case "map":
        return decodeMap(buf, offset, resolved, registry, path);

      // Composites
      case "struct":
        return decodeStruct(buf, offset, resolved, registry, path);
      case "tuple":
        return decodeTuple(buf, offset, resolved, registry, path);
      case "enum":
        return decodeEnum(buf, offset, resolved, registry, path);

      case "ref":
        throw new Error(`Unresolved ref: ${resolved.name}`);
    }
  } catch (e) {
    // The innermost frame attaches the path; outer frames pass it through.
    if (e instanceof DecodeError && e.path === null) {
      throw e.withPath(path.toString());
    }
    throw e;
  }
}

function decodeVec(
  buf: Uint8Array,
  offset: number,
  schema: VecSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<unknown[]> {
  const len = decodeLength(buf, offset, "vec", minEncodedSize(schema.element, registry));
  let pos = len.next;
  const items: unknown[] = [];
  for (let i = 0; i < len.value; i++) {
    path.push(`[${i}]`);
    const item = decodeImpl(buf, pos, schema.element, registry, path);
    items.push(item.value);
    pos = item.next;
    path.pop();
  }
  return { value: items, next: pos };
}

function decodeOption(
  buf: Uint8Array,
  offset: number,
  schema: OptionSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<unknown> {
  const tag = decodeU8(buf, offset);
  if (tag.value === 0) {
    return { value: null, next: tag.next };
  }
  if (tag.value !== 1) {
    throw DecodeError.invalid(`option: invalid tag ${tag.value} (expected 0 or 1)`, offset);
  }
  path.push("Some");
  const inner = decodeImpl(buf, tag.next, schema.inner, registry, path);
  path.pop();
  return inner;
}

function decodeMap(
  buf: Uint8Array,
  offset: number,
  schema: MapSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<Map<unknown, unknown>> {
  const entrySize = minEncodedSize(schema.key, registry) + minEncodedSize(schema.value, registry);
  const len = decodeLength(buf, offset, "map", entrySize);
  let pos = len.next;
  const map = new Map<unknown, unknown>();
  for (let i = 0; i < len.value; i++) {
    path.push(`{key ${i}}`);
    const k = decodeImpl(buf, pos, schema.key, registry, path);
    path.pop();
    path.push(`{value ${i}}`);
    const v = decodeImpl(buf, k.next, schema.value, registry, path);
    path.pop();
    map.set(k.value, v.value);
    pos = v.next;
  }
  return { value: map, next: pos };
}

function decodeStruct(
  buf: Uint8Array,
  offset: number,
  schema: StructSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<Record<string, unknown>> {
  const obj: Record<string, unknown> = {};
  let pos = offset;
  for (const [fieldName, fieldSchema] of Object.entries(schema.fields)) {
    path.push(fieldName);
    const field = decodeImpl(buf, pos, fieldSchema, registry, path);
    obj[fieldName] = field.value;
    pos = field.next;
    path.pop();
  }
  return { value: obj, next: pos };
}

function decodeTuple(
  buf: Uint8Array,
  offset: number,
  schema: TupleSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<unknown[]> {
  const values: unknown[] = [];
  let pos = offset;
  schema.elements.forEach((elementSchema, i) => {
    path.push(`${i}`);
    const element = decodeImpl(buf, pos, elementSchema, registry, path);
    values.push(element.value);
    pos = element.next;
    path.pop();
  });
  return { value: values, next: pos };
}

function decodeEnum(
  buf: Uint8Array,
  offset: number,
  schema: EnumSchema,
  registry: SchemaRegistry | undefined,
  path: SchemaPath,
): DecodeResult<EnumValue> {
  const disc = decodeU32(buf, offset);
  const variant = findVariantByDiscriminant(schema, disc.value);
  if (!variant) {
    throw DecodeError.invalid(
      `unknown enum discriminant ${disc.value} for ${describeSchema(schema)}`,
      offset,
    );
  }

  path.push(variant.name);
  let pos = disc.next;
  const result: EnumValue = { tag: variant.name };
  const fieldSchemas = getVariantFieldSchemas(variant);
  const fieldNames = getVariantFieldNames(variant);

  if (fieldSchemas.length === 0) {
    // Unit variant
  } else if (isNewtypeVariant(variant)) {
    path.push("value");
    const field = decodeImpl(buf, pos, fieldSchemas[0], registry, path);
    result.value = field.value;
    pos = field.next;
    path.pop();
  } else {
    const keys = fieldNames ?? fieldSchemas.map((_, i) => `${i}`);
    keys.forEach((key, i) => {
      path.push(key);
      const field = decodeImpl(buf, pos, fieldSchemas[i], registry, path);
      result[key] = field.value;
      pos = field.next;
      path.pop();
    });
  }
  path.pop();

  return { value: result, next: pos };
}
