// Schema types for runtime type description and encoding/decoding.
//
// A schema describes the shape of a value so the codec can serialize it
// without generated per-type code. It supports:
// - Primitive types (bool, integers, floats, string, bytes)
// - Container types (vec, option, map)
// - Composite types (struct, enum, tuple)
// - Type references (ref) for deduplication and recursive types

// ============================================================================
// Primitive Schema Kinds
// ============================================================================

/** Primitive types with a fixed or length-prefixed encoding. */
export type PrimitiveKind =
  | "bool"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "f32"
  | "f64"
  | "string"
  | "bytes";

export interface PrimitiveSchema {
  kind: PrimitiveKind;
}

// ============================================================================
// Container Schemas
// ============================================================================

/** Schema for a sequence of elements. */
export interface VecSchema {
  kind: "vec";
  element: Schema;
}

/** Schema for an optional value (`null` when absent). */
export interface OptionSchema {
  kind: "option";
  inner: Schema;
}

/** Schema for a key/value map, decoded as a JS `Map`. */
export interface MapSchema {
  kind: "map";
  key: Schema;
  value: Schema;
}

// ============================================================================
// Composite Schemas
// ============================================================================

/** Schema for a record with named fields. */
export interface StructSchema {
  kind: "struct";
  /** Fields in declaration order. Order is significant for encoding! */
  fields: Record<string, Schema>;
}

/** Schema for a fixed-size tuple; elements are concatenated in order. */
export interface TupleSchema {
  kind: "tuple";
  elements: Schema[];
}

/**
 * A variant in an enum.
 */
export interface EnumVariant {
  /** Variant name, carried in the `tag` field of the JS value. */
  name: string;

  /**
   * Wire discriminant value.
   * If omitted, defaults to the variant's index in the variants array.
   */
  discriminant?: number;

  /**
   * Variant fields. Can be:
   * - null/undefined: unit variant (no fields)
   * - Schema: newtype variant, value in `value`
   * - Schema[]: tuple variant, values in "0", "1", ...
   * - Record<string, Schema>: struct variant (named fields, encoded in key order)
   */
  fields?: null | Schema | Schema[] | Record<string, Schema>;
}

/**
 * Enum schema with variants.
 *
 * The discriminant is encoded as a u32, followed by the variant's fields.
 */
export interface EnumSchema {
  kind: "enum";
  /** Variants in declaration order. */
  variants: EnumVariant[];
}

// ============================================================================
// Reference Schema
// ============================================================================

/**
 * Reference to a named type in a {@link SchemaRegistry}.
 *
 * Used to share one definition between several fields and to describe
 * recursive types (a tree node holding a `vec` of itself).
 */
export interface RefSchema {
  kind: "ref";
  name: string;
}

// ============================================================================
// Union Type
// ============================================================================

export type Schema =
  | PrimitiveSchema
  | VecSchema
  | OptionSchema
  | MapSchema
  | StructSchema
  | TupleSchema
  | EnumSchema
  | RefSchema;

/** Decoded JS shape of an enum value. */
export interface EnumValue {
  tag: string;
  [field: string]: unknown;
}

// ============================================================================
// Schema Registry
// ============================================================================

/** Named schemas, used to resolve {@link RefSchema} references. */
export type SchemaRegistry = Map<string, Schema>;

/**
 * Resolve one level of `ref`. The resolved schema may itself contain refs;
 * those are resolved when their fields are reached.
 *
 * @throws Error if the ref names an unknown type or no registry is given
 */
export function resolveSchema(schema: Schema, registry: SchemaRegistry | undefined): Schema {
  if (schema.kind !== "ref") {
    return schema;
  }
  if (!registry) {
    throw new Error(`Unresolved type ref "${schema.name}": no schema registry provided`);
  }
  const resolved = registry.get(schema.name);
  if (!resolved) {
    throw new Error(`Unknown type ref: ${schema.name}`);
  }
  return resolved;
}

// ============================================================================
// Enum Helper Functions
// ============================================================================

export function findVariantByDiscriminant(
  schema: EnumSchema,
  discriminant: number,
): EnumVariant | undefined {
  return schema.variants.find((v, index) => (v.discriminant ?? index) === discriminant);
}

export function findVariantByName(schema: EnumSchema, name: string): EnumVariant | undefined {
  return schema.variants.find((v) => v.name === name);
}

/** Explicit discriminant, or the variant's index. */
export function getVariantDiscriminant(schema: EnumSchema, variant: EnumVariant): number {
  if (variant.discriminant !== undefined) {
    return variant.discriminant;
  }
  const index = schema.variants.indexOf(variant);
  if (index === -1) {
    throw new Error(`Variant "${variant.name}" not found in schema`);
  }
  return index;
}

// A struct variant may have a field called "kind", but its value is a
// schema object, never a string.
function isSingleSchema(fields: Schema | Record<string, Schema>): fields is Schema {
  return typeof fields.kind === "string";
}

/** Field schemas of a variant in encoding order. */
export function getVariantFieldSchemas(variant: EnumVariant): Schema[] {
  const fields = variant.fields;
  if (fields === null || fields === undefined) {
    return [];
  }
  if (Array.isArray(fields)) {
    return fields;
  }
  if (isSingleSchema(fields)) {
    return [fields];
  }
  return Object.values(fields);
}

/** Field names of a struct variant, or null for unit, newtype and tuple variants. */
export function getVariantFieldNames(variant: EnumVariant): string[] | null {
  const fields = variant.fields;
  if (fields === null || fields === undefined || Array.isArray(fields) || isSingleSchema(fields)) {
    return null;
  }
  return Object.keys(fields);
}

export function isNewtypeVariant(variant: EnumVariant): boolean {
  const fields = variant.fields;
  return (
    fields !== null && fields !== undefined && !Array.isArray(fields) && isSingleSchema(fields)
  );
}

export function isRefSchema(schema: Schema): schema is RefSchema {
  return schema.kind === "ref";
}

// ============================================================================
// Size and description helpers
// ============================================================================

const FIXED_SIZES: Record<PrimitiveKind, number> = {
  bool: 1,
  u8: 1,
  i8: 1,
  u16: 2,
  i16: 2,
  u32: 4,
  i32: 4,
  f32: 4,
  u64: 8,
  i64: 8,
  f64: 8,
  string: 4,
  bytes: 4,
};

/**
 * Smallest number of bytes any value of this schema can encode to.
 *
 * Decoders use it to reject element counts that cannot fit in the
 * remaining input.
 */
export function minEncodedSize(
  schema: Schema,
  registry?: SchemaRegistry,
  visiting: Set<string> = new Set(),
): number {
  switch (schema.kind) {
    case "vec":
    case "map":
      return 4;
    case "option":
      return 1;
    case "enum":
      return 4;
    case "struct":
      return Object.values(schema.fields).reduce(
        (n, field) => n + minEncodedSize(field, registry, visiting),
        0,
      );
    case "tuple":
      return schema.elements.reduce(
        (n, element) => n + minEncodedSize(element, registry, visiting),
        0,
      );
    case "ref": {
      const target = registry?.get(schema.name);
      if (!target || visiting.has(schema.name)) {
        return 0;
      }
      visiting.add(schema.name);
      const size = minEncodedSize(target, registry, visiting);
      visiting.delete(schema.name);
      return size;
    }
    default:
      return FIXED_SIZES[schema.kind];
  }
}

/** Short human-readable form of a schema, for error messages. */
export function describeSchema(schema: Schema): string {
  switch (schema.kind) {
    case "enum":
      return `enum { ${schema.variants.map((v) => v.name).join(" | ")} }`;
    case "struct":
      return `struct { ${Object.keys(schema.fields).join(", ")} }`;
    case "vec":
      return `vec<${describeSchema(schema.element)}>`;
    case "option":
      return `option<${describeSchema(schema.inner)}>`;
    case "map":
      return `map<${describeSchema(schema.key)}, ${describeSchema(schema.value)}>`;
    case "tuple":
      return `(${schema.elements.map(describeSchema).join(", ")})`;
    case "ref":
      return schema.name;
    default:
      return schema.kind;
  }
}
