// Tests for schema-driven encoding/decoding

import { describe, expect, it } from "vitest";
import { DecodeError, EncodeError } from "./errors.ts";
import { decodeValue, decodeWithSchema, encodeValue } from "./schema_codec.ts";
import type { EnumSchema, Schema, SchemaRegistry, StructSchema } from "./schema.ts";
import { minEncodedSize } from "./schema.ts";

// ============================================================================
// Test Schemas
// ============================================================================

const PointSchema: StructSchema = {
  kind: "struct",
  fields: {
    x: { kind: "i32" },
    y: { kind: "i32" },
  },
};

const ValueSchema: EnumSchema = {
  kind: "enum",
  variants: [
    { name: "Int", fields: { kind: "i64" } },
    { name: "Text", fields: { kind: "string" } },
    { name: "Pair", fields: [{ kind: "u8" }, { kind: "string" }] },
    { name: "Span", fields: { start: { kind: "u16" }, end: { kind: "u16" } } },
    { name: "Nothing", discriminant: 7 },
  ],
};

const TreeSchema: StructSchema = {
  kind: "struct",
  fields: {
    value: { kind: "u8" },
    children: { kind: "vec", element: { kind: "ref", name: "Tree" } },
  },
};

const registry: SchemaRegistry = new Map<string, Schema>([["Tree", TreeSchema]]);

const bytes = (...values: number[]) => Uint8Array.from(values);

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected an exception");
}

// ============================================================================
// Encoding layout
// ============================================================================

describe("encodeValue layout", () => {
  it("encodes struct fields in declaration order without tags", () => {
    expect(Array.from(encodeValue({ y: -1, x: 1 }, PointSchema))).toEqual([
      1, 0, 0, 0, 0xff, 0xff, 0xff, 0xff,
    ]);
  });

  it("encodes a newtype variant as u32 discriminant plus value", () => {
    expect(Array.from(encodeValue({ tag: "Int", value: 5n }, ValueSchema))).toEqual([
      0, 0, 0, 0, 5, 0, 0, 0, 0, 0, 0, 0,
    ]);
  });

  it("uses explicit discriminants when given", () => {
    expect(Array.from(encodeValue({ tag: "Nothing" }, ValueSchema))).toEqual([7, 0, 0, 0]);
  });

  it("encodes option as a u8 tag", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(Array.from(encodeValue(null, schema))).toEqual([0]);
    expect(Array.from(encodeValue(5, schema))).toEqual([1, 5]);
  });

  it("sorts map entries by encoded key so insertion order does not matter", () => {
    const schema: Schema = { kind: "map", key: { kind: "string" }, value: { kind: "u8" } };
    const ba = encodeValue(
      new Map([
        ["b", 2],
        ["a", 1],
      ]),
      schema,
    );
    const ab = encodeValue(
      new Map([
        ["a", 1],
        ["b", 2],
      ]),
      schema,
    );
    expect(ba).toEqual(ab);
    expect(Array.from(ab)).toEqual([2, 0, 0, 0, 1, 0, 0, 0, 0x61, 1, 1, 0, 0, 0, 0x62, 2]);
  });
});

// ============================================================================
// Round trips
// ============================================================================

describe("decodeValue", () => {
  it("decodes every enum variant shape", () => {
    const values = [
      { tag: "Int", value: -3n },
      { tag: "Text", value: "hello" },
      { tag: "Pair", "0": 9, "1": "nine" },
      { tag: "Span", start: 2, end: 40 },
      { tag: "Nothing" },
    ];
    for (const value of values) {
      expect(decodeValue(encodeValue(value, ValueSchema), ValueSchema)).toEqual(value);
    }
  });

  it("follows refs through the registry for recursive types", () => {
    const tree = { value: 1, children: [{ value: 2, children: [] }] };
    const encoded = encodeValue(tree, TreeSchema, registry);
    expect(Array.from(encoded)).toEqual([1, 1, 0, 0, 0, 2, 0, 0, 0, 0]);
    expect(decodeValue(encoded, TreeSchema, registry)).toEqual(tree);
  });

  it("decodes maps into Map", () => {
    const schema: Schema = { kind: "map", key: { kind: "u8" }, value: { kind: "bool" } };
    const decoded = decodeValue(bytes(1, 0, 0, 0, 3, 1), schema);
    expect(decoded).toEqual(new Map([[3, true]]));
  });

  it("reports the offset after the value from decodeWithSchema", () => {
    const result = decodeWithSchema(bytes(0xaa, 2, 0, 0, 0, 0xbb), 1, { kind: "u32" });
    expect(result).toEqual({ value: 2, next: 5 });
  });
});

// ============================================================================
// Errors
// ============================================================================

// ============================================================================
// Round trips
// ============================================================================

const roundTrips: Array<[string, Schema, unknown]> = [
  ["bool false", { kind: "bool" }, false],
  ["bool true", { kind: "bool" }, true],
  ["u8 max", { kind: "u8" }, 255],
  ["i8 min", { kind: "i8" }, -128],
  ["i8 max", { kind: "i8" }, 127],
  ["u16 max", { kind: "u16" }, 0xffff],
  ["i16 min", { kind: "i16" }, -0x8000],
  ["u32 max", { kind: "u32" }, 0xffff_ffff],
  ["i32 min", { kind: "i32" }, -0x8000_0000],
  ["i32 max", { kind: "i32" }, 0x7fff_ffff],
  ["u64 zero", { kind: "u64" }, 0n],
  ["u64 max", { kind: "u64" }, 2n ** 64n - 1n],
  ["i64 min", { kind: "i64" }, -(2n ** 63n)],
  ["i64 max", { kind: "i64" }, 2n ** 63n - 1n],
  ["f32 fraction", { kind: "f32" }, -0.15625],
  ["f32 max", { kind: "f32" }, 3.4028234663852886e38],
  ["f64 max", { kind: "f64" }, Number.MAX_VALUE],
  ["f64 smallest", { kind: "f64" }, Number.MIN_VALUE],
  ["f64 infinity", { kind: "f64" }, -Infinity],
  ["empty string", { kind: "string" }, ""],
  ["string", { kind: "string" }, "grüße, 世界"],
  ["empty bytes", { kind: "bytes" }, new Uint8Array(0)],
  ["bytes", { kind: "bytes" }, bytes(0, 1, 0xfe, 0xff)],
  ["option none", { kind: "option", inner: { kind: "u16" } }, null],
  ["option some", { kind: "option", inner: { kind: "u16" } }, 7],
  [
    "tuple",
    { kind: "tuple", elements: [{ kind: "u8" }, { kind: "string" }, { kind: "i64" }] },
    [1, "two", -3n],
  ],
  [
    "nested vec",
    { kind: "vec", element: { kind: "vec", element: { kind: "u16" } } },
    [[1, 2], [], [0xffff]],
  ],
  [
    "map",
    { kind: "map", key: { kind: "string" }, value: PointSchema },
    new Map([
      ["a", { x: 1, y: -1 }],
      ["bb", { x: 0, y: 2 }],
    ]),
  ],
  ["empty map", { kind: "map", key: { kind: "u8" }, value: { kind: "u8" } }, new Map()],
];

describe("round trip", () => {
  it.each(roundTrips)("decodes what it encoded: %s", (_name, schema, value) => {
    expect(decodeValue(encodeValue(value, schema), schema)).toEqual(value);
  });
});

describe("decode errors", () => {
  it("rejects trailing bytes", () => {
    const err = thrown(() => decodeValue(bytes(1, 2), { kind: "u8" }));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err).toMatchObject({ kind: "trailing", offset: 1, path: "<root>" });
  });

  it("carries the schema path of the failure", () => {
    const schema: Schema = {
      kind: "struct",
      fields: {
        items: {
          kind: "vec",
          element: { kind: "struct", fields: { name: { kind: "string" } } },
        },
      },
    };
    // Three items declared, the third name claims 5 bytes but has 1.
    const buf = bytes(3, 0, 0, 0, 1, 0, 0, 0, 0x61, 1, 0, 0, 0, 0x62, 5, 0, 0, 0, 0x63);
    const err = thrown(() => decodeValue(buf, schema));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err).toMatchObject({ kind: "range", offset: 14, path: "items.[2].name" });
  });

  it("rejects an unknown enum discriminant", () => {
    const err = thrown(() => decodeValue(bytes(9, 0, 0, 0), ValueSchema));
    expect(err).toMatchObject({ kind: "invalid", path: "<root>" });
  });

  it("rejects an option tag other than 0 or 1", () => {
    const schema: Schema = { kind: "option", inner: { kind: "u8" } };
    expect(thrown(() => decodeValue(bytes(2, 0), schema))).toMatchObject({ kind: "invalid" });
  });

  it("rejects vec counts that cannot fit in the input", () => {
    const schema: Schema = { kind: "vec", element: { kind: "u32" } };
    const err = thrown(() => decodeValue(bytes(0xff, 0xff, 0xff, 0xff, 1, 2, 3, 4), schema));
    expect(err).toMatchObject({ kind: "range", path: "<root>" });
  });

  it("caps counts of elements that encode to zero bytes", () => {
    const schema: Schema = { kind: "vec", element: { kind: "tuple", elements: [] } };
    expect(decodeValue(bytes(3, 0, 0, 0), schema)).toEqual([[], [], []]);
    const err = thrown(() => decodeValue(bytes(0, 0, 0, 1), schema));
    expect(err).toBeInstanceOf(DecodeError);
    expect(err).toMatchObject({
      kind: "range",
      message: "vec: 16777216 zero-size items exceeds the limit of 65536 at offset 0 (path: <root>)",
    });
  });

  it("caps maps whose entries encode to zero bytes", () => {
    const unit: Schema = { kind: "struct", fields: {} };
    const schema: Schema = { kind: "map", key: unit, value: unit };
    expect(thrown(() => decodeValue(bytes(0xff, 0xff, 0xff, 0xff), schema))).toMatchObject({
      kind: "range",
    });
  });
});

describe("encode errors", () => {
  it("rejects a value of the wrong JS type", () => {
    const err = thrown(() => encodeValue("5", { kind: "u32" }));
    expect(err).toBeInstanceOf(EncodeError);
    expect(err).toMatchObject({ message: "expected number, got string (path: <root>)" });
  });

  it("reports out-of-range numbers with their field path", () => {
    const err = thrown(() => encodeValue({ x: 2 ** 31, y: 0 }, PointSchema));
    expect(err).toBeInstanceOf(EncodeError);
    expect(err).toMatchObject({ path: "x" });
  });

  it("rejects unknown variants", () => {
    expect(thrown(() => encodeValue({ tag: "Float", value: 1 }, ValueSchema))).toBeInstanceOf(
      EncodeError,
    );
  });

  it("rejects map keys with the same encoding", () => {
    const schema: Schema = { kind: "map", key: { kind: "bytes" }, value: { kind: "u8" } };
    const map = new Map([
      [bytes(1), 1],
      [bytes(1), 2],
    ]);
    expect(thrown(() => encodeValue(map, schema))).toBeInstanceOf(EncodeError);
  });

  it("needs a registry to follow refs", () => {
    expect(() => encodeValue({}, { kind: "ref", name: "Tree" })).toThrow(/no schema registry/);
  });
});

describe("minEncodedSize", () => {
  it("sums struct fields and stops at recursive refs", () => {
    expect(minEncodedSize(PointSchema)).toBe(8);
    expect(minEncodedSize({ kind: "ref", name: "Tree" }, registry)).toBe(5);
  });
});
