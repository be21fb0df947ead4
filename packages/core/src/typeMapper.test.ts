import { describe, expect, it } from "vitest";
import { ConversionError } from "./errors";
import type { PrimitiveShape, Shape } from "./model";
import {
  array,
  bool,
  char,
  f32,
  f64,
  i128,
  i16,
  i32,
  i64,
  i8,
  isize,
  list,
  map,
  never,
  option,
  record,
  ref,
  set,
  str,
  string,
  tagged,
  u128,
  u16,
  u32,
  u64,
  u8,
  usize,
  variant,
} from "./shapes";
import { mapShape, unwrapSqlType } from "./typeMapper";

function unsupported(shape: Shape): string {
  try {
    mapShape(shape);
  } catch (error) {
    if (error instanceof ConversionError && error.kind === "UnsupportedType") {
      return error.message;
    }
    throw error;
  }
  throw new Error(`expected ${shape.typeIdentifier} to be unsupported`);
}

describe("mapShape", () => {
  it("maps booleans", () => {
    expect(mapShape(bool)).toBe("boolean");
  });

  it.each([
    [u8, "smallint"],
    [i8, "smallint"],
    [u16, "smallint"],
    [i16, "smallint"],
    [u32, "integer"],
    [i32, "integer"],
    [u64, "bigint"],
    [i64, "bigint"],
    [usize, "bigint"],
    [isize, "bigint"],
    [u128, "bigint"],
    [i128, "bigint"],
  ] as const)("maps integer case %# by layout size", (shape, expected) => {
    expect(mapShape(shape)).toBe(expected);
  });

  it("maps integers of any other width to bigint", () => {
    const integer = (sizeBytes: number): PrimitiveShape => ({
      kind: "primitive",
      typeIdentifier: `int${sizeBytes * 8}`,
      primitive: "numeric",
      layout: { sizeBytes, signed: true, isFloat: false },
      def: { type: "scalar" },
    });

    expect(mapShape(integer(3))).toBe("bigint");
    expect(mapShape(integer(0))).toBe("bigint");
    expect(mapShape(integer(12))).toBe("bigint");
  });

  it("maps floats by layout size", () => {
    expect(mapShape(f32)).toBe("real");
    expect(mapShape(f64)).toBe("double precision");
  });

  it("rejects floats of other sizes", () => {
    const f16: PrimitiveShape = {
      kind: "primitive",
      typeIdentifier: "f16",
      primitive: "numeric",
      layout: { sizeBytes: 2, signed: true, isFloat: true },
      def: { type: "scalar" },
    };

    expect(unsupported(f16)).toBe("Unsupported type: float with size 2 (f16)");
  });

  it("rejects unsized numerics", () => {
    expect(unsupported({ ...u32, layout: null })).toBe("Unsupported type: unsized numeric u32");
  });

  it("maps chars to a single fixed character", () => {
    expect(mapShape(char)).toBe("char(1)");
  });

  it("maps owned and borrowed text alike", () => {
    expect(mapShape(string())).toBe("text");
    expect(mapShape(str)).toBe("text");
    expect(mapShape(ref(str))).toBe("text");
    expect(mapShape(ref(string()))).toBe("text");
  });

  it("rejects references to anything but text", () => {
    expect(unsupported(ref(u32))).toBe("Unsupported type: reference type &u32");
    expect(unsupported(ref(ref(u32)))).toBe("Unsupported type: reference type &&u32");
  });

  it("maps references to references of text as text", () => {
    expect(mapShape(ref(ref(str)))).toBe("text");
    expect(mapShape(ref(ref(ref(string()))))).toBe("text");
  });

  it("wraps optional shapes as nullable", () => {
    expect(mapShape(option(i32))).toEqual({ nullable: "integer" });
    expect(mapShape(option(option(u8)))).toEqual({ nullable: { nullable: "smallint" } });
  });

  it("stores containers and nested records as jsonb", () => {
    expect(mapShape(list(u32))).toBe("jsonb");
    expect(mapShape(set(string()))).toBe("jsonb");
    expect(mapShape(map(string(), u64))).toBe("jsonb");
    expect(mapShape(record("Point", []))).toBe("jsonb");
  });

  it("stores tagged fields as their integer discriminant", () => {
    expect(mapShape(tagged("Color", [variant("Red"), variant("Green")]))).toBe("integer");
  });

  it("rejects fixed-length arrays", () => {
    expect(unsupported(array(f32, 3))).toBe("Unsupported type: fixed-length array [f32; 3]");
  });

  it("rejects the never type and unknown opaque scalars", () => {
    expect(unsupported(never)).toBe("Unsupported type: primitive !");
    expect(
      unsupported({ kind: "opaque", typeIdentifier: "Uuid", layout: null, def: { type: "scalar" } }),
    ).toBe("Unsupported type: opaque Uuid");
  });
});

describe("unwrapSqlType", () => {
  it("strips every nullable layer", () => {
    expect(unwrapSqlType({ nullable: { nullable: "text" } })).toEqual({
      dataType: "text",
      nullable: true,
    });
    expect(unwrapSqlType("bigint")).toEqual({ dataType: "bigint", nullable: false });
  });
});
