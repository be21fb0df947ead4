import type {
  Attribute,
  Field,
  OpaqueShape,
  PrimitiveShape,
  RecordShape,
  ReferenceShape,
  Shape,
  ShapeLayout,
  TaggedShape,
  Variant,
} from "./model";

/**
 * Builders for describing record types as shapes in code.
 *
 * They fill in the same metadata a reflection pass would produce, e.g.
 *
 *   const User = record("User", [
 *     field("id", u64, [primaryKey]),
 *     field("email", option(string())),
 *   ]);
 */

function layout(sizeBytes: number, signed = false, isFloat = false): ShapeLayout {
  return { sizeBytes, signed, isFloat };
}

function integer(typeIdentifier: string, sizeBytes: number, signed: boolean): PrimitiveShape {
  return {
    kind: "primitive",
    typeIdentifier,
    primitive: "numeric",
    layout: layout(sizeBytes, signed),
    def: { type: "scalar" },
  };
}

function float(typeIdentifier: string, sizeBytes: number): PrimitiveShape {
  return {
    kind: "primitive",
    typeIdentifier,
    primitive: "numeric",
    layout: layout(sizeBytes, true, true),
    def: { type: "scalar" },
  };
}

export const bool: PrimitiveShape = {
  kind: "primitive",
  typeIdentifier: "bool",
  primitive: "boolean",
  layout: layout(1),
  def: { type: "scalar" },
};

export const u8 = integer("u8", 1, false);
export const u16 = integer("u16", 2, false);
export const u32 = integer("u32", 4, false);
export const u64 = integer("u64", 8, false);
export const u128 = integer("u128", 16, false);
export const usize = integer("usize", 8, false);
export const i8 = integer("i8", 1, true);
export const i16 = integer("i16", 2, true);
export const i32 = integer("i32", 4, true);
export const i64 = integer("i64", 8, true);
export const i128 = integer("i128", 16, true);
export const isize = integer("isize", 8, true);
export const f32 = float("f32", 4);
export const f64 = float("f64", 8);

export const char: PrimitiveShape = {
  kind: "primitive",
  typeIdentifier: "char",
  primitive: "char",
  layout: layout(4),
  def: { type: "scalar" },
};

/** Borrowed string slice; unsized. */
export const str: PrimitiveShape = {
  kind: "primitive",
  typeIdentifier: "str",
  primitive: "str",
  layout: null,
  def: { type: "scalar" },
};

export const never: PrimitiveShape = {
  kind: "primitive",
  typeIdentifier: "!",
  primitive: "never",
  layout: layout(0),
  def: { type: "scalar" },
};

/** Owned, growable text. */
export function string(typeIdentifier = "String"): OpaqueShape {
  return { kind: "opaque", typeIdentifier, layout: layout(24), def: { type: "text" } };
}

export function ref(pointee: Shape): ReferenceShape {
  return {
    kind: "reference",
    typeIdentifier: `&${pointee.typeIdentifier}`,
    pointee,
    layout: layout(pointee.layout === null ? 16 : 8),
    def: { type: "scalar" },
  };
}

export function option(inner: Shape): TaggedShape {
  return {
    kind: "tagged",
    typeIdentifier: "Option",
    layout: inner.layout,
    def: { type: "option", inner },
    variants: [
      { name: "None", fields: [] },
      { name: "Some", fields: [field("0", inner)] },
    ],
  };
}

export function list(item: Shape): OpaqueShape {
  return { kind: "opaque", typeIdentifier: "Vec", layout: layout(24), def: { type: "list", item } };
}

export function set(item: Shape): OpaqueShape {
  return { kind: "opaque", typeIdentifier: "HashSet", layout: layout(48), def: { type: "set", item } };
}

export function map(key: Shape, value: Shape): OpaqueShape {
  return {
    kind: "opaque",
    typeIdentifier: "HashMap",
    layout: layout(48),
    def: { type: "map", key, value },
  };
}

export function array(item: Shape, length: number): OpaqueShape {
  const size = item.layout === null ? null : layout(item.layout.sizeBytes * length);
  return {
    kind: "opaque",
    typeIdentifier: `[${item.typeIdentifier}; ${length}]`,
    layout: size,
    def: { type: "array", item, length },
  };
}

export function record(typeIdentifier: string, fields: Field[]): RecordShape {
  return { kind: "record", typeIdentifier, layout: null, def: { type: "scalar" }, fields };
}

export function tagged(typeIdentifier: string, variants: Variant[]): TaggedShape {
  return { kind: "tagged", typeIdentifier, layout: null, def: { type: "scalar" }, variants };
}

export function variant(name: string, fields: Field[] = []): Variant {
  return { name, fields };
}

export function field(name: string, shape: Shape, attributes: Attribute[] = []): Field {
  return { name, shape, attributes };
}

export const primaryKey: Attribute = { namespace: "psql", key: "primary_key" };
