export type ShapeKind = "record" | "tagged" | "reference" | "primitive" | "opaque";

export type PrimitiveType = "boolean" | "numeric" | "char" | "str" | "never";

export interface ShapeLayout {
  sizeBytes: number;
  signed: boolean;
  isFloat: boolean;
}

export type ShapeDef =
  | { type: "scalar" }
  | { type: "text" }
  | { type: "option"; inner: Shape }
  | { type: "list"; item: Shape }
  | { type: "set"; item: Shape }
  | { type: "map"; key: Shape; value: Shape }
  | { type: "array"; item: Shape; length: number };

export interface Attribute {
  namespace?: string;
  key: string;
  value?: unknown;
}

export interface Field {
  name: string;
  shape: Shape;
  attributes: readonly Attribute[];
}

export interface Variant {
  name: string;
  fields: readonly Field[];
}

interface ShapeBase {
  typeIdentifier: string;
  /** `null` when the shape is unsized or its layout is not known. */
  layout: ShapeLayout | null;
  def: ShapeDef;
}

export interface RecordShape extends ShapeBase {
  kind: "record";
  fields: readonly Field[];
}

export interface TaggedShape extends ShapeBase {
  kind: "tagged";
  variants: readonly Variant[];
}

export interface ReferenceShape extends ShapeBase {
  kind: "reference";
  pointee: Shape;
}

export interface PrimitiveShape extends ShapeBase {
  kind: "primitive";
  primitive: PrimitiveType;
}

/** Library-provided type whose structure is hidden; `def` tells what it is. */
export interface OpaqueShape extends ShapeBase {
  kind: "opaque";
}

export type Shape =
  | RecordShape
  | TaggedShape
  | ReferenceShape
  | PrimitiveShape
  | OpaqueShape;

export type SqlColumnType =
  | "boolean"
  | "smallint"
  | "integer"
  | "bigint"
  | "real"
  | "double precision"
  | "text"
  | "char(1)"
  | "jsonb";

export interface NullableSqlType {
  nullable: SqlType;
}

export type SqlType = SqlColumnType | NullableSqlType;

export interface SqlColumn {
  name: string;
  dataType: SqlColumnType;
  nullable: boolean;
}

export interface SqlTable {
  name: string;
  columns: SqlColumn[];
  /** The primary-key column itself (same object as in `columns`). */
  primaryKey: SqlColumn | null;
}

export interface PrimaryKeyMarker {
  namespace: string;
  key: string;
}

export interface ConvertOptions {
  primaryKeyAttribute?: PrimaryKeyMarker;
}

export interface RenderOptions {
  schema?: string;
}
