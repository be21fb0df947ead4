import { ConversionError } from "./errors";
import type { PrimitiveShape, Shape, SqlColumnType, SqlType } from "./model";
import {
  dereference,
  describeShape,
  isAssociative,
  isFixedArray,
  isSequence,
  isText,
  optionInner,
} from "./shapeInspector";

/**
 * Map a field's shape to a SQL type.
 *
 * - Optional wrappers become `{ nullable: <inner> }`.
 * - Owned and borrowed text both become `text`; so does a reference to text.
 * - Integers are sized by layout, floats must be 4 or 8 bytes.
 * - Lists, sets, maps and nested records are stored whole as `jsonb`.
 * - Tagged types used as fields store their discriminant as `integer`.
 */
export function mapShape(shape: Shape): SqlType {
  const inner = optionInner(shape);
  if (inner !== null) {
    return { nullable: mapShape(inner) };
  }

  if (isText(shape)) return "text";

  if (shape.kind === "reference") {
    return mapReference(shape);
  }

  if (shape.kind === "primitive") {
    return mapPrimitive(shape);
  }

  if (isSequence(shape) || isAssociative(shape)) return "jsonb";

  if (isFixedArray(shape)) {
    throw new ConversionError(
      "UnsupportedType",
      `fixed-length array ${shape.typeIdentifier}`,
    );
  }

  switch (shape.kind) {
    case "record":
      return "jsonb";
    case "tagged":
      return "integer";
    default:
      throw new ConversionError("UnsupportedType", describeShape(shape));
  }
}

function mapReference(shape: Shape): SqlType {
  // Borrowed strings are forced to text whatever their lifetime or depth; no
  // other reference is stored.
  if (isText(dereference(shape))) return "text";
  throw new ConversionError(
    "UnsupportedType",
    `reference type ${shape.typeIdentifier}`,
  );
}

function mapPrimitive(shape: PrimitiveShape): SqlColumnType {
  switch (shape.primitive) {
    case "boolean":
      return "boolean";
    case "char":
      return "char(1)";
    case "str":
      return "text";
    case "numeric":
      return mapNumeric(shape);
    default:
      throw new ConversionError("UnsupportedType", describeShape(shape));
  }
}

function mapNumeric(shape: PrimitiveShape): SqlColumnType {
  const layout = shape.layout;
  if (layout === null) {
    throw new ConversionError("UnsupportedType", `unsized numeric ${shape.typeIdentifier}`);
  }

  if (layout.isFloat) {
    if (layout.sizeBytes === 4) return "real";
    if (layout.sizeBytes === 8) return "double precision";
    throw new ConversionError(
      "UnsupportedType",
      `float with size ${layout.sizeBytes} (${shape.typeIdentifier})`,
    );
  }

  switch (layout.sizeBytes) {
    case 1:
    case 2:
      return "smallint";
    case 4:
      return "integer";
    default:
      return "bigint";
  }
}

/** Strip every `nullable` wrapper, reporting whether there was one. */
export function unwrapSqlType(type: SqlType): { dataType: SqlColumnType; nullable: boolean } {
  if (typeof type === "string") {
    return { dataType: type, nullable: false };
  }
  return { dataType: unwrapSqlType(type.nullable).dataType, nullable: true };
}
