import { isPrimaryKeyField } from "./attributeResolver";
import { ConversionError } from "./errors";
import type { ConvertOptions, Field, Shape, SqlColumn, SqlTable } from "./model";
import { describeShape, isOptional, recordFields, shapeKind } from "./shapeInspector";
import { mapShape, unwrapSqlType } from "./typeMapper";

export type ConversionResult =
  | { ok: true; table: SqlTable }
  | { ok: false; error: ConversionError };

/**
 * Convert a record shape into a table definition.
 *
 * The table is named after the lowercased type identifier. For a
 * monomorphized generic the identifier is the base name only, so
 * `Page<User>` and `Page<Post>` both yield `page`.
 *
 * @throws {ConversionError} NotAStruct, UnsupportedType or MultiplePrimaryKeys
 */
export function convertShape(shape: Shape, options: ConvertOptions = {}): SqlTable {
  if (shapeKind(shape) !== "record") {
    throw new ConversionError("NotAStruct", describeShape(shape));
  }

  const name = shape.typeIdentifier.toLowerCase();
  const columns: SqlColumn[] = [];
  const keyed: Array<{ field: Field; column: SqlColumn }> = [];

  for (const field of recordFields(shape)) {
    const column = fieldToColumn(field);
    columns.push(column);
    if (isPrimaryKeyField(field, options.primaryKeyAttribute)) {
      keyed.push({ field, column });
    }
  }

  if (keyed.length > 1) {
    const names = keyed.map((k) => k.field.name).join(", ");
    throw new ConversionError(
      "MultiplePrimaryKeys",
      `Table '${name}' has ${keyed.length} primary keys: ${names}`,
    );
  }

  return {
    name,
    columns,
    primaryKey: keyed.length === 1 ? keyed[0].column : null,
  };
}

/** Like {@link convertShape}, but reports conversion failures as a value. */
export function tryConvertShape(shape: Shape, options: ConvertOptions = {}): ConversionResult {
  try {
    return { ok: true, table: convertShape(shape, options) };
  } catch (error) {
    if (error instanceof ConversionError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function fieldToColumn(field: Field): SqlColumn {
  const { dataType } = unwrapSqlType(mapShape(field.shape));
  return {
    name: field.name,
    dataType,
    nullable: isOptional(field.shape),
  };
}
