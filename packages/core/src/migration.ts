import { qualifiedTableName, quoteIdentifier, renderColumn } from "./ddl";
import { MigrationError } from "./errors";
import type { Field, RecordShape, RenderOptions, Shape } from "./model";
import { dereference, isText, unwrapOptional } from "./shapeInspector";
import { shapesEqual, type ShapeDiff } from "./shapeDiff";
import { fieldToColumn } from "./tableBuilder";

/**
 * Turn a record diff into ALTER TABLE statements, one action per statement:
 * added columns first (in `to` order), then changed columns, then dropped
 * columns.
 *
 * Changing a column's type is only allowed between numeric and text-like
 * shapes (nullability may change freely); anything else is rejected.
 *
 * @throws {MigrationError}
 * @throws {ConversionError} when a field of `to` cannot be mapped
 */
export function buildAlterStatements(diff: ShapeDiff, options: RenderOptions = {}): string[] {
  if (diff.type === "equal") {
    throw new MigrationError(
      "NoChanges",
      "Cannot create ALTER TABLE from equal shapes - no changes needed",
    );
  }
  if (diff.type !== "record") {
    throw new MigrationError(
      "IncompatibleShapes",
      `Cannot create ALTER TABLE between ${diff.from.typeIdentifier} and ${diff.to.typeIdentifier} - only record diffs are supported`,
    );
  }

  const { to, updates, deletions, insertions } = diff;
  if (insertions.length === 0 && deletions.length === 0 && updates.size === 0) {
    throw new MigrationError("NoChanges", "No column changes found");
  }

  const table = qualifiedTableName(to.typeIdentifier.toLowerCase(), options);
  const alter = (action: string) => `ALTER TABLE ${table} ${action};`;
  const statements: string[] = [];

  for (const name of insertions) {
    statements.push(alter(`ADD COLUMN ${renderColumn(fieldToColumn(fieldOf(to, name)))}`));
  }

  for (const [name, fieldDiff] of updates) {
    if (!isCompatibleChange(fieldDiff)) {
      throw new MigrationError(
        "IncompatibleTypeChange",
        `Incompatible type change for field '${name}'. Only conversions between numbers and strings are supported`,
      );
    }

    const before = fieldToColumn(fieldOf(diff.from, name));
    const after = fieldToColumn(fieldOf(to, name));
    const column = quoteIdentifier(after.name);
    if (before.dataType !== after.dataType) {
      statements.push(alter(`ALTER COLUMN ${column} TYPE ${after.dataType}`));
    }
    if (before.nullable !== after.nullable) {
      statements.push(alter(`ALTER COLUMN ${column} ${after.nullable ? "DROP" : "SET"} NOT NULL`));
    }
  }

  for (const name of deletions) {
    statements.push(alter(`DROP COLUMN ${quoteIdentifier(name)}`));
  }

  if (statements.length === 0) {
    throw new MigrationError("NoChanges", "No column changes found");
  }
  return statements;
}

function fieldOf(shape: RecordShape, name: string): Field {
  const field = shape.fields.find((f) => f.name === name);
  if (!field) {
    throw new Error(`Field '${name}' not found in ${shape.typeIdentifier}`);
  }
  return field;
}

type ValueCategory = "numeric" | "text" | "other";

function categoryOf(shape: Shape): ValueCategory {
  const inner = unwrapOptional(shape);
  if (inner.kind === "primitive" && inner.primitive === "numeric") return "numeric";
  if (inner.kind === "primitive" && inner.primitive === "char") return "text";
  if (isText(inner)) return "text";
  if (inner.kind === "reference" && isText(dereference(inner))) return "text";
  return "other";
}

function isCompatibleChange(diff: ShapeDiff): boolean {
  if (diff.type !== "different") return true;
  if (shapesEqual(unwrapOptional(diff.from), unwrapOptional(diff.to))) return true;
  return categoryOf(diff.from) !== "other" && categoryOf(diff.to) !== "other";
}
