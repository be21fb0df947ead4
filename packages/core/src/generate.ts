import { renderSchemaDdl } from "./ddl";
import { ConversionError } from "./errors";
import type { ConvertOptions, RenderOptions, Shape, SqlTable } from "./model";
import { tryConvertShape } from "./tableBuilder";

export interface ShapeFailure {
  typeIdentifier: string;
  error: ConversionError;
}

export interface GeneratedSchema {
  tables: SqlTable[];
  failures: ShapeFailure[];
  /** DDL for the tables that converted; failures are left out. */
  ddl: string;
}

/**
 * End-to-end shapes → schema entrypoint.
 *
 * Deterministic and side-effect free: every shape is converted on its own, so
 * one bad shape does not hide the tables of the others. A shape whose table
 * name is already taken by an earlier shape is reported as a failure.
 */
export function generateSchema(
  shapes: readonly Shape[],
  options: ConvertOptions & RenderOptions = {},
): GeneratedSchema {
  const tables: SqlTable[] = [];
  const failures: ShapeFailure[] = [];
  const owners = new Map<string, string>();

  for (const shape of shapes) {
    const result = tryConvertShape(shape, options);
    if (result.ok) {
      const owner = owners.get(result.table.name);
      if (owner !== undefined) {
        failures.push({
          typeIdentifier: shape.typeIdentifier,
          error: new ConversionError(
            "DuplicateTable",
            `'${result.table.name}' is already used by ${owner}`,
          ),
        });
        continue;
      }
      owners.set(result.table.name, shape.typeIdentifier);
      tables.push(result.table);
    } else {
      failures.push({ typeIdentifier: shape.typeIdentifier, error: result.error });
    }
  }

  return { tables, failures, ddl: renderSchemaDdl(tables, options) };
}
