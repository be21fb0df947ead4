import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { renderCreateTable, type GeneratedSchema } from "@s2t/core";
import { tableFileStem } from "./utils";
import { generateIndexHTML, generateTableHTML } from "./view";

export interface WriteOptions {
  schema: string;
  html?: boolean;
}

/**
 * Write the generated schema into `outputDir`:
 * - schema.sql and schema.json for the whole run
 * - table-<name>.sql per table
 * - index.html and table-<name>.html when `html` is set
 *
 * Returns the written file names.
 */
export function writeGeneratedSchema(
  outputDir: string,
  generated: GeneratedSchema,
  options: WriteOptions,
): string[] {
  mkdirSync(outputDir, { recursive: true });
  const written: string[] = [];
  const write = (name: string, contents: string) => {
    writeFileSync(join(outputDir, name), contents, "utf8");
    written.push(name);
  };

  write("schema.sql", generated.ddl);
  write(
    "schema.json",
    JSON.stringify(
      {
        schema: options.schema,
        tables: generated.tables,
        failures: generated.failures.map((f) => ({
          typeIdentifier: f.typeIdentifier,
          kind: f.error.kind,
          message: f.error.message,
        })),
      },
      null,
      2,
    ),
  );

  for (const table of generated.tables) {
    const ddl = renderCreateTable(table, { schema: options.schema });
    const stem = tableFileStem(table.name);
    write(`${stem}.sql`, `${ddl}\n`);
    if (options.html) {
      write(`${stem}.html`, generateTableHTML(table, ddl));
    }
  }

  if (options.html) {
    write("index.html", generateIndexHTML(generated.tables, generated.failures, options.schema));
  }

  return written;
}
