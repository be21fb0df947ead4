import reservedWords from "./reservedWords.json";
import type { RenderOptions, SqlColumn, SqlTable, SqlType } from "./model";

export const DEFAULT_SCHEMA = "public";

// Postgres reserved key words a derived table or column name is likely to hit.
const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);

export function renderSqlType(type: SqlType): string {
  return typeof type === "string" ? type : renderSqlType(type.nullable);
}

export function quoteIdentifier(name: string): string {
  if (/^[a-z_][a-z0-9_]*$/.test(name) && !RESERVED_WORDS.has(name)) {
    return name;
  }
  return `"${name.replace(/"/g, '""')}"`;
}

export function renderColumn(column: SqlColumn): string {
  const base = `${quoteIdentifier(column.name)} ${column.dataType}`;
  return column.nullable ? base : `${base} NOT NULL`;
}

export function qualifiedTableName(table: string, options: RenderOptions = {}): string {
  return `${quoteIdentifier(options.schema ?? DEFAULT_SCHEMA)}.${quoteIdentifier(table)}`;
}

export function renderCreateTable(table: SqlTable, options: RenderOptions = {}): string {
  const lines = table.columns.map(renderColumn);
  if (table.primaryKey) {
    lines.push(`PRIMARY KEY (${quoteIdentifier(table.primaryKey.name)})`);
  }

  const body = lines.map((line) => `  ${line}`).join(",\n");
  const head = `CREATE TABLE ${qualifiedTableName(table.name, options)}`;
  return lines.length > 0 ? `${head} (\n${body}\n);` : `${head} ();`;
}

/**
 * Render a whole schema: the CREATE SCHEMA statement followed by one CREATE
 * TABLE per table, ordered by table name so output is deterministic.
 */
export function renderSchemaDdl(tables: readonly SqlTable[], options: RenderOptions = {}): string {
  const schema = options.schema ?? DEFAULT_SCHEMA;
  const sorted = [...tables].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const statements = [
    `CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schema)};`,
    ...sorted.map((table) => renderCreateTable(table, { schema })),
  ];
  return `${statements.join("\n\n")}\n`;
}
