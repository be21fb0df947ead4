import { Client } from "pg";
import {
  DEFAULT_SCHEMA,
  quoteIdentifier,
  renderCreateTable,
  type SqlTable,
} from "@s2t/core";

/** The part of a pg `Client` the schema tooling needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

export interface DatabaseClient extends SqlClient {
  connect(): Promise<void>;
  end(): Promise<void>;
}

/** Wrap a pg `Client` for the given connection string; nothing connects until `connect()`. */
export function connectPostgres(connectionString: string): DatabaseClient {
  const client = new Client({ connectionString });
  return {
    connect: async () => {
      await client.connect();
    },
    end: async () => {
      await client.end();
    },
    query: async (text, values) => {
      const res = await client.query(text, values);
      return { rows: res.rows };
    },
  };
}

export interface ApplyOptions {
  schema?: string;
  dryRun?: boolean;
}

export interface ApplyResult {
  created: string[];
  skipped: string[];
  statements: string[];
}

/**
 * Create the schema and every table that does not exist yet, inside a single
 * transaction. Existing tables are left untouched (use `diff` to migrate
 * them). With `dryRun` the statements are only returned.
 */
export async function applySchema(
  client: SqlClient,
  tables: readonly SqlTable[],
  options: ApplyOptions = {},
): Promise<ApplyResult> {
  const schema = options.schema ?? DEFAULT_SCHEMA;
  const existing = await loadExistingTables(client, schema);

  const pending = tables.filter((t) => !existing.has(t.name));
  const skipped = tables.filter((t) => existing.has(t.name)).map((t) => t.name);
  const statements = [
    `CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schema)};`,
    ...pending.map((table) => renderCreateTable(table, { schema })),
  ];
  const result = { created: pending.map((t) => t.name), skipped, statements };

  if (options.dryRun) {
    return result;
  }

  await client.query("BEGIN");
  try {
    for (const statement of statements) {
      await client.query(statement);
    }
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }

  return result;
}

async function loadExistingTables(client: SqlClient, schema: string): Promise<Set<string>> {
  const res = await client.query(
    `
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
    ORDER BY table_name
    `,
    [schema],
  );

  const names = new Set<string>();
  for (const row of res.rows) {
    if (typeof row.table_name === "string") {
      names.add(row.table_name);
    }
  }
  return names;
}
