import type { DatabaseClient } from "./database";

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

/** In-process stand-in for a pg client used by the tests. */
export class FakeClient implements DatabaseClient {
  readonly queries: RecordedQuery[] = [];
  connected = false;
  ended = false;

  constructor(
    private readonly existingTables: string[] = [],
    private readonly failOn?: string,
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  async query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.queries.push({ text, values });
    if (this.failOn !== undefined && text.startsWith(this.failOn)) {
      throw new Error(`relation rejected: ${text.split("\n")[0]}`);
    }
    if (text.includes("information_schema.tables")) {
      return { rows: this.existingTables.map((table_name) => ({ table_name })) };
    }
    return { rows: [] };
  }

  statements(): string[] {
    return this.queries.slice(1).map((q) => q.text);
  }
}
