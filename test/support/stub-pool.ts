import type { QueryResult, QueryResultRow } from "pg";
import type { SqlClient, SqlPool } from "../../src/db/connection";

export type Responder = (text: string, values?: unknown[]) => QueryResultRow[];

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

// One stub plays both pool and checked-out client so every statement lands in a single log.
export class StubPool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  released = 0;

  constructor(private readonly respond: Responder = () => []) {}

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    this.queries.push({ text: text.replace(/\s+/g, " ").trim(), values });
    const rows = this.respond(text, values) as R[];
    return { rows, rowCount: rows.length, command: "", oid: 0, fields: [] };
  }

  async connect(): Promise<SqlClient & { release(): void }> {
    return this;
  }

  release(): void {
    this.released += 1;
  }

  statements(): string[] {
    return this.queries.map((query) => query.text);
  }
}
