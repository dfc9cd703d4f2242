import type { PoolClient, QueryResult, QueryResultRow } from 'pg';

/**
 * What the repositories need from PostgreSQL: plain queries, and a way to
 * group several of them into one transaction.
 */
export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
  transaction<T>(work: (sql: SqlExecutor) => Promise<T>): Promise<T>;
}

/** Executor bound to a client that is already inside BEGIN. */
export class ClientSqlExecutor implements SqlExecutor {
  constructor(private readonly client: PoolClient) {}

  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>> {
    return this.client.query<R>(text, values);
  }

  // nested transactions join the open one
  transaction<T>(work: (sql: SqlExecutor) => Promise<T>): Promise<T> {
    return work(this);
  }
}
