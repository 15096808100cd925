import { QueryResult, QueryResultRow } from 'pg';

/**
 * Anything that can run a parameterised statement: the pool itself, or the
 * client bound to an open transaction.
 */
export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}
