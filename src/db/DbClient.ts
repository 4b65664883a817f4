export type QueryResult = {
  columns: string[];
  rows: unknown[][];
  /** `undefined` when the driver reports no count (DDL and the like). */
  rowsAffected?: number;
};

/**
 * One connection, one transaction at a time.
 * `query` is only valid between `begin` and `commit`/`rollback`.
 */
export interface DbClient {
  /** Open the connection; fails fast on bad credentials or an unreachable host. */
  connect(): Promise<void>;
  begin(): Promise<void>;
  query(sql: string): Promise<QueryResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}
