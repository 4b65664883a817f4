import type { ConnectionAttributes } from "oracledb";

import type { DbClient, QueryResult } from "./DbClient";
import type { RunnerSettings } from "../settings";

export type OracleResult = {
  metaData?: { name: string }[];
  rows?: unknown[];
  rowsAffected?: number;
};

export interface OracleConnection {
  callTimeout?: number;
  execute(
    sql: string,
    binds: unknown[],
    options: { outFormat: number; autoCommit: boolean }
  ): Promise<OracleResult>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

/** The part of the `oracledb` module this client needs. */
export type OracleDriver = {
  OUT_FORMAT_ARRAY: number;
  getConnection(attrs: ConnectionAttributes): Promise<OracleConnection>;
};

/**
 * Oracle client (node-oracledb thin mode).
 *
 * Oracle has no BEGIN; a transaction opens with the first DML on the
 * connection, so begin() only checks that connect() happened.
 */
export function createOracleClient(oracledb: OracleDriver, p: RunnerSettings): DbClient {
  let conn: OracleConnection | null = null;

  const active = (): OracleConnection => {
    if (!conn) throw new Error("not connected");
    return conn;
  };

  return {
    async connect(): Promise<void> {
      if (conn) return;
      const c = await oracledb.getConnection({
        user: p.username,
        password: p.password,
        connectString: `${p.host}:${p.port}/${p.dbname}`,
      });
      c.callTimeout = p.timeoutMs;
      conn = c;
    },

    async begin(): Promise<void> {
      active();
    },

    async query(sql: string): Promise<QueryResult> {
      const res = await active().execute(sql, [], {
        outFormat: oracledb.OUT_FORMAT_ARRAY,
        autoCommit: false,
      });
      return {
        columns: (res.metaData ?? []).map((m) => m.name),
        rows: (res.rows ?? []).map((r) => (Array.isArray(r) ? r : [r])),
        rowsAffected: res.rowsAffected,
      };
    },

    commit: () => active().commit(),

    rollback: () => active().rollback(),

    async close(): Promise<void> {
      if (!conn) return;
      const c = conn;
      conn = null;
      await c.close();
    },
  };
}
