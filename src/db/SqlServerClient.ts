import type { config as MssqlConfig } from "mssql";

import type { DbClient, QueryResult } from "./DbClient";
import type { RunnerSettings } from "../settings";

export type ColumnMeta = { index: number; name: string };

export type MssqlResult = {
  recordset?: ArrayLike<unknown> & { columns: Record<string, ColumnMeta> };
  rowsAffected: number[];
};

export interface MssqlRequest {
  query(command: string): Promise<MssqlResult>;
}

export interface MssqlTransaction {
  begin(): Promise<unknown>;
  request(): MssqlRequest;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface MssqlPool {
  connect(): Promise<unknown>;
  transaction(): MssqlTransaction;
  close(): Promise<void>;
}

/** The part of the `mssql` module this client needs. */
export type MssqlDriver = {
  ConnectionPool: new (config: MssqlConfig) => MssqlPool;
};

export function createSqlServerClient(mssql: MssqlDriver, p: RunnerSettings): DbClient {
  const pool = new mssql.ConnectionPool({
    server: p.host,
    port: p.port,
    database: p.dbname,
    user: p.username,
    password: p.password,
    requestTimeout: p.timeoutMs,

    options: {
      encrypt: false,
      trustServerCertificate: true,
    },

    pool: {
      max: 1,
      min: 0,
      idleTimeoutMillis: 30_000,
    },
  });

  let connected = false;
  let tx: MssqlTransaction | null = null;

  const active = (): MssqlTransaction => {
    if (!tx) throw new Error("no open transaction");
    return tx;
  };

  return {
    async connect(): Promise<void> {
      if (connected) return;
      await pool.connect();
      connected = true;
    },

    async begin(): Promise<void> {
      if (!connected) {
        await pool.connect();
        connected = true;
      }
      const t = pool.transaction();
      await t.begin();
      tx = t;
    },

    async query(sql: string): Promise<QueryResult> {
      const result = await active().request().query(sql);
      return toQueryResult(result);
    },

    async commit(): Promise<void> {
      const t = active();
      tx = null;
      await t.commit();
    },

    async rollback(): Promise<void> {
      const t = active();
      tx = null;
      await t.rollback();
    },

    async close(): Promise<void> {
      await pool.close();
    },
  };
}

function toQueryResult(result: MssqlResult): QueryResult {
  const rowsAffected =
    result.rowsAffected.length > 0
      ? result.rowsAffected.reduce((a, b) => a + b, 0)
      : undefined;

  const rs = result.recordset;
  if (!rs) return { columns: [], rows: [], rowsAffected };

  const columns = Object.values(rs.columns)
    .sort((a, b) => a.index - b.index)
    .map((c) => c.name);

  const rows = Array.from(rs, (row) =>
    columns.map((name) => (isRecord(row) ? row[name] : undefined))
  );

  return { columns, rows, rowsAffected };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}
