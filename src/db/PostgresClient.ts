import type { PoolConfig } from "pg";

import type { DbClient, QueryResult } from "./DbClient";
import type { RunnerSettings } from "../settings";

export type PgArrayResult = {
  command: string;
  rowCount: number | null;
  fields: { name: string }[];
  rows: unknown[][];
};

export interface PgSession {
  query(config: { text: string; rowMode: "array" }): Promise<PgArrayResult>;
  release(err?: Error | boolean): void;
}

export interface PgPool {
  connect(): Promise<PgSession>;
  end(): Promise<void>;
}

/** The part of the `pg` module this client needs. */
export type PgDriver = {
  Pool: new (config: PoolConfig) => PgPool;
};

/**
 * PostgreSQL client.
 *
 * A single-connection pool; one session is checked out on connect() and
 * held until COMMIT/ROLLBACK.
 */
export function createPostgresClient(pg: PgDriver, p: RunnerSettings): DbClient {
  const pool = new pg.Pool({
    host: p.host,
    port: p.port,
    database: p.dbname,
    user: p.username,
    password: p.password,
    statement_timeout: p.timeoutMs,
    max: 1,
  });

  let session: PgSession | null = null;

  const active = (): PgSession => {
    if (!session) throw new Error("no open transaction");
    return session;
  };

  const run = (text: string) => active().query({ text, rowMode: "array" });

  const finish = async (text: "COMMIT" | "ROLLBACK") => {
    const s = active();
    try {
      await s.query({ text, rowMode: "array" });
      s.release();
    } catch (e) {
      // A failed COMMIT/ROLLBACK leaves the session in an unknown state
      s.release(e instanceof Error ? e : true);
      throw e;
    } finally {
      session = null;
    }
  };

  return {
    async connect(): Promise<void> {
      if (!session) session = await pool.connect();
    },

    async begin(): Promise<void> {
      if (!session) session = await pool.connect();
      await session.query({ text: "BEGIN", rowMode: "array" });
    },

    async query(sql: string): Promise<QueryResult> {
      const res = await run(sql);
      return {
        columns: res.fields.map((f) => f.name),
        rows: res.rows,
        rowsAffected: res.rowCount ?? undefined,
      };
    },

    commit: () => finish("COMMIT"),

    rollback: () => finish("ROLLBACK"),

    async close(): Promise<void> {
      if (session) {
        session.release();
        session = null;
      }
      await pool.end();
    },
  };
}
