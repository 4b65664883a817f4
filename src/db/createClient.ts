import type { RunnerSettings } from "../settings";
import type { DbClient } from "./DbClient";
import { createOracleClient } from "./OracleClient";
import { createPostgresClient } from "./PostgresClient";
import { createSqlServerClient } from "./SqlServerClient";

// Drivers are loaded on demand so only the selected engine's module is required.
export async function createClient(settings: RunnerSettings): Promise<DbClient> {
  switch (settings.engine) {
    case "sqlserver": {
      const mssql = await import("mssql");
      return createSqlServerClient(mssql, settings);
    }
    case "postgres": {
      const pg = await import("pg");
      return createPostgresClient(pg, settings);
    }
    case "oracle": {
      const oracledb = await import("oracledb");
      return createOracleClient(oracledb, settings);
    }
  }
}

/** Connection URL for logs; the password is masked. */
export function describeTarget(s: RunnerSettings): string {
  const user = encodeURIComponent(s.username);
  const auth = s.password ? `${user}:***` : user;
  switch (s.engine) {
    case "oracle":
      return `oracle://${auth}@${s.host}:${s.port}/${s.dbname}`;
    case "sqlserver":
      return `sqlserver://${auth}@${s.host}:${s.port}?${new URLSearchParams({ database: s.dbname })}`;
    case "postgres":
      return `postgres://${auth}@${s.host}:${s.port}/${s.dbname}`;
  }
}
