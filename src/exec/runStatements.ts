import type { DbClient, QueryResult } from "../db/DbClient";
import { StatementError, toErrorMessage } from "../errors";
import type { Logger } from "../log";
import { formatTable } from "../view/resultTable";
import { statementKind } from "./statementKind";

type Out = (line: string) => void;

/**
 * Run every statement inside the client's open transaction, printing each
 * result as it completes.
 *
 * On the first failure the transaction is rolled back and a StatementError is
 * thrown; lines already printed for earlier statements stay printed.
 */
export async function runStatements(
  client: DbClient,
  statements: string[],
  out: Out,
  log?: Logger
): Promise<void> {
  for (let i = 0; i < statements.length; i++) {
    const index = i + 1;
    const sql = statements[i] ?? "";
    const kind = statementKind(sql);
    log?.debug(`statement ${index}/${statements.length} (${kind}): ${sql.slice(0, 100)}`);

    const t0 = Date.now();
    let result: QueryResult;
    try {
      result = await client.query(sql);
    } catch (e) {
      await rollbackQuietly(client, log);
      throw new StatementError(index, sql, e);
    }
    log?.debug(`statement ${index} done in ${Date.now() - t0} ms`);

    out("");
    if (kind === "query") {
      out(`-- Statement ${index} (query)`);
      for (const line of formatTable(result.columns, result.rows)) out(line);
    } else {
      out(`-- Statement ${index} (execution)`);
      out(result.rowsAffected === undefined ? "OK" : `Rows affected: ${result.rowsAffected}`);
    }
  }
}

async function rollbackQuietly(client: DbClient, log?: Logger) {
  try {
    await client.rollback();
  } catch (e) {
    // reported alongside the statement error, which stays the one thrown
    const line = `rollback failed: ${toErrorMessage(e)}`;
    if (log) log.error(line);
    else console.error(line);
  }
}
