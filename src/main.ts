import { parseRunnerArgs, usage } from "./cli/args";
import { createClient, describeTarget } from "./db/createClient";
import type { DbClient } from "./db/DbClient";
import { ConfigError, ScriptReadError, StatementError, toErrorMessage } from "./errors";
import { runStatements } from "./exec/runStatements";
import { createLogger, type Logger } from "./log";
import { resolveSettings, type RunnerSettings } from "./settings";
import type { CharSource } from "./source/CharReader";
import { readScriptFile } from "./source/readScriptFile";
import { splitSqlStatements } from "./sqlSplit";

export type MainDeps = {
  createClient: (settings: RunnerSettings) => Promise<DbClient>;
  openScript: (path: string) => CharSource;
  out: (line: string) => void;
  err: (line: string) => void;
};

const defaultDeps: MainDeps = {
  createClient,
  openScript: (path) => readScriptFile(path),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Parse arguments, split the script and run it in a single transaction.
 * Resolves to the process exit code; never rejects for expected failures.
 */
export async function main(argv: string[], deps: Partial<MainDeps> = {}): Promise<number> {
  const { createClient, openScript, out, err } = { ...defaultDeps, ...deps };

  const args = parseRunnerArgs(argv);
  if (args.help) {
    out(usage());
    return 0;
  }

  let settings: RunnerSettings;
  try {
    settings = resolveSettings(args.raw, args.errors);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    for (const m of e.messages) err(m);
    return 1;
  }

  const log = createLogger({ verbose: settings.verbose, err });

  let statements: string[];
  try {
    statements = splitSqlStatements(openScript(settings.sqlPath));
  } catch (e) {
    if (!(e instanceof ScriptReadError)) throw e;
    err(`failed to read SQL file: ${toErrorMessage(e.cause ?? e)}`);
    return 1;
  }

  if (statements.length === 0) {
    err("no SQL statements found in file");
    return 1;
  }
  log.debug(`${statements.length} statement(s) in ${settings.sqlPath}`);

  let client: DbClient;
  try {
    client = await createClient(settings);
  } catch (e) {
    err(`failed to open database: ${toErrorMessage(e)}`);
    return 1;
  }

  try {
    log.debug(`connecting to ${describeTarget(settings)}`);
    return await runInTransaction(client, statements, out, err, log);
  } finally {
    try {
      await client.close();
    } catch (e) {
      log.debug(`close failed: ${toErrorMessage(e)}`);
    }
  }
}

async function runInTransaction(
  client: DbClient,
  statements: string[],
  out: MainDeps["out"],
  err: MainDeps["err"],
  log: Logger
): Promise<number> {
  try {
    await client.connect();
  } catch (e) {
    err(`failed to connect: ${toErrorMessage(e)}`);
    return 1;
  }

  try {
    await client.begin();
  } catch (e) {
    err(`failed to start transaction: ${toErrorMessage(e)}`);
    return 1;
  }

  try {
    await runStatements(client, statements, out, log);
  } catch (e) {
    if (!(e instanceof StatementError)) throw e;
    err(e.message);
    return 1;
  }

  try {
    await client.commit();
  } catch (e) {
    err(`failed to commit transaction: ${toErrorMessage(e)}`);
    return 1;
  }
  log.debug("committed");
  return 0;
}
