export { splitSqlStatements, scan, DOLLAR_TAG_WINDOW, type LexerState } from "./sqlSplit";
export { CharReader, charsOf, type CharSource } from "./source/CharReader";
export { readScriptFile, fileChunks } from "./source/readScriptFile";
export { statementKind, type StatementKind } from "./exec/statementKind";
export { runStatements } from "./exec/runStatements";
export { formatTable, formatCell } from "./view/resultTable";
export { createClient, describeTarget } from "./db/createClient";
export type { DbClient, QueryResult } from "./db/DbClient";
export { resolveSettings, defaultPort, type RunnerSettings, type DbType } from "./settings";
export { ConfigError, ScriptReadError, StatementError } from "./errors";
export { main } from "./main";
