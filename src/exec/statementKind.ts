export type StatementKind = "query" | "execution";

/**
 * Prefix check only: leading comments are not skipped, so
 * `-- note\nselect 1` runs as an execution.
 */
export function statementKind(sql: string): StatementKind {
  const s = sql.trim().toLowerCase();
  return s.startsWith("select") || s.startsWith("with") ? "query" : "execution";
}
