export class ScriptReadError extends Error {
  override name = "ScriptReadError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Invalid command-line arguments; raised before any file or network I/O. */
export class ConfigError extends Error {
  override name = "ConfigError";
  readonly messages: string[];

  constructor(messages: string[]) {
    super(messages.join("\n"));
    this.messages = messages;
  }
}

export class StatementError extends Error {
  override name = "StatementError";
  readonly index: number;
  readonly sql: string;

  constructor(index: number, sql: string, cause: unknown) {
    super(`statement ${index} failed: ${toErrorMessage(cause)}`, { cause });
    this.index = index;
    this.sql = sql;
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
