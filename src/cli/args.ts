import type { RawSettings } from "../settings";

type FlagType = "string" | "boolean";

const FLAGS: Record<string, FlagType> = {
  engine: "string",
  host: "string",
  port: "string",
  username: "string",
  password: "string",
  dbname: "string",
  sql: "string",
  timeout: "string",
  verbose: "boolean",
  help: "boolean",
};

export type ParsedArgs = {
  raw: RawSettings;
  help: boolean;
  errors: string[];
};

/**
 * Parse `-name value`, `--name value` and `--name=value`.
 * Problems are collected rather than thrown so they can be reported with the
 * validation errors in one go.
 */
export function parseRunnerArgs(argv: string[]): ParsedArgs {
  const values: Record<string, string> = {};
  const switches = new Set<string>();
  const errors: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? "";
    if (!a.startsWith("-") || a === "-" || a === "--") {
      errors.push(`unknown argument: ${a}`);
      continue;
    }

    const body = a.replace(/^-+/, "");
    const eq = body.indexOf("=");
    const key = eq === -1 ? body : body.slice(0, eq);
    const type = Object.hasOwn(FLAGS, key) ? FLAGS[key] : undefined;
    if (!type) {
      errors.push(`unknown flag: ${a}`);
      continue;
    }

    if (type === "boolean") {
      const v = eq === -1 ? "true" : body.slice(eq + 1).toLowerCase();
      if (v === "true" || v === "1") switches.add(key);
      else if (v !== "false" && v !== "0") errors.push(`invalid value for -${key}: expected boolean`);
      continue;
    }

    if (eq !== -1) {
      values[key] = body.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined) {
      errors.push(`missing value for ${a}`);
      continue;
    }
    values[key] = next;
    i++;
  }

  return {
    raw: {
      engine: values.engine ?? "",
      host: values.host ?? "",
      port: values.port,
      username: values.username,
      password: values.password,
      dbname: values.dbname ?? "",
      sql: values.sql ?? "",
      timeout: values.timeout,
      verbose: switches.has("verbose"),
    },
    help: switches.has("help"),
    errors,
  };
}

export function usage(): string {
  return [
    "Usage: sqlbatch -engine <oracle|sqlserver|postgres> -host <host> -dbname <name> -sql <file> [options]",
    "",
    "Options:",
    "  -port <n>          database port (default: 1521 oracle, 1433 sqlserver, 5432 postgres)",
    "  -username <name>   database username (default: db_admin)",
    "  -password <pw>     database password",
    "  -timeout <sec>     per-statement timeout in seconds (default: 300)",
    "  -verbose           print debug output to stderr",
    "  -help              show this message",
    "",
    "All statements run in one transaction; any failure rolls back the whole script.",
  ].join("\n");
}
