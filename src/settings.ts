import { z } from "zod";

import { ConfigError } from "./errors";

export type DbType = "oracle" | "sqlserver" | "postgres";

export const DB_TYPES: readonly DbType[] = ["oracle", "sqlserver", "postgres"];

export const DEFAULT_PORTS: Record<DbType, number> = {
  oracle: 1521,
  sqlserver: 1433,
  postgres: 5432,
};

export interface RunnerSettings {
  engine: DbType;
  host: string;
  port: number;
  username: string;
  password: string;
  dbname: string;
  sqlPath: string;
  timeoutMs: number;
  verbose: boolean;
}

export const DEFAULT_SETTINGS = {
  username: "db_admin",
  password: "",
  timeoutSeconds: 300,
};

const required = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

const numeric = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a number`)
    .transform((v) => Number(v))
    .optional();

export const RunnerSettingsSchema = z
  .object({
    engine: required("engine"),
    host: required("host"),
    port: numeric("port"),
    username: z.string().default(DEFAULT_SETTINGS.username),
    password: z.string().default(DEFAULT_SETTINGS.password),
    dbname: required("dbname"),
    sql: required("sql path"),
    timeout: numeric("timeout"),
    verbose: z.boolean().default(false),
  })
  .superRefine((v, ctx) => {
    if (v.engine && !isDbType(v.engine.toLowerCase())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["engine"], message: `unsupported engine: ${v.engine}` });
    }
  });

export type RawSettings = z.input<typeof RunnerSettingsSchema>;

export function isDbType(v: string): v is DbType {
  return DB_TYPES.some((t) => t === v);
}

export function defaultPort(engine: DbType): number {
  return DEFAULT_PORTS[engine];
}

/**
 * Validate raw flag values and fill in defaults.
 * `extraErrors` (argv problems found while tokenizing) are reported together
 * with the schema's, in that order.
 */
export function resolveSettings(raw: RawSettings, extraErrors: string[] = []): RunnerSettings {
  const parsed = RunnerSettingsSchema.safeParse(raw);
  if (!parsed.success || extraErrors.length > 0) {
    const messages = [...extraErrors];
    if (!parsed.success) {
      for (const issue of parsed.error.issues) messages.push(issue.message);
    }
    throw new ConfigError(messages);
  }

  const v = parsed.data;
  const engine = v.engine.toLowerCase();
  // superRefine already rejected anything else
  if (!isDbType(engine)) throw new ConfigError([`unsupported engine: ${v.engine}`]);

  return {
    engine,
    host: v.host,
    port: v.port || defaultPort(engine),
    username: v.username,
    password: v.password,
    dbname: v.dbname,
    sqlPath: v.sql,
    timeoutMs: (v.timeout ?? DEFAULT_SETTINGS.timeoutSeconds) * 1000,
    verbose: v.verbose,
  };
}
