import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: optionalString,
  SUMMARIZER_A_MODEL: z.string().min(1).default("gpt-4o-mini"),
  SUMMARIZER_B_MODEL: z.string().min(1).default("gpt-4o"),
  SUMMARY_MAX_LENGTH: z.coerce.number().int().min(40).default(800),
  COMMAND_MODEL: z.string().min(1).default("gpt-4o-mini"),
  WIKIPEDIA_BASE_URL: z.string().url().default("https://en.wikipedia.org/api/rest_v1"),
  WIKIPEDIA_USER_AGENT: z.string().min(1).default("knowledge-resolver/0.1"),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  BULK_REGISTER_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(3),
  DATABASE_URL: optionalString,
  PGHOST: optionalString,
  PGPORT: optionalString,
  PGUSER: optionalString,
  PGPASSWORD: optionalString,
  PGDATABASE: optionalString,
  PGSSLMODE: optionalString
});

export interface DatabaseConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  ssl: boolean;
}

export interface AppConfig {
  port: number;
  openaiApiKey?: string;
  summarizerA: { model: string };
  summarizerB: { model: string };
  summaryMaxLength: number;
  commandModel: string;
  wikipedia: { baseUrl: string; userAgent: string };
  backendTimeoutMs: number;
  bulkRegisterConcurrency: number;
  /** Null when no database is configured; the audit log is then disabled. */
  database: DatabaseConfig | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${JSON.stringify(result.error.format())}`);
  }
  const parsed = result.data;

  const port = parsed.PGPORT === undefined ? undefined : Number(parsed.PGPORT);
  if (port !== undefined && !Number.isInteger(port)) {
    throw new Error(`Invalid configuration: PGPORT must be an integer, got "${parsed.PGPORT}"`);
  }

  const database: DatabaseConfig | null =
    parsed.DATABASE_URL || parsed.PGHOST
      ? {
          connectionString: parsed.DATABASE_URL,
          host: parsed.PGHOST,
          port,
          user: parsed.PGUSER,
          password: parsed.PGPASSWORD,
          database: parsed.PGDATABASE,
          ssl: parsed.PGSSLMODE === "require"
        }
      : null;

  return {
    port: parsed.PORT,
    openaiApiKey: parsed.OPENAI_API_KEY,
    summarizerA: { model: parsed.SUMMARIZER_A_MODEL },
    summarizerB: { model: parsed.SUMMARIZER_B_MODEL },
    summaryMaxLength: parsed.SUMMARY_MAX_LENGTH,
    commandModel: parsed.COMMAND_MODEL,
    wikipedia: { baseUrl: parsed.WIKIPEDIA_BASE_URL, userAgent: parsed.WIKIPEDIA_USER_AGENT },
    backendTimeoutMs: parsed.BACKEND_TIMEOUT_MS,
    bulkRegisterConcurrency: parsed.BULK_REGISTER_CONCURRENCY,
    database
  };
}
