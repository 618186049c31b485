import { Pool } from "pg";
import type { DatabaseConfig } from "./env";

export function createPool(config: DatabaseConfig): Pool {
  const pool = config.connectionString
    ? new Pool({ connectionString: config.connectionString })
    : new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        ssl: config.ssl ? { rejectUnauthorized: false } : undefined
      });

  pool.on("error", (error: Error) => {
    console.error("Unexpected PostgreSQL error", error);
  });

  return pool;
}
