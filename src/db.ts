import type { ResolutionAuditEntry, ResolutionAuditSink } from "./resolution/types";

/** The slice of pg's Pool/Client the audit log needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

export async function init(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS resolution_logs (
      id SERIAL PRIMARY KEY,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      category TEXT NOT NULL,
      query TEXT NOT NULL,
      status TEXT NOT NULL,
      strategy TEXT,
      payload JSONB,
      attempts JSONB NOT NULL,
      fault TEXT
    );
  `);
}

export class PgAuditSink implements ResolutionAuditSink {
  constructor(private readonly db: Queryable) {}

  async record(entry: ResolutionAuditEntry): Promise<void> {
    const values = [
      entry.category,
      entry.query,
      entry.status,
      entry.strategy ?? null,
      entry.payload === undefined ? null : JSON.stringify(entry.payload),
      JSON.stringify(entry.attempts),
      entry.fault ?? null
    ];

    await this.db.query(
      `INSERT INTO resolution_logs (category, query, status, strategy, payload, attempts, fault)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      values
    );
  }
}
