import { Pool, QueryResultRow } from "pg";

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export type Database = ReturnType<typeof createDatabase>;

export const createDatabase = (config: DatabaseConfig) => {
  const pool = new Pool(config);

  return {
    query: <R extends QueryResultRow>(text: string, params: unknown[] = []) =>
      pool.query<R>(text, params),
    close: () => pool.end(),
  };
};

export async function initializeSchema(db: Database) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS notifications (
      id SERIAL PRIMARY KEY,
      type VARCHAR(32) NOT NULL,
      reference VARCHAR(255) NOT NULL,
      recipient VARCHAR(255) NOT NULL,
      payload JSONB NOT NULL,
      sent_at TIMESTAMPTZ NOT NULL
    )
  `);

  await db.query(`
    CREATE INDEX IF NOT EXISTS idx_notifications_reference
    ON notifications(reference)
  `);

  console.log("✅ Notification schema initialized");
}
