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
    CREATE TABLE IF NOT EXISTS payments (
      id SERIAL PRIMARY KEY,
      amount NUMERIC(12, 2) NOT NULL,
      payment_method VARCHAR(32) NOT NULL,
      order_id INTEGER NOT NULL,
      order_reference VARCHAR(255) NOT NULL,
      customer_id VARCHAR(255) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  console.log("✅ Payment schema initialized");
}
