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
    CREATE TABLE IF NOT EXISTS customers (
      id VARCHAR(64) PRIMARY KEY,
      firstname VARCHAR(255) NOT NULL,
      lastname VARCHAR(255) NOT NULL,
      email VARCHAR(255) NOT NULL,
      address JSONB
    )
  `);

  console.log("✅ Customer schema initialized");
}
