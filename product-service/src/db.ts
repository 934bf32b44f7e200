import { Pool, PoolClient, QueryResultRow } from "pg";

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

    /**
     * Runs `work` on a single pooled client between BEGIN and COMMIT.
     * Any error rolls the transaction back and is rethrown.
     */
    withTransaction: async <T>(
      work: (client: PoolClient) => Promise<T>
    ): Promise<T> => {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await work(client);
        await client.query("COMMIT");
        client.release();
        return result;
      } catch (error) {
        try {
          await client.query("ROLLBACK");
          client.release();
        } catch (rollbackError) {
          console.error(
            "❌ Rollback failed, discarding connection:",
            (rollbackError as Error).message
          );
          // A client whose rollback failed must not go back to the pool.
          client.release(true);
        }
        throw error;
      }
    },

    close: () => pool.end(),
  };
};

export async function initializeSchema(db: Database) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS categories (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      description TEXT NOT NULL DEFAULT ''
    )
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS products (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      available_quantity DOUBLE PRECISION NOT NULL CHECK (available_quantity >= 0),
      price NUMERIC(12, 2) NOT NULL,
      category_id INTEGER NOT NULL REFERENCES categories(id)
    )
  `);

  console.log("✅ Product schema initialized");
}
