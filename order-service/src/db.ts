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
    CREATE TABLE IF NOT EXISTS customer_orders (
      id SERIAL PRIMARY KEY,
      reference VARCHAR(255) NOT NULL UNIQUE,
      total_amount NUMERIC(12, 2) NOT NULL,
      payment_method VARCHAR(32) NOT NULL,
      customer_id VARCHAR(255) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS order_lines (
      id SERIAL PRIMARY KEY,
      order_id INTEGER NOT NULL REFERENCES customer_orders(id),
      product_id INTEGER NOT NULL,
      quantity DOUBLE PRECISION NOT NULL CHECK (quantity > 0)
    )
  `);

  await db.query(`
    CREATE INDEX IF NOT EXISTS idx_order_lines_order_id
    ON order_lines(order_id)
  `);

  console.log("✅ Order schema initialized");
}
