import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase, initializeSchema } from "./db";
import { PgProductRepository } from "./product/product.repository";
import { ProductService } from "./product/product.service";

const run = async () => {
  const config = loadConfig();
  const db = createDatabase(config.database);
  await initializeSchema(db);

  const productService = new ProductService(new PgProductRepository(db));
  const app = createApp({
    productService,
    checkDatabase: async () => {
      await db.query("SELECT 1");
    },
  });

  const server = app.listen(config.port, () => {
    console.log(`Product service API listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down gracefully...`);
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((e: Error) => {
          console.error("[product-service] Error closing pool:", e.message);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

run().catch((e: Error) => {
  console.error("[product-service] Error:", e.message);
  process.exit(1);
});
