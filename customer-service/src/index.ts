import { createApp } from "./app";
import { loadConfig } from "./config";
import { PgCustomerRepository } from "./customer/customer.repository";
import { CustomerService } from "./customer/customer.service";
import { createDatabase, initializeSchema } from "./db";

const run = async () => {
  const config = loadConfig();
  const db = createDatabase(config.database);
  await initializeSchema(db);

  const app = createApp({
    customerService: new CustomerService(new PgCustomerRepository(db)),
    checkDatabase: async () => {
      await db.query("SELECT 1");
    },
  });

  const server = app.listen(config.port, () => {
    console.log(`Customer service API listening on port ${config.port}`);
  });

  const shutdown = () => {
    console.log("Shutting down customer service...");
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((e: Error) => {
          console.error("[customer-service] Error closing pool:", e.message);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

run().catch((e: Error) => {
  console.error("[customer-service] Error:", e.message);
  process.exit(1);
});
