import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDatabase, initializeSchema } from "./db";
import {
  createKafka,
  KafkaNotificationProducer,
} from "./kafka/notification.producer";
import { PgPaymentRepository } from "./payment/payment.repository";
import { PaymentService } from "./payment/payment.service";

const run = async () => {
  const config = loadConfig();
  const db = createDatabase(config.database);
  await initializeSchema(db);

  const producer = createKafka(
    config.kafka.clientId,
    config.kafka.brokers
  ).producer({ idempotent: true });
  await producer.connect();

  const paymentService = new PaymentService(
    new PgPaymentRepository(db),
    new KafkaNotificationProducer(producer, config.kafka.paymentTopic),
    { amountLimit: config.amountLimit }
  );

  const app = createApp({
    paymentService,
    checkDatabase: async () => {
      await db.query("SELECT 1");
    },
  });

  const server = app.listen(config.port, () => {
    console.log(`Payment service API listening on port ${config.port}`);
  });

  const shutdown = () => {
    console.log("Shutting down payment service...");
    server.close(() => {
      Promise.all([producer.disconnect(), db.close()])
        .then(() => process.exit(0))
        .catch((e: Error) => {
          console.error("[payment-service] Error during shutdown:", e.message);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

run().catch((e: Error) => {
  console.error("[payment-service] Error:", e.message);
  process.exit(1);
});
