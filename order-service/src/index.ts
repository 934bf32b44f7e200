import { createApp } from "./app";
import { createHttpClient } from "./common/remote";
import { loadConfig } from "./config";
import { HttpCustomerClient } from "./customer/customer.client";
import { createDatabase, initializeSchema } from "./db";
import { createKafka, createProducer } from "./kafka/kafka";
import { KafkaOrderProducer } from "./kafka/order.producer";
import { PgOrderRepository } from "./order/order.repository";
import { OrderService } from "./order/order.service";
import { OrderLineService } from "./orderline/orderline.service";
import { HttpPaymentClient } from "./payment/payment.client";
import { HttpProductClient } from "./product/product.client";

const run = async () => {
  const config = loadConfig();
  const db = createDatabase(config.database);
  await initializeSchema(db);

  const kafka = createKafka(config.kafka);
  const producer = createProducer(kafka);
  await producer.connect();

  const { customerUrl, productUrl, paymentUrl, timeoutMs } = config.remote;
  const orderRepository = new PgOrderRepository(db);

  const orderService = new OrderService({
    orderRepository,
    customerClient: new HttpCustomerClient(
      createHttpClient(customerUrl, timeoutMs)
    ),
    productClient: new HttpProductClient(
      createHttpClient(productUrl, timeoutMs)
    ),
    paymentClient: new HttpPaymentClient(
      createHttpClient(paymentUrl, timeoutMs)
    ),
    orderProducer: new KafkaOrderProducer(producer, config.kafka.orderTopic),
  });

  const app = createApp({
    orderService,
    orderLineService: new OrderLineService(orderRepository),
    checkDatabase: async () => {
      await db.query("SELECT 1");
    },
  });

  const server = app.listen(config.port, () => {
    console.log(`Order service API listening on port ${config.port}`);
    console.log(
      `Health check available at http://localhost:${config.port}/health`
    );
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down gracefully...`);
    server.close(() => {
      Promise.all([producer.disconnect(), db.close()])
        .then(() => process.exit(0))
        .catch((e: Error) => {
          console.error("[order-service] Error during shutdown:", e.message);
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

run().catch((e: Error) => {
  console.error("[order-service] Error:", e.message);
  process.exit(1);
});
