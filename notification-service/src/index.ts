import { Kafka, logLevel } from "kafkajs";
import { loadConfig } from "./config";
import { createDatabase, initializeSchema } from "./db";
import { KafkaDeadLetterPublisher } from "./kafka/dead-letter";
import { NotificationMessageHandler } from "./kafka/message.handler";
import { PgNotificationRepository } from "./notification/notification.repository";
import { NotificationService } from "./notification/notification.service";

const run = async () => {
  const config = loadConfig();
  const db = createDatabase(config.database);
  await initializeSchema(db);

  const kafka = new Kafka({
    clientId: config.kafka.clientId,
    brokers: config.kafka.brokers,
    logLevel: logLevel.WARN,
    retry: {
      initialRetryTime: 100,
      retries: 8,
    },
  });

  const producer = kafka.producer();
  const consumer = kafka.consumer({
    groupId: config.kafka.groupId,
    sessionTimeout: 60000,
    heartbeatInterval: 3000,
  });

  const handler = new NotificationMessageHandler(
    new NotificationService(new PgNotificationRepository(db)),
    new KafkaDeadLetterPublisher(producer, "notification-service"),
    {
      orderTopic: config.kafka.orderTopic,
      paymentTopic: config.kafka.paymentTopic,
      maxRetries: config.retry.maxRetries,
      retryDelayMs: config.retry.delayMs,
    }
  );

  const statsTimer = setInterval(() => {
    const { successfulProcessing, validationFailures, poisonMessages } =
      handler.metrics;
    console.log(`📊 Notification Service Metrics:
    - Successful: ${successfulProcessing}
    - Validation Failures: ${validationFailures}
    - Poison Messages (sent to DLQ): ${poisonMessages}
  `);
  }, 15000);

  await producer.connect();
  await consumer.connect();
  await consumer.subscribe({ topic: config.kafka.orderTopic, fromBeginning: true });
  await consumer.subscribe({
    topic: config.kafka.paymentTopic,
    fromBeginning: true,
  });

  console.log("Notification service is running with poison message handling...");

  await consumer.run({
    eachMessage: ({ topic, partition, message }) =>
      handler.handle(topic, partition, message),
  });

  const shutdown = () => {
    console.log("Shutting down notification service...");
    console.log("Final stats:", handler.metrics);
    clearInterval(statsTimer);
    Promise.all([consumer.disconnect(), producer.disconnect(), db.close()])
      .then(() => process.exit(0))
      .catch((e: Error) => {
        console.error("[notification-service] Error during shutdown:", e.message);
        process.exit(1);
      });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

run().catch((e: Error) => {
  console.error("[notification-service] Error:", e.message);
  process.exit(1);
});
