import { Kafka, logLevel, Producer } from "kafkajs";

export interface KafkaSettings {
  clientId: string;
  brokers: string[];
}

export const createKafka = ({ clientId, brokers }: KafkaSettings): Kafka =>
  new Kafka({
    clientId,
    brokers,
    logLevel: logLevel.WARN,
    retry: {
      initialRetryTime: 100,
      retries: 8,
      maxRetryTime: 30000,
      multiplier: 2,
      factor: 0.2,
    },
    connectionTimeout: 10000,
    requestTimeout: 30000,
  });

export function createProducer(kafka: Kafka): Producer {
  const producer = kafka.producer({
    allowAutoTopicCreation: false,
    idempotent: true,
    maxInFlightRequests: 5,
    retry: {
      maxRetryTime: 30000,
      initialRetryTime: 300,
      retries: 10,
    },
  });

  producer.on(producer.events.CONNECT, () => {
    console.log("✅ Producer connected to Kafka cluster");
  });

  producer.on(producer.events.DISCONNECT, () => {
    console.log("⚠️ Producer disconnected from Kafka cluster");
  });

  producer.on(producer.events.REQUEST_TIMEOUT, ({ payload }) => {
    console.error("⏰ Producer request timeout:", payload);
  });

  return producer;
}
