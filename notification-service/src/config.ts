import { z } from "zod";
import { DatabaseConfig } from "./db";

const EnvSchema = z.object({
  PGHOST: z.string().min(1).default("postgres_db"),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGUSER: z.string().min(1).default("user"),
  PGPASSWORD: z.string().default("password"),
  PGDATABASE: z.string().min(1).default("notifications_db"),
  KAFKA_BROKERS: z.string().min(1).default("kafka-1:29092"),
  KAFKA_CLIENT_ID: z.string().min(1).default("notification-service"),
  KAFKA_GROUP_ID: z.string().min(1).default("notification-service-group"),
  ORDER_TOPIC: z.string().min(1).default("order-topic"),
  PAYMENT_TOPIC: z.string().min(1).default("payment-topic"),
  NOTIFICATION_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  NOTIFICATION_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
});

export interface NotificationServiceConfig {
  database: DatabaseConfig;
  kafka: {
    clientId: string;
    brokers: string[];
    groupId: string;
    orderTopic: string;
    paymentTopic: string;
  };
  retry: {
    maxRetries: number;
    delayMs: number;
  };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): NotificationServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid notification-service configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    database: {
      host: vars.PGHOST,
      port: vars.PGPORT,
      user: vars.PGUSER,
      password: vars.PGPASSWORD,
      database: vars.PGDATABASE,
    },
    kafka: {
      clientId: vars.KAFKA_CLIENT_ID,
      brokers: vars.KAFKA_BROKERS.split(",").map((broker) => broker.trim()),
      groupId: vars.KAFKA_GROUP_ID,
      orderTopic: vars.ORDER_TOPIC,
      paymentTopic: vars.PAYMENT_TOPIC,
    },
    retry: {
      maxRetries: vars.NOTIFICATION_MAX_RETRIES,
      delayMs: vars.NOTIFICATION_RETRY_DELAY_MS,
    },
  };
}
