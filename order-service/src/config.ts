import { z } from "zod";
import { DatabaseConfig } from "./db";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8070),
  PGHOST: z.string().min(1).default("postgres_db"),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGUSER: z.string().min(1).default("user"),
  PGPASSWORD: z.string().default("password"),
  PGDATABASE: z.string().min(1).default("orders_db"),
  KAFKA_BROKERS: z.string().min(1).default("kafka-1:29092"),
  KAFKA_CLIENT_ID: z.string().min(1).default("order-service"),
  ORDER_TOPIC: z.string().min(1).default("order-topic"),
  CUSTOMER_URL: z
    .string()
    .url()
    .default("http://customer-service:8090/api/v1/customers"),
  PRODUCT_URL: z
    .string()
    .url()
    .default("http://product-service:8050/api/v1/products"),
  PAYMENT_URL: z
    .string()
    .url()
    .default("http://payment-service:8060/api/v1/payments"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export interface OrderServiceConfig {
  port: number;
  database: DatabaseConfig;
  kafka: {
    clientId: string;
    brokers: string[];
    orderTopic: string;
  };
  remote: {
    customerUrl: string;
    productUrl: string;
    paymentUrl: string;
    timeoutMs: number;
  };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): OrderServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid order-service configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
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
      orderTopic: vars.ORDER_TOPIC,
    },
    remote: {
      customerUrl: vars.CUSTOMER_URL,
      productUrl: vars.PRODUCT_URL,
      paymentUrl: vars.PAYMENT_URL,
      timeoutMs: vars.HTTP_TIMEOUT_MS,
    },
  };
}
