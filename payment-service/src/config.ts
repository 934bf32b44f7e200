import { z } from "zod";
import { DatabaseConfig } from "./db";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8060),
  PGHOST: z.string().min(1).default("postgres_db"),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGUSER: z.string().min(1).default("user"),
  PGPASSWORD: z.string().default("password"),
  PGDATABASE: z.string().min(1).default("payments_db"),
  KAFKA_BROKERS: z.string().min(1).default("kafka-1:29092"),
  KAFKA_CLIENT_ID: z.string().min(1).default("payment-service"),
  PAYMENT_TOPIC: z.string().min(1).default("payment-topic"),
  // Unset means every amount is accepted
  PAYMENT_AMOUNT_LIMIT: z.coerce.number().positive().optional(),
});

export interface PaymentServiceConfig {
  port: number;
  database: DatabaseConfig;
  kafka: {
    clientId: string;
    brokers: string[];
    paymentTopic: string;
  };
  amountLimit?: number;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): PaymentServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid payment-service configuration: ${issues}`);
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
      paymentTopic: vars.PAYMENT_TOPIC,
    },
    amountLimit: vars.PAYMENT_AMOUNT_LIMIT,
  };
}
