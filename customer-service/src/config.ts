import { z } from "zod";
import { DatabaseConfig } from "./db";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8090),
  PGHOST: z.string().min(1).default("postgres_db"),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGUSER: z.string().min(1).default("user"),
  PGPASSWORD: z.string().default("password"),
  PGDATABASE: z.string().min(1).default("customers_db"),
});

export interface CustomerServiceConfig {
  port: number;
  database: DatabaseConfig;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): CustomerServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid customer-service configuration: ${issues}`);
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
  };
}
