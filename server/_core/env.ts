import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  port: z.coerce.number().int().positive().default(30211),
  host: z.string().default("127.0.0.1"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  databaseUrl: z.string().min(1).default("./data/telemetry.db"),
  poolPollIntervalSeconds: z.coerce.number().int().positive().default(60),
  minerPollIntervalSeconds: z.coerce.number().int().positive().default(30),
  scanSubnet: z
    .string()
    .regex(/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/, "SCAN_SUBNET must be an IPv4 CIDR block")
    .optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse({
    port: process.env.PORT,
    host: process.env.HOST,
    nodeEnv: process.env.NODE_ENV,
    databaseUrl: process.env.DATABASE_URL,
    poolPollIntervalSeconds: process.env.POOL_POLL_INTERVAL_S,
    minerPollIntervalSeconds: process.env.MINER_POLL_INTERVAL_S,
    scanSubnet: process.env.SCAN_SUBNET || undefined,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error("[Config] Invalid environment:", result.error.format());
    throw new Error("Invalid configuration");
  }

  return result.data;
}

export const ENV = loadEnv();
