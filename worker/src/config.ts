/**
 * Environment configuration for the feed consumer
 */
import { z } from "zod";
import { ConfigError } from "./errors";

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  RAIL_QUEUE_NAME: z.string().trim().min(1, "queue name must not be empty"),
  RAIL_HOST: z.string().min(1).default("datafeeds.nationalrail.co.uk"),
  RAIL_PORT: z.coerce.number().int().min(1).max(65535).default(61613),
  RAIL_USERNAME: z.string().min(1).default("d3user"),
  RAIL_PASSWORD: z.string().min(1).default("d3password"),
  RAIL_RUN_SECONDS: z.coerce.number().positive().default(10),
  RAIL_LOG_RAW: flag,
});

export interface FeedConfig {
  queueName: string;
  host: string;
  port: number;
  username: string;
  password: string;
  runSeconds: number;
  logRaw: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): FeedConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    queueName: parsed.RAIL_QUEUE_NAME,
    host: parsed.RAIL_HOST,
    port: parsed.RAIL_PORT,
    username: parsed.RAIL_USERNAME,
    password: parsed.RAIL_PASSWORD,
    runSeconds: parsed.RAIL_RUN_SECONDS,
    logRaw: parsed.RAIL_LOG_RAW,
  };
}
