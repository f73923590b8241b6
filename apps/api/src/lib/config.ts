import fs from "node:fs";
import path from "node:path";
import cron from "node-cron";
import { z } from "zod";
import { ConfigError } from "../domain/errors.js";

export type AppConfig = {
  host: string;
  port: number;
  dataDir: string;
  dbPath: string;
  catalogBaseUrl: string;
  game: string;
  catalogLimit: number;
  probeConcurrency: number;
  probeTimeoutMs: number;
  cycleTimeoutMs: number;
  readinessThreshold: number;
  rateLimitCooldownMs: number;
  pruneCron: string;
};

const envSchema = z.object({
  SCOUT_HOST: z.string().min(1).default("127.0.0.1"),
  SCOUT_PORT: z.coerce.number().int().min(1).max(65535).default(4020),
  SCOUT_DATA_DIR: z.string().min(1).optional(),
  SCOUT_CATALOG_URL: z.string().url().default("https://api.battlemetrics.com"),
  SCOUT_GAME: z.string().min(1).default("dayz"),
  SCOUT_CATALOG_LIMIT: z.coerce.number().int().min(1).max(5000).default(300),
  SCOUT_PROBE_CONCURRENCY: z.coerce.number().int().min(1).max(512).default(64),
  SCOUT_PROBE_TIMEOUT_MS: z.coerce.number().int().min(50).max(30_000).default(1500),
  SCOUT_CYCLE_TIMEOUT_MS: z.coerce.number().int().min(100).max(600_000).default(20_000),
  SCOUT_READINESS_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.6),
  SCOUT_RATE_LIMIT_COOLDOWN_MS: z.coerce.number().int().min(0).default(60_000),
  SCOUT_PRUNE_CRON: z
    .string()
    .default("*/10 * * * *")
    .refine((expr) => cron.validate(expr), "Invalid cron expression")
});

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid environment configuration: ${message}`, parsed.error.issues);
  }

  const values = parsed.data;
  const dataDir = values.SCOUT_DATA_DIR ?? path.join(process.cwd(), "data");
  ensureDir(dataDir);

  return {
    host: values.SCOUT_HOST,
    port: values.SCOUT_PORT,
    dataDir,
    dbPath: path.join(dataDir, "server-cache.db"),
    catalogBaseUrl: values.SCOUT_CATALOG_URL.replace(/\/+$/, ""),
    game: values.SCOUT_GAME,
    catalogLimit: values.SCOUT_CATALOG_LIMIT,
    probeConcurrency: values.SCOUT_PROBE_CONCURRENCY,
    probeTimeoutMs: values.SCOUT_PROBE_TIMEOUT_MS,
    cycleTimeoutMs: values.SCOUT_CYCLE_TIMEOUT_MS,
    readinessThreshold: values.SCOUT_READINESS_THRESHOLD,
    rateLimitCooldownMs: values.SCOUT_RATE_LIMIT_COOLDOWN_MS,
    pruneCron: values.SCOUT_PRUNE_CRON
  };
}
