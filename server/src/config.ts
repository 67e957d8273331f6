import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DB_PATH: z.string().min(1).default("chess.db"),
  JWT_SECRET: z.string().min(1).default("dev-secret"),
  // Dev: allow Vite + other local frontends.
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  STATIC_DIR: z.string().min(1).optional(),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  port: number;
  host: string;
  dbPath: string;
  jwtSecret: string;
  corsOrigins: string[];
  staticDir?: string;
  bcryptRounds: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    dbPath: e.DB_PATH,
    jwtSecret: e.JWT_SECRET,
    corsOrigins: e.CORS_ORIGINS.split(",").map((o) => o.trim()).filter((o) => o.length > 0),
    staticDir: e.STATIC_DIR,
    bcryptRounds: e.BCRYPT_ROUNDS,
    logLevel: e.LOG_LEVEL,
  });
}

export const config = loadConfig();
